import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class PlayDto {
  @IsNotEmpty()
  @IsString()
  url!: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  startTime?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  volume?: number;

  @IsOptional()
  @IsNumber()
  @Min(0.01)
  @Max(100)
  speed?: number;

  @IsOptional()
  @IsBoolean()
  fullscreen?: boolean;

  @IsOptional()
  @IsString()
  subtitleUrl?: string;

  @IsOptional()
  @IsString()
  subtitleLang?: string;

  @IsOptional()
  @IsNumber()
  subtitleDelay?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  audioTrack?: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  mpvArgs?: string[];

  @IsOptional()
  @IsObject()
  headers?: Record<string, string>;

  @IsOptional()
  @IsString()
  referer?: string;

  @IsOptional()
  @IsString()
  userAgent?: string;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  episode?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  season?: number;
}

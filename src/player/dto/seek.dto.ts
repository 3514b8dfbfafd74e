import { IsNumber, Min } from 'class-validator';

export class SeekDto {
  @IsNumber()
  @Min(0)
  position!: number;
}

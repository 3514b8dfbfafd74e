import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { PlayerService } from './player.service';
import { PlayDto } from './dto/play.dto';
import { SeekDto } from './dto/seek.dto';
import { toHttpException } from './player-http.util';

@Controller('player')
export class PlayerController {
  constructor(private readonly playerService: PlayerService) {}

  @Post('play')
  @HttpCode(HttpStatus.OK)
  async play(@Body() dto: PlayDto) {
    try {
      const status = await this.playerService.play(dto);
      return { success: true, status };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('stop')
  @HttpCode(HttpStatus.OK)
  async stop() {
    await this.playerService.stop();
    return { success: true };
  }

  @Post('seek')
  @HttpCode(HttpStatus.OK)
  async seek(@Body() dto: SeekDto) {
    try {
      await this.playerService.seek(dto.position);
      return { success: true };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('pause')
  @HttpCode(HttpStatus.OK)
  async pause() {
    try {
      await this.playerService.pause();
      return { success: true };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('resume')
  @HttpCode(HttpStatus.OK)
  async resume() {
    try {
      await this.playerService.resume();
      return { success: true };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('progress')
  async getProgress() {
    try {
      const progress = await this.playerService.getProgress();
      return { success: true, progress };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('status')
  getStatus() {
    return this.playerService.getStatus();
  }

  @Get('info')
  getInfo() {
    try {
      return this.playerService.getInfo();
    } catch (error) {
      throw toHttpException(error);
    }
  }
}

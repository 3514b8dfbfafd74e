import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MpvBridge } from '../bridges';
import { PlayerConfig } from '../config/environment';
import { PlayerController } from './player.controller';
import { PlayerService } from './player.service';

@Module({
  providers: [
    {
      provide: MpvBridge,
      useFactory: (configService: ConfigService) => new MpvBridge(configService.get<PlayerConfig>('player') ?? {}),
      inject: [ConfigService],
    },
    PlayerService,
  ],
  controllers: [PlayerController],
  exports: [PlayerService],
})
export class PlayerModule {}

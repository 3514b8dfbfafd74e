import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { environment } from './config/environment';
import { CommonModule } from './common/common.module';
import { PlayerModule } from './player/player.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => environment],
    }),
    EventEmitterModule.forRoot({
      global: true,
    }),
    CommonModule,
    PlayerModule,
  ],
})
export class AppModule {}

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { MpvBridge, PlaybackProgress, PlayerInfo, PlayerStatus, Subscription } from '../bridges';
import {
  InternalEvent,
  PlayerEndedPayload,
  PlayerErrorPayload,
  PlayerProgressPayload,
  PlayerStatePayload,
} from '../common/websocket.types';
import { PlayDto } from './dto/play.dto';

/**
 * Owns the single mpv bridge of the process and republishes its events on
 * the application event bus.
 */
@Injectable()
export class PlayerService implements OnModuleDestroy {
  private readonly logger = new Logger(PlayerService.name);
  private readonly subscriptions: Subscription[];

  constructor(
    private readonly bridge: MpvBridge,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.subscriptions = [
      bridge.onProgressUpdate((progress, sessionId) => {
        const payload: PlayerProgressPayload = { ...progress, sessionId };
        this.eventEmitter.emit(InternalEvent.PLAYER_PROGRESS, payload);
      }),
      bridge.onPlaybackEnd((event) => {
        const payload: PlayerEndedPayload = { sessionId: event.sessionId, url: event.url };
        this.eventEmitter.emit(InternalEvent.PLAYER_ENDED, payload);
      }),
      bridge.onError((error, sessionId) => {
        const payload: PlayerErrorPayload = {
          sessionId,
          code: error.code,
          message: error.message,
        };
        this.eventEmitter.emit(InternalEvent.PLAYER_ERROR, payload);
      }),
      bridge.onStateChange((state, sessionId) => {
        const payload: PlayerStatePayload = { state, sessionId };
        this.eventEmitter.emit(InternalEvent.PLAYER_STATE, payload);
      }),
    ];
  }

  async play(dto: PlayDto): Promise<PlayerStatus> {
    const { url, ...options } = dto;
    this.logger.log(`Play requested: ${options.title ?? url}`);
    await this.bridge.play(url, options);
    return this.bridge.getStatus();
  }

  stop(): Promise<void> {
    return this.bridge.stop();
  }

  seek(position: number): Promise<void> {
    return this.bridge.seek(position);
  }

  pause(): Promise<void> {
    return this.bridge.pause();
  }

  resume(): Promise<void> {
    return this.bridge.resume();
  }

  getProgress(): Promise<PlaybackProgress> {
    return this.bridge.getProgress();
  }

  getStatus(): PlayerStatus {
    return this.bridge.getStatus();
  }

  getInfo(): PlayerInfo {
    return this.bridge.getPlayerInfo();
  }

  async onModuleDestroy(): Promise<void> {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    await this.bridge.stop();
  }
}

// WebSocket Service - Typed API for emitting WebSocket events
import { Injectable, Logger } from '@nestjs/common';
import { Server } from 'socket.io';
import {
  PlayerEndedPayload,
  PlayerErrorPayload,
  PlayerProgressPayload,
  PlayerStatePayload,
  WebSocketEvent,
  WebSocketEventMap,
} from './websocket.types';

/**
 * Services emit client-facing events through here instead of touching
 * Socket.IO directly. The gateway registers the server once it is up.
 */
@Injectable()
export class WebSocketService {
  private server: Server | null = null;
  private readonly logger = new Logger(WebSocketService.name);

  setServer(server: Server): void {
    this.server = server;
    this.logger.log('WebSocket server instance registered');
  }

  getConnectionCount(): number {
    return this.server?.sockets.sockets.size ?? 0;
  }

  emitPlayerProgress(payload: PlayerProgressPayload): void {
    this.emit(WebSocketEvent.PLAYER_PROGRESS, payload);
  }

  emitPlayerEnded(payload: PlayerEndedPayload): void {
    this.emit(WebSocketEvent.PLAYER_ENDED, payload);
  }

  emitPlayerError(payload: PlayerErrorPayload): void {
    this.emit(WebSocketEvent.PLAYER_ERROR, payload);
  }

  emitPlayerState(payload: PlayerStatePayload): void {
    this.emit(WebSocketEvent.PLAYER_STATE, payload);
  }

  /**
   * Generic emit method with type safety
   */
  private emit<K extends keyof WebSocketEventMap>(event: K, payload: WebSocketEventMap[K]): void {
    if (!this.server) {
      this.logger.warn(`Cannot emit ${event}: WebSocket server not initialized`);
      return;
    }

    try {
      this.server.emit(event, payload);
      this.logger.debug(`Emitted ${event} to ${this.getConnectionCount()} clients`);
    } catch (error) {
      this.logger.error(`Error emitting ${event}:`, error);
    }
  }
}

// App Gateway - Socket.IO entry point
import {
  WebSocketGateway,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Logger, Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { WebSocketService } from './websocket.service';
import {
  InternalEvent,
  PlayerEndedPayload,
  PlayerErrorPayload,
  PlayerProgressPayload,
  PlayerStatePayload,
} from './websocket.types';

/**
 * Owns the Socket.IO server lifecycle and relays internal player events to
 * every connected client.
 */
@Injectable()
@WebSocketGateway({
  cors: true,
  transports: ['websocket', 'polling'],
  pingTimeout: 60000,
  pingInterval: 25000,
})
export class AppGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(AppGateway.name);
  private connectionCount = 0;

  constructor(private readonly websocketService: WebSocketService) {}

  afterInit(server: Server): void {
    this.websocketService.setServer(server);
    this.logger.log('AppGateway initialized');
  }

  handleConnection(client: Socket): void {
    this.connectionCount++;
    this.logger.log(`Client connected: ${client.id} | Total connections: ${this.connectionCount}`);

    client.emit('connected', {
      socketId: client.id,
      timestamp: new Date().toISOString(),
    });
  }

  handleDisconnect(client: Socket): void {
    this.connectionCount--;
    this.logger.log(`Client disconnected: ${client.id} | Total connections: ${this.connectionCount}`);
  }

  @OnEvent(InternalEvent.PLAYER_PROGRESS)
  handlePlayerProgress(payload: PlayerProgressPayload): void {
    this.websocketService.emitPlayerProgress(payload);
  }

  @OnEvent(InternalEvent.PLAYER_ENDED)
  handlePlayerEnded(payload: PlayerEndedPayload): void {
    this.websocketService.emitPlayerEnded(payload);
  }

  @OnEvent(InternalEvent.PLAYER_ERROR)
  handlePlayerError(payload: PlayerErrorPayload): void {
    this.websocketService.emitPlayerError(payload);
  }

  @OnEvent(InternalEvent.PLAYER_STATE)
  handlePlayerState(payload: PlayerStatePayload): void {
    this.websocketService.emitPlayerState(payload);
  }
}

// WebSocket Event Type Definitions
// Centralized registry of all WebSocket events and their payloads

import { PlaybackProgress, PlaybackState, PlayerErrorCode } from '../bridges';

export interface PlayerProgressPayload extends PlaybackProgress {
  sessionId: string;
}

export interface PlayerEndedPayload {
  sessionId: string;
  url: string;
}

export interface PlayerErrorPayload {
  sessionId: string;
  code: PlayerErrorCode;
  message: string;
}

export interface PlayerStatePayload {
  sessionId: string;
  state: PlaybackState;
}

/**
 * Event names sent to clients
 */
export enum WebSocketEvent {
  PLAYER_PROGRESS = 'player-progress',
  PLAYER_ENDED = 'player-ended',
  PLAYER_ERROR = 'player-error',
  PLAYER_STATE = 'player-state',
}

/**
 * Event emitter events inside the backend
 */
export enum InternalEvent {
  PLAYER_PROGRESS = 'player.progress',
  PLAYER_ENDED = 'player.ended',
  PLAYER_ERROR = 'player.error',
  PLAYER_STATE = 'player.state',
}

/**
 * Type-safe event payload mapping
 */
export interface WebSocketEventMap {
  [WebSocketEvent.PLAYER_PROGRESS]: PlayerProgressPayload;
  [WebSocketEvent.PLAYER_ENDED]: PlayerEndedPayload;
  [WebSocketEvent.PLAYER_ERROR]: PlayerErrorPayload;
  [WebSocketEvent.PLAYER_STATE]: PlayerStatePayload;
}

/**
 * Player contract shared by the mpv bridge and its consumers
 */

import { Platform } from './mpv-platform';
import { TransportKind } from './mpv-transport';
import { PlayerError } from './player-error';

export interface PlayOptions {
  // Playback
  startTime?: number; // seconds
  volume?: number; // 0-100
  speed?: number; // 1.0 = normal
  fullscreen?: boolean;

  // Subtitles
  subtitleUrl?: string;
  subtitleLang?: string;
  subtitleDelay?: number; // seconds

  audioTrack?: number;

  /** Raw arguments passed to mpv before the URL */
  mpvArgs?: string[];

  // HTTP
  headers?: Record<string, string>;
  referer?: string;
  userAgent?: string;

  // Display / tracking metadata
  title?: string;
  episode?: number;
  season?: number;
}

export interface PlaybackProgress {
  currentTime: number; // seconds
  duration: number; // seconds
  percentage: number; // 0-100
  paused: boolean;
  volume: number;
  speed: number;
  eof: boolean;
}

export type PlaybackState = 'stopped' | 'loading' | 'playing' | 'paused' | 'error';

export interface PlaybackEnded {
  sessionId: string;
  url: string;
}

export interface PlayerStatus {
  state: PlaybackState;
  sessionId: string | null;
  url: string | null;
  title?: string;
  episode?: number;
  season?: number;
  platform: Platform;
  transport: TransportKind | null;
}

export interface PlayerInfo {
  name: string;
  version: string | null;
  path: string;
}

/**
 * Handle returned by a listener registration
 */
export interface Subscription {
  unsubscribe(): void;
}

export interface Player {
  play(url: string, options?: PlayOptions, signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;

  getProgress(): Promise<PlaybackProgress>;
  seek(seconds: number): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;

  onProgressUpdate(listener: (progress: PlaybackProgress, sessionId: string) => void): Subscription;
  onPlaybackEnd(listener: (event: PlaybackEnded, sessionId: string) => void): Subscription;
  onError(listener: (error: PlayerError, sessionId: string) => void): Subscription;
  onStateChange(listener: (state: PlaybackState, sessionId: string) => void): Subscription;

  isPlaying(): boolean;
  isPaused(): boolean;
  getStatus(): PlayerStatus;
}

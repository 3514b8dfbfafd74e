/**
 * Bridges - Process wrappers for external binaries
 *
 * Usage:
 *   import { MpvBridge } from '../bridges';
 *
 *   const mpv = new MpvBridge({ appName: 'mpvsup' });
 *   mpv.onProgressUpdate((progress) => console.log(progress.percentage));
 *   await mpv.play('https://example.com/video.mkv', { startTime: 90, volume: 80 });
 */

// mpv bridge
export { MpvBridge, type MpvBridgeConfig, type BridgeHost, type PlayerEventMap, type PlayerListener } from './mpv-bridge';

// Player contract
export {
  type Player,
  type PlayOptions,
  type PlaybackProgress,
  type PlaybackState,
  type PlaybackEnded,
  type PlayerStatus,
  type PlayerInfo,
  type Subscription,
} from './player.types';
export { PlayerError, describeError, type PlayerErrorCode } from './player-error';

// Building blocks
export { resolvePlatform, executableName, findExecutable, type Platform, type WslPolicy } from './mpv-platform';
export { generateAddress, type TransportConfig, type TransportKind } from './mpv-transport';
export { MpvIpcClient, type MpvEvent, type MpvIpcClientOptions } from './mpv-ipc-client';

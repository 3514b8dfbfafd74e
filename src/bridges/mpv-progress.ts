/**
 * Progress snapshot aggregation from mpv properties
 */

import { TransportKind } from './mpv-transport';
import { PlayerError } from './player-error';
import { PlaybackProgress } from './player.types';

export interface PropertyReader {
  getProperty(name: string): Promise<unknown>;
}

// Critical reads lost to the transport at which the connection is considered dead
const DEAD_TRANSPORT_THRESHOLD = 3;

export const DEFAULT_VOLUME = 100;
export const DEFAULT_SPEED = 1.0;

/**
 * Read a complete progress snapshot.
 * Properties are requested one after another: time-pos, duration, pause,
 * eof-reached, volume, speed.
 */
export async function readProgress(client: PropertyReader, transport: TransportKind): Promise<PlaybackProgress> {
  let failures = 0;

  const read = async (name: string): Promise<unknown> => {
    try {
      return await client.getProperty(name);
    } catch (error) {
      // Error replies ("property unavailable" while a stream opens) leave the connection intact
      if (!PlayerError.is(error, 'CommandFailed')) {
        failures++;
      }
      return undefined;
    }
  };

  const timePos = asNumber(await read('time-pos')) ?? 0;
  const duration = asNumber(await read('duration')) ?? 0;
  const paused = asBoolean(await read('pause')) ?? false;
  const eof = asBoolean(await read('eof-reached')) ?? false;

  // Optional properties never count toward the failure budget
  const volume = asNumber(await client.getProperty('volume').catch(() => undefined)) ?? DEFAULT_VOLUME;
  const speed = asNumber(await client.getProperty('speed').catch(() => undefined)) ?? DEFAULT_SPEED;

  if (failures >= DEAD_TRANSPORT_THRESHOLD) {
    const message =
      transport === 'named-pipe'
        ? `named pipe IPC appears dead (failed to get ${failures} properties)`
        : `IPC connection failed (failed to get ${failures} properties)`;
    throw new PlayerError('DeadTransport', message);
  }

  return {
    currentTime: timePos,
    duration,
    percentage: duration > 0 ? (timePos / duration) * 100 : 0,
    paused,
    volume: Math.trunc(volume),
    speed,
    eof,
  };
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

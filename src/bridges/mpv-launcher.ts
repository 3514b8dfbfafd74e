/**
 * mpv process launcher
 * Spawns the player detached from the controlling terminal and hands back a
 * handle whose `exited` promise is the only place the exit status is observed.
 */

import { SpawnOptions } from 'child_process';
import { Logger } from '@nestjs/common';
import { sleep } from '../common/utils/sleep.util';
import { ProcessSpawner, SpawnedProcess } from './host';
import { Platform } from './mpv-platform';
import { describeError, PlayerError } from './player-error';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export interface ProcessHandle {
  readonly pid: number;
  readonly exited: Promise<ProcessExit>;
  readonly hasExited: boolean;
  /** Force-terminate; no-op once the process has exited */
  kill(): void;
}

export interface LaunchOptions {
  platform: Platform;
  spawnGraceMs?: number;
}

const DEFAULT_SPAWN_GRACE_MS = 100;

const logger = new Logger('MpvLauncher');

/**
 * Spawn mpv and verify it got a process id
 */
export async function launchProcess(
  spawner: ProcessSpawner,
  executable: string,
  args: string[],
  options: LaunchOptions,
): Promise<ProcessHandle> {
  const spawnOptions: SpawnOptions = {
    // stdin/stdout/stderr must not touch the controlling terminal
    stdio: 'ignore',
    windowsHide: true,
    // A separate process group keeps console Ctrl+C away from mpv
    detached: options.platform === 'windows',
  };

  logger.log(`Starting: ${executable} ${args.join(' ')}`);
  const proc = spawnOrThrow(spawner, executable, args, spawnOptions);

  const status: { spawnError?: Error; hasExited: boolean } = { hasExited: false };

  const exited = new Promise<ProcessExit>((resolve) => {
    proc.on('exit', (code, signal) => {
      status.hasExited = true;
      resolve({ code, signal });
    });
    proc.on('error', (error) => {
      status.spawnError = error;
      // A failed spawn never emits 'exit'
      if (proc.pid === undefined) {
        status.hasExited = true;
        resolve({ code: null, signal: null, error });
      } else {
        logger.warn(`[${proc.pid}] Process error: ${error.message}`);
      }
    });
  });

  // The process may fail right away, e.g. when it cannot create its IPC endpoint
  await sleep(options.spawnGraceMs ?? DEFAULT_SPAWN_GRACE_MS);

  const pid = proc.pid;
  const { spawnError } = status;
  if (spawnError && pid === undefined) {
    throw new PlayerError('SpawnFailed', `failed to start ${executable}: ${spawnError.message}`, { cause: spawnError });
  }
  if (pid === undefined) {
    throw new PlayerError('SpawnFailed', `${executable} process failed to start`);
  }

  return {
    pid,
    exited,
    get hasExited() {
      return status.hasExited;
    },
    kill() {
      if (status.hasExited) {
        return;
      }
      proc.kill('SIGKILL');
    },
  };
}

function spawnOrThrow(
  spawner: ProcessSpawner,
  executable: string,
  args: string[],
  spawnOptions: SpawnOptions,
): SpawnedProcess {
  try {
    return spawner.spawn(executable, args, spawnOptions);
  } catch (error) {
    throw new PlayerError('SpawnFailed', `failed to start ${executable}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Transport readiness probing
 * Polls until mpv's IPC endpoint accepts connections, one probe per transport kind
 */

import * as net from 'net';
import { sleep } from '../common/utils/sleep.util';
import { FileProbe, nodeFileProbe } from './host';
import { connectOptions, TransportConfig } from './mpv-transport';
import { PlayerError } from './player-error';

export interface ReadinessTimings {
  initialDelayMs: number;
  pollIntervalMs: number;
  trialConnectTimeoutMs: number;
  socketTimeoutMs: number;
  socketGraceMs: number;
  pipeTimeoutMs: number;
  pipeGraceMs: number;
  tcpTimeoutMs: number;
  tcpGraceMs: number;
}

// Pipes and TCP get longer budgets: mpv.exe is slower to open them
export const DEFAULT_READINESS_TIMINGS: ReadinessTimings = {
  initialDelayMs: 300,
  pollIntervalMs: 100,
  trialConnectTimeoutMs: 200,
  socketTimeoutMs: 5000,
  socketGraceMs: 200,
  pipeTimeoutMs: 10000,
  pipeGraceMs: 200,
  tcpTimeoutMs: 10000,
  tcpGraceMs: 300,
};

export interface ReadinessProbe {
  readonly timeoutMs: number;
  /** Extra wait after the first positive check, for the listener to finish binding */
  readonly graceMs: number;
  isReady(): Promise<boolean>;
}

class SocketFileProbe implements ReadinessProbe {
  constructor(
    private readonly socketPath: string,
    private readonly files: FileProbe,
    readonly timeoutMs: number,
    readonly graceMs: number,
  ) {}

  async isReady(): Promise<boolean> {
    return this.files.exists(this.socketPath);
  }
}

class NamedPipeProbe implements ReadinessProbe {
  constructor(
    private readonly pipePath: string,
    private readonly connectTimeoutMs: number,
    readonly timeoutMs: number,
    readonly graceMs: number,
  ) {}

  isReady(): Promise<boolean> {
    return trialConnect({ path: this.pipePath }, this.connectTimeoutMs);
  }
}

class TcpProbe implements ReadinessProbe {
  constructor(
    private readonly options: net.NetConnectOpts,
    private readonly connectTimeoutMs: number,
    readonly timeoutMs: number,
    readonly graceMs: number,
  ) {}

  isReady(): Promise<boolean> {
    return trialConnect(this.options, this.connectTimeoutMs);
  }
}

export function createReadinessProbe(
  config: TransportConfig,
  timings: ReadinessTimings = DEFAULT_READINESS_TIMINGS,
  files: FileProbe = nodeFileProbe,
): ReadinessProbe {
  switch (config.kind) {
    case 'unix-socket':
      return new SocketFileProbe(config.address, files, timings.socketTimeoutMs, timings.socketGraceMs);
    case 'named-pipe':
      return new NamedPipeProbe(config.address, timings.trialConnectTimeoutMs, timings.pipeTimeoutMs, timings.pipeGraceMs);
    case 'tcp':
      return new TcpProbe(connectOptions(config), timings.trialConnectTimeoutMs, timings.tcpTimeoutMs, timings.tcpGraceMs);
  }
}

/**
 * Connect and immediately close; true when something is listening
 */
export function trialConnect(options: net.NetConnectOpts, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection(options);
    const finish = (ready: boolean) => {
      clearTimeout(timer);
      socket.destroy();
      resolve(ready);
    };
    const timer = setTimeout(() => finish(false), timeoutMs);
    socket.once('connect', () => finish(true));
    socket.on('error', () => finish(false));
  });
}

export interface WaitForTransportOptions {
  signal?: AbortSignal;
  timings?: ReadinessTimings;
  files?: FileProbe;
}

/**
 * Wait until the transport is connectable or the probe's timeout elapses
 */
export async function waitForTransport(config: TransportConfig, options: WaitForTransportOptions = {}): Promise<void> {
  const timings = options.timings ?? DEFAULT_READINESS_TIMINGS;
  const probe = createReadinessProbe(config, timings, options.files);
  const deadline = AbortSignal.timeout(probe.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;

  try {
    // Give mpv a moment to start before checking
    await sleep(timings.initialDelayMs, signal);

    for (;;) {
      if (await probe.isReady()) {
        await sleep(probe.graceMs, signal);
        return;
      }
      await sleep(timings.pollIntervalMs, signal);
    }
  } catch (error) {
    if (options.signal?.aborted) {
      throw abortError(options.signal.reason, `waiting for IPC at ${config.address}`);
    }
    if (deadline.aborted) {
      throw new PlayerError('ReadinessTimeout', `timeout waiting for IPC at ${config.address} after ${probe.timeoutMs}ms`);
    }
    throw error;
  }
}

/**
 * Classify the reason an AbortSignal fired
 */
export function abortError(reason: unknown, activity: string): PlayerError {
  if (reason instanceof PlayerError) {
    return reason;
  }
  if (typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError') {
    return new PlayerError('ReadinessTimeout', `timed out ${activity}`, { cause: reason });
  }
  return new PlayerError('Cancelled', `cancelled while ${activity}`, { cause: reason });
}

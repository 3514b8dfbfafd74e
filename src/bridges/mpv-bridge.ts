/**
 * mpv Bridge - Supervises an external mpv process over JSON IPC
 *
 * One session is live at a time. `play` returns once mpv has been spawned;
 * readiness probing and the IPC connection happen in the background, and their
 * failures arrive as `failed` events. While playing, a progress monitor polls
 * mpv every tick and a process-exit monitor waits for mpv to go away.
 *
 * Session state is only touched inside synchronous sections, so the event
 * loop serializes every check-then-mutate. `play` and `stop` additionally run
 * through one promise chain so a previous session is always torn down before
 * the next one starts.
 */

import { EventEmitter } from 'events';
import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import * as crypto from 'crypto';
import { sleep, waitUnlessAborted } from '../common/utils/sleep.util';
import {
  ExecutableLocator,
  FileProbe,
  HostEnvironment,
  nodeExecutableLocator,
  nodeFileProbe,
  nodeHostEnvironment,
  nodeProcessSpawner,
  ProcessSpawner,
} from './host';
import { buildMpvArgs } from './mpv-args';
import { MpvIpcClient, MpvIpcClientOptions } from './mpv-ipc-client';
import { launchProcess, ProcessHandle } from './mpv-launcher';
import { DEFAULT_WSL_POLICY, executableName, findExecutable, Platform, resolvePlatform, WslPolicy } from './mpv-platform';
import { readProgress } from './mpv-progress';
import { abortError, DEFAULT_READINESS_TIMINGS, ReadinessTimings, waitForTransport } from './mpv-readiness';
import { generateAddress, ipcArgument, TransportConfig, TransportKind } from './mpv-transport';
import { describeError, PlayerError } from './player-error';
import {
  PlaybackEnded,
  PlaybackProgress,
  PlaybackState,
  Player,
  PlayerInfo,
  PlayerStatus,
  PlayOptions,
  Subscription,
} from './player.types';

export interface PlayerEventMap {
  progress: PlaybackProgress;
  ended: PlaybackEnded;
  failed: PlayerError;
  state: PlaybackState;
}

export type PlayerListener<K extends keyof PlayerEventMap> = (payload: PlayerEventMap[K], sessionId: string) => void;

export interface BridgeHost {
  environment: HostEnvironment;
  files: FileProbe;
  locator: ExecutableLocator;
  spawner: ProcessSpawner;
  randomBytes: (size: number) => Buffer;
}

export interface MpvBridgeConfig {
  /** Prefix of the IPC endpoint name */
  appName?: string;
  /** Keep mpv's own log output */
  debug?: boolean;
  /** Let mpv read the user's mpv.conf */
  loadUserConfig?: boolean;
  wslPolicy?: WslPolicy;
  initTimeoutMs?: number;
  progressIntervalMs?: number;
  quitTimeoutMs?: number;
  spawnGraceMs?: number;
  readiness?: Partial<ReadinessTimings>;
  ipc?: MpvIpcClientOptions;
  host?: Partial<BridgeHost>;
}

interface BridgeSettings {
  appName: string;
  debug: boolean;
  loadUserConfig: boolean;
  wslPolicy: WslPolicy;
  initTimeoutMs: number;
  progressIntervalMs: number;
  quitTimeoutMs: number;
  spawnGraceMs: number;
  readiness: ReadinessTimings;
  ipc: MpvIpcClientOptions;
}

interface PlaybackSession {
  readonly id: string;
  readonly url: string;
  readonly options: PlayOptions;
  readonly transportKind: TransportKind;
  readonly abort: AbortController;
  transport: TransportConfig | null;
  process: ProcessHandle | null;
  client: MpvIpcClient | null;
  /** Set once by teardown; guards against running it twice */
  tornDown: boolean;
}

export class MpvBridge extends EventEmitter implements Player {
  readonly platform: Platform;

  private readonly logger = new Logger(MpvBridge.name);
  private readonly host: BridgeHost;
  private readonly settings: BridgeSettings;

  private state: PlaybackState = 'stopped';
  private session: PlaybackSession | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly slots: Partial<Record<keyof PlayerEventMap, Subscription>> = {};

  constructor(config: MpvBridgeConfig = {}) {
    super();
    this.host = {
      environment: config.host?.environment ?? nodeHostEnvironment,
      files: config.host?.files ?? nodeFileProbe,
      locator: config.host?.locator ?? nodeExecutableLocator,
      spawner: config.host?.spawner ?? nodeProcessSpawner,
      randomBytes: config.host?.randomBytes ?? crypto.randomBytes,
    };
    this.settings = {
      appName: config.appName ?? 'mpvsup',
      debug: config.debug ?? false,
      loadUserConfig: config.loadUserConfig ?? false,
      wslPolicy: config.wslPolicy ?? DEFAULT_WSL_POLICY,
      initTimeoutMs: config.initTimeoutMs ?? 15000,
      progressIntervalMs: config.progressIntervalMs ?? 1000,
      quitTimeoutMs: config.quitTimeoutMs ?? 500,
      spawnGraceMs: config.spawnGraceMs ?? 100,
      readiness: { ...DEFAULT_READINESS_TIMINGS, ...config.readiness },
      ipc: config.ipc ?? {},
    };
    this.platform = resolvePlatform(this.host.environment);

    this.logger.log(`Initialized for platform ${this.platform} (binary: ${this.executableName})`);
  }

  get executableName(): string {
    return executableName(this.platform, this.settings.wslPolicy);
  }

  /**
   * Start playback. Resolves once mpv is spawned; later failures are
   * delivered through onError.
   */
  play(url: string, options: PlayOptions = {}, signal?: AbortSignal): Promise<void> {
    return this.serialize(() => this.startSession(url, options, signal));
  }

  /**
   * Stop playback and release the session's resources. Idempotent.
   */
  stop(): Promise<void> {
    return this.serialize(async () => {
      if (this.session) {
        this.teardown(this.session);
      }
    });
  }

  async getProgress(): Promise<PlaybackProgress> {
    const session = this.session;
    const client = session?.client;
    if (!session || !client || this.state === 'stopped') {
      throw new PlayerError('NotInitialized', 'player not initialized');
    }

    try {
      return await readProgress(client, session.transportKind);
    } catch (error) {
      if (PlayerError.is(error, 'DeadTransport')) {
        throw error;
      }
      throw new PlayerError('TransportError', `mpv IPC error: ${describeError(error)}`, { cause: error });
    }
  }

  async seek(seconds: number): Promise<void> {
    const client = this.requireClient();
    try {
      await client.setProperty('time-pos', seconds);
    } catch (error) {
      throw new PlayerError('TransportError', `failed to seek: ${describeError(error)}`, { cause: error });
    }
  }

  async pause(): Promise<void> {
    await this.setPaused(true);
  }

  async resume(): Promise<void> {
    await this.setPaused(false);
  }

  onProgressUpdate(listener: PlayerListener<'progress'>): Subscription {
    return this.setSlot('progress', listener);
  }

  onPlaybackEnd(listener: PlayerListener<'ended'>): Subscription {
    return this.setSlot('ended', listener);
  }

  onError(listener: PlayerListener<'failed'>): Subscription {
    return this.setSlot('failed', listener);
  }

  onStateChange(listener: PlayerListener<'state'>): Subscription {
    return this.setSlot('state', listener);
  }

  isPlaying(): boolean {
    return this.state === 'playing';
  }

  isPaused(): boolean {
    return this.state === 'paused';
  }

  getState(): PlaybackState {
    return this.state;
  }

  getStatus(): PlayerStatus {
    const session = this.session;
    return {
      state: this.state,
      sessionId: session?.id ?? null,
      url: session?.url ?? null,
      title: session?.options.title,
      episode: session?.options.episode,
      season: session?.options.season,
      platform: this.platform,
      transport: session?.transportKind ?? null,
    };
  }

  /**
   * Describe the mpv binary that play() would launch
   */
  getPlayerInfo(): PlayerInfo {
    const executablePath = findExecutable(this.platform, this.host.locator, this.settings.wslPolicy);
    return {
      name: 'mpv',
      version: this.host.locator.version(executablePath),
      path: executablePath,
    };
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async startSession(url: string, options: PlayOptions, signal?: AbortSignal): Promise<void> {
    if (this.session) {
      this.teardown(this.session);
    }

    const executable = findExecutable(this.platform, this.host.locator, this.settings.wslPolicy);
    const transport = generateAddress(this.platform, {
      appName: this.settings.appName,
      tmpdir: this.host.environment.tmpdir(),
      wslPolicy: this.settings.wslPolicy,
      randomBytes: this.host.randomBytes,
    });
    const args = buildMpvArgs(url, options, {
      ipcArgument: ipcArgument(transport),
      loadUserConfig: this.settings.loadUserConfig,
      debug: this.settings.debug,
    });

    let proc: ProcessHandle;
    try {
      proc = await launchProcess(this.host.spawner, executable, args, {
        platform: this.platform,
        spawnGraceMs: this.settings.spawnGraceMs,
      });
    } catch (error) {
      this.releaseAddress(transport);
      throw error;
    }

    const session: PlaybackSession = {
      id: uuidv4(),
      url,
      options,
      transportKind: transport.kind,
      abort: new AbortController(),
      transport,
      process: proc,
      client: null,
      tornDown: false,
    };
    this.session = session;
    this.logger.log(`[${session.id}] mpv started (pid ${proc.pid}), waiting for IPC at ${transport.address}`);
    this.setState('loading', session.id);

    this.initialize(session, signal).catch((error) => {
      this.logger.error(`[${session.id}] Initialization crashed: ${describeError(error)}`);
    });
  }

  private async initialize(session: PlaybackSession, callerSignal?: AbortSignal): Promise<void> {
    const transport = session.transport;
    if (!transport) {
      return;
    }

    const signals = [session.abort.signal, AbortSignal.timeout(this.settings.initTimeoutMs)];
    if (callerSignal) {
      signals.push(callerSignal);
    }
    const signal = AbortSignal.any(signals);

    try {
      await waitForTransport(transport, { signal, timings: this.settings.readiness, files: this.host.files });
    } catch (error) {
      this.failInitialization(session, this.readinessFailure(transport, error));
      return;
    }

    let client: MpvIpcClient;
    try {
      client = await MpvIpcClient.connect(transport, this.settings.ipc);
    } catch (error) {
      this.failInitialization(session, this.connectFailure(transport, error));
      return;
    }

    if (session.tornDown || this.session !== session || signal.aborted) {
      client.close();
      if (signal.aborted) {
        this.failInitialization(session, abortError(signal.reason, 'connecting to mpv'));
      }
      return;
    }

    session.client = client;
    this.logger.log(`[${session.id}] Connected to mpv IPC`);
    this.setState('playing', session.id);

    const proc = session.process;
    this.monitorProgress(session).catch((error) => {
      this.logger.error(`[${session.id}] Progress monitor crashed: ${describeError(error)}`);
    });
    if (proc) {
      this.monitorProcess(session, proc).catch((error) => {
        this.logger.error(`[${session.id}] Process monitor crashed: ${describeError(error)}`);
      });
    }
  }

  private failInitialization(session: PlaybackSession, error: PlayerError): void {
    if (session.tornDown || this.session !== session) {
      this.logger.debug(`[${session.id}] Ignoring initialization failure of a stopped session: ${error.message}`);
      return;
    }

    this.logger.error(`[${session.id}] ${error.message}`);
    session.process?.kill();
    this.releaseTransport(session);
    this.setState('error', session.id);
    this.emitEvent('failed', error, session.id);
  }

  private readinessFailure(transport: TransportConfig, error: unknown): PlayerError {
    const cause = error instanceof PlayerError ? error : abortError(error, 'waiting for mpv IPC');
    if (transport.kind === 'named-pipe') {
      return new PlayerError(
        cause.code,
        `failed to connect to mpv (timeout waiting for named pipe: ${transport.address}): ${cause.message}\n` +
          'This may indicate mpv.exe failed to start or lacks permissions',
        { cause },
      );
    }
    return cause;
  }

  private connectFailure(transport: TransportConfig, error: unknown): PlayerError {
    if (transport.kind === 'named-pipe') {
      return new PlayerError(
        'ConnectFailed',
        `failed to connect to mpv IPC (Windows named pipe: ${transport.address}): ${describeError(error)}\n` +
          'Make sure mpv.exe is properly installed and in PATH',
        { cause: error },
      );
    }
    return new PlayerError('ConnectFailed', `failed to connect to mpv IPC at ${transport.address}: ${describeError(error)}`, {
      cause: error,
    });
  }

  /**
   * Release everything a session owns. Runs at most once per session.
   */
  private teardown(session: PlaybackSession): boolean {
    if (session.tornDown) {
      return false;
    }
    session.tornDown = true;

    const current = this.session === session;
    if (current) {
      this.session = null;
    }

    session.abort.abort();

    // Clear the reference before the connection is released asynchronously
    const client = session.client;
    session.client = null;
    if (client) {
      this.quitInBackground(session.id, client);
    }

    // The exit monitor reaps the process
    const proc = session.process;
    session.process = null;
    proc?.kill();

    this.releaseTransport(session);
    this.logger.log(`[${session.id}] Stopped`);

    if (current) {
      this.setState('stopped', session.id);
    }
    return true;
  }

  private quitInBackground(sessionId: string, client: MpvIpcClient): void {
    const quit = client.quit().catch((error) => {
      this.logger.debug(`[${sessionId}] quit not delivered: ${describeError(error)}`);
    });
    void Promise.race([quit, sleep(this.settings.quitTimeoutMs)]).then(() => client.close());
  }

  private releaseTransport(session: PlaybackSession): void {
    const transport = session.transport;
    if (!transport) {
      return;
    }
    session.transport = null;
    this.releaseAddress(transport);
  }

  private releaseAddress(transport: TransportConfig): void {
    if (!transport.isFileBacked) {
      return;
    }
    try {
      this.host.files.remove(transport.address);
    } catch (error) {
      this.logger.warn(`Could not remove IPC socket ${transport.address}: ${describeError(error)}`);
    }
  }

  private async monitorProgress(session: PlaybackSession): Promise<void> {
    const { signal } = session.abort;

    while (await waitUnlessAborted(this.settings.progressIntervalMs, signal)) {
      const client = session.client;
      if (!client) {
        return;
      }

      let progress: PlaybackProgress;
      try {
        progress = await readProgress(client, session.transportKind);
      } catch (error) {
        if (error instanceof PlayerError && error.code === 'DeadTransport') {
          await this.handleDeadTransport(session, error);
          return;
        }
        // Transient; try again next tick
        continue;
      }

      if (signal.aborted) {
        return;
      }

      this.syncPauseState(session, progress.paused);
      this.emitEvent('progress', progress, session.id);

      if (progress.eof) {
        this.logger.log(`[${session.id}] Playback reached end of file`);
        this.emitEvent('ended', { sessionId: session.id, url: session.url }, session.id);
        return;
      }
    }
  }

  /**
   * The connection is gone. If mpv exits as well the exit monitor reports it;
   * otherwise mpv is alive but unreachable and the session is torn down here.
   */
  private async handleDeadTransport(session: PlaybackSession, error: PlayerError): Promise<void> {
    const proc = session.process;
    const exited = proc
      ? await Promise.race([
          proc.exited.then(() => true),
          sleep(this.settings.progressIntervalMs).then(() => false),
        ])
      : true;

    if (exited || session.tornDown || this.session !== session) {
      return;
    }

    this.logger.warn(`[${session.id}] ${error.message}`);
    this.emitEvent('failed', error, session.id);
    this.teardown(session);
  }

  private async monitorProcess(session: PlaybackSession, proc: ProcessHandle): Promise<void> {
    const exit = await proc.exited;

    if (!session.tornDown && this.session === session && this.state !== 'stopped') {
      const how = exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`;
      this.logger.warn(`[${session.id}] mpv exited unexpectedly (${how})`);
      this.emitEvent('failed', new PlayerError('UnexpectedExit', `mpv process exited unexpectedly (${how})`), session.id);
    }

    this.teardown(session);
  }

  private syncPauseState(session: PlaybackSession, paused: boolean): void {
    if (this.session !== session) {
      return;
    }
    if (paused && this.state === 'playing') {
      this.setState('paused', session.id);
    } else if (!paused && this.state === 'paused') {
      this.setState('playing', session.id);
    }
  }

  private async setPaused(paused: boolean): Promise<void> {
    const session = this.session;
    const client = this.requireClient();
    try {
      await client.setProperty('pause', paused);
    } catch (error) {
      throw new PlayerError('TransportError', `failed to ${paused ? 'pause' : 'resume'}: ${describeError(error)}`, {
        cause: error,
      });
    }
    if (session) {
      this.syncPauseState(session, paused);
    }
  }

  private requireClient(): MpvIpcClient {
    const client = this.session?.client;
    if (!client) {
      throw new PlayerError('NotInitialized', 'player not initialized');
    }
    return client;
  }

  private setState(next: PlaybackState, sessionId: string): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.emitEvent('state', next, sessionId);
  }

  // Listeners get the owning session id as a second argument
  private emitEvent<K extends keyof PlayerEventMap>(event: K, payload: PlayerEventMap[K], sessionId: string): void {
    this.emit(event, payload, sessionId);
  }

  /**
   * Single-slot listener registration; the latest registration wins
   */
  private setSlot<K extends keyof PlayerEventMap>(
    event: K,
    listener: PlayerListener<K>,
  ): Subscription {
    this.slots[event]?.unsubscribe();

    const handler = (payload: PlayerEventMap[K], sessionId: string) => {
      try {
        listener(payload, sessionId);
      } catch (error) {
        this.logger.error(`Listener for ${event} threw: ${describeError(error)}`);
      }
    };
    this.on(event, handler);

    const subscription: Subscription = {
      unsubscribe: () => {
        this.off(event, handler);
        if (this.slots[event] === subscription) {
          delete this.slots[event];
        }
      },
    };
    this.slots[event] = subscription;
    return subscription;
  }
}

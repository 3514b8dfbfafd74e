/**
 * In-process stand-ins for mpv: a JSON IPC server on a Unix socket and a
 * process spawner whose "processes" run that server.
 */

import * as net from 'net';
import { EventEmitter } from 'events';
import { SpawnOptions } from 'child_process';
import { ExecutableLocator, ProcessSpawner, SpawnedProcess } from '../bridges/host';

export type FakePropertyValue = string | number | boolean;

export interface ReceivedCommand {
  command: unknown[];
  requestId: number;
}

export const DEFAULT_FAKE_PROPERTIES: Record<string, FakePropertyValue> = {
  'time-pos': 30,
  duration: 120,
  pause: false,
  'eof-reached': false,
  volume: 80,
  speed: 1,
};

/**
 * Answers mpv JSON IPC requests from a property table
 */
export class FakeMpvServer {
  readonly properties: Record<string, FakePropertyValue>;
  readonly received: ReceivedCommand[] = [];
  /** Properties that answer with an error instead of a value */
  readonly failing = new Set<string>();
  /** When false, requests are read but never answered */
  respond = true;

  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(properties: Record<string, FakePropertyValue> = DEFAULT_FAKE_PROPERTIES) {
    this.properties = { ...properties };
    this.server = net.createServer((socket) => this.accept(socket));
  }

  listen(socketPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(socketPath, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  commandNames(): unknown[] {
    return this.received.map((request) => request.command[0]);
  }

  /** Send an unsolicited event to every client */
  pushEvent(event: string, fields: Record<string, unknown> = {}): void {
    const line = `${JSON.stringify({ event, ...fields })}\n`;
    for (const socket of this.sockets) {
      socket.write(line);
    }
  }

  close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => this.sockets.delete(socket));
    socket.setEncoding('utf8');

    let buffer = '';
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) {
          this.handle(socket, line);
        }
      }
    });
  }

  private handle(socket: net.Socket, line: string): void {
    const message: unknown = JSON.parse(line);
    if (typeof message !== 'object' || message === null || !('command' in message) || !('request_id' in message)) {
      return;
    }
    const { command, request_id: requestId } = message;
    if (!Array.isArray(command) || typeof requestId !== 'number') {
      return;
    }
    this.received.push({ command, requestId });

    if (!this.respond) {
      return;
    }
    socket.write(`${JSON.stringify({ ...this.execute(command), request_id: requestId })}\n`);
  }

  private execute(command: unknown[]): { error: string; data?: unknown } {
    const [name, property, value] = command;

    switch (name) {
      case 'get_property':
        if (typeof property !== 'string' || this.failing.has(property) || !(property in this.properties)) {
          return { error: 'property unavailable' };
        }
        return { error: 'success', data: this.properties[property] };
      case 'set_property':
        if (typeof property !== 'string' || this.failing.has(property)) {
          return { error: 'property unavailable' };
        }
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          this.properties[property] = value;
        }
        return { error: 'success' };
      case 'quit':
        return { error: 'success' };
      default:
        return { error: 'invalid parameter' };
    }
  }
}

/**
 * A spawned fake mpv. It serves IPC on the address from its arguments until
 * it is killed or exits.
 */
export class FakeMpvProcess extends EventEmitter implements SpawnedProcess {
  readonly killSignals: (NodeJS.Signals | undefined)[] = [];
  exited = false;

  constructor(
    readonly pid: number | undefined,
    readonly args: string[],
    readonly server: FakeMpvServer | null,
  ) {
    super();
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.killSignals.push(signal);
    this.exit(null, signal ?? 'SIGTERM');
    return true;
  }

  /** End the process, as if it quit or was killed from outside */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    const closing = this.server ? this.server.close() : Promise.resolve();
    void closing.then(() => this.emit('exit', code, signal));
  }
}

export interface FakeSpawnerOptions {
  /** Serve IPC on the requested address (default true) */
  listen?: boolean;
  /** Simulate a spawn failure: no pid and an 'error' event */
  failWith?: Error;
  properties?: Record<string, FakePropertyValue>;
}

export class FakeMpvSpawner implements ProcessSpawner {
  readonly processes: FakeMpvProcess[] = [];
  readonly commands: string[] = [];
  readonly options: SpawnOptions[] = [];
  private nextPid = 4000;

  constructor(private readonly config: FakeSpawnerOptions = {}) {}

  get last(): FakeMpvProcess | undefined {
    return this.processes[this.processes.length - 1];
  }

  spawn(command: string, args: string[], options: SpawnOptions): SpawnedProcess {
    this.commands.push(command);
    this.options.push(options);

    if (this.config.failWith) {
      const failed = new FakeMpvProcess(undefined, args, null);
      const error = this.config.failWith;
      setImmediate(() => failed.emit('error', error));
      this.processes.push(failed);
      return failed;
    }

    const listen = this.config.listen ?? true;
    const properties = { ...(this.config.properties ?? DEFAULT_FAKE_PROPERTIES), ...propertiesFromArgs(args) };
    const server = listen ? new FakeMpvServer(properties) : null;
    const proc = new FakeMpvProcess(this.nextPid++, args, server);
    this.processes.push(proc);

    const address = ipcAddressOf(args);
    if (server && address) {
      server.listen(address).catch((error: unknown) => {
        proc.emit('error', error instanceof Error ? error : new Error(String(error)));
      });
    }
    return proc;
  }
}

// Command-line options that seed the matching mpv property
const SEEDED_OPTIONS: Record<string, string> = {
  '--volume=': 'volume',
  '--speed=': 'speed',
  '--start=': 'time-pos',
};

function propertiesFromArgs(args: string[]): Record<string, FakePropertyValue> {
  const seeded: Record<string, FakePropertyValue> = {};
  for (const arg of args) {
    for (const [prefix, property] of Object.entries(SEEDED_OPTIONS)) {
      const value = Number(arg.slice(prefix.length));
      if (arg.startsWith(prefix) && Number.isFinite(value)) {
        seeded[property] = value;
      }
    }
  }
  return seeded;
}

export function ipcAddressOf(args: string[]): string | undefined {
  const prefix = '--input-ipc-server=';
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

export class FakeExecutableLocator implements ExecutableLocator {
  readonly lookups: string[] = [];

  constructor(
    private readonly executables: Record<string, string>,
    private readonly versionLine: string | null = 'mpv 0.37.0 Copyright © 2000-2023 mpv/MPlayer/mplayer2 projects',
  ) {}

  locate(name: string): string | null {
    this.lookups.push(name);
    return this.executables[name] ?? null;
  }

  version(): string | null {
    return this.versionLine;
  }
}

/**
 * Poll until the predicate holds
 */
export async function waitUntil(predicate: () => boolean, timeoutMs = 2000, intervalMs = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * mpv JSON IPC client
 * Newline-delimited JSON requests over a Unix socket, named pipe or TCP connection
 */

import * as net from 'net';
import { EventEmitter } from 'events';
import { Logger } from '@nestjs/common';
import { connectOptions, TransportConfig } from './mpv-transport';
import { describeError, PlayerError } from './player-error';

export type MpvArgument = string | number | boolean;

export interface MpvEvent {
  event: string;
  [key: string]: unknown;
}

export interface MpvIpcClientOptions {
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
}

interface PendingRequest {
  command: string;
  resolve: (data: unknown) => void;
  reject: (error: PlayerError) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_REQUEST_TIMEOUT_MS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MpvIpcClient extends EventEmitter {
  private readonly logger = new Logger(MpvIpcClient.name);
  private readonly pending = new Map<number, PendingRequest>();
  private readonly requestTimeoutMs: number;
  private nextRequestId = 1;
  private buffer = '';
  private closed = false;

  private constructor(
    private readonly socket: net.Socket,
    private readonly address: string,
    options: MpvIpcClientOptions,
  ) {
    super();
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (error) => {
      this.logger.debug(`Socket error on ${this.address}: ${error.message}`);
    });
    socket.on('close', () => this.handleClose());
  }

  /**
   * Connect to a ready transport
   */
  static connect(config: TransportConfig, options: MpvIpcClientOptions = {}): Promise<MpvIpcClient> {
    const timeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection(connectOptions(config));

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new PlayerError('ConnectFailed', `connection to ${config.address} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const onError = (error: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new PlayerError('ConnectFailed', `failed to connect to ${config.address}: ${error.message}`, { cause: error }));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(new MpvIpcClient(socket, config.address, options));
      });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send a command and wait for its reply
   */
  request(command: string, ...args: MpvArgument[]): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new PlayerError('TransportError', `${command}: connection to mpv is closed`));
    }

    const requestId = this.nextRequestId++;
    const payload = JSON.stringify({ command: [command, ...args], request_id: requestId });

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new PlayerError('TransportError', `${command}: no reply from mpv after ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);

      this.pending.set(requestId, { command, resolve, reject, timer });

      this.socket.write(`${payload}\n`, (error) => {
        if (error) {
          this.settle(requestId, new PlayerError('TransportError', `${command}: ${error.message}`, { cause: error }));
        }
      });
    });
  }

  getProperty(name: string): Promise<unknown> {
    return this.request('get_property', name);
  }

  async setProperty(name: string, value: MpvArgument): Promise<void> {
    await this.request('set_property', name, value);
  }

  async quit(): Promise<void> {
    await this.request('quit');
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
    this.handleClose();
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }
      let message: unknown;
      try {
        message = JSON.parse(line);
      } catch (error) {
        this.logger.warn(`Failed to parse mpv message: ${describeError(error)}`);
        continue;
      }
      this.handleMessage(message);
    }
  }

  private handleMessage(message: unknown): void {
    if (!isRecord(message)) {
      return;
    }

    if (typeof message.event === 'string') {
      const event: MpvEvent = { ...message, event: message.event };
      this.emit('event', event);
      return;
    }

    const requestId = message.request_id;
    if (typeof requestId !== 'number') {
      return;
    }

    if (message.error === 'success') {
      this.settle(requestId, undefined, message.data);
    } else {
      const reason = typeof message.error === 'string' ? message.error : 'unknown error';
      const command = this.pending.get(requestId)?.command ?? 'request';
      // mpv answered; the connection itself is fine
      this.settle(requestId, new PlayerError('CommandFailed', `${command}: ${reason}`));
    }
  }

  private settle(requestId: number, error?: PlayerError, data?: unknown): void {
    const request = this.pending.get(requestId);
    if (!request) {
      return;
    }
    this.pending.delete(requestId);
    clearTimeout(request.timer);

    if (error) {
      request.reject(error);
    } else {
      request.resolve(data);
    }
  }

  private handleClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const [requestId, request] of this.pending) {
      this.settle(requestId, new PlayerError('TransportError', `${request.command}: connection to mpv lost`));
    }

    this.logger.debug(`Connection to ${this.address} closed`);
    this.emit('close');
  }
}

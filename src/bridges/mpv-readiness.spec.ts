import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { FileProbe } from './host';
import { abortError, createReadinessProbe, DEFAULT_READINESS_TIMINGS, ReadinessTimings, trialConnect, waitForTransport } from './mpv-readiness';
import { TransportConfig } from './mpv-transport';
import { PlayerError } from './player-error';

const fastTimings: ReadinessTimings = {
  initialDelayMs: 5,
  pollIntervalMs: 5,
  trialConnectTimeoutMs: 100,
  socketTimeoutMs: 60,
  socketGraceMs: 5,
  pipeTimeoutMs: 60,
  pipeGraceMs: 5,
  tcpTimeoutMs: 500,
  tcpGraceMs: 5,
};

const socketConfig: TransportConfig = { kind: 'unix-socket', address: '/tmp/mpvsup-mpv-test.sock', isFileBacked: true };

class CountingFileProbe implements FileProbe {
  checks = 0;

  constructor(private readonly readyAfter: number) {}

  exists(): boolean {
    this.checks++;
    return this.checks >= this.readyAfter;
  }

  remove(): void {}
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('createReadinessProbe', () => {
  it('uses per-transport budgets', () => {
    const socket = createReadinessProbe(socketConfig);
    const pipe = createReadinessProbe({ kind: 'named-pipe', address: '\\\\.\\pipe\\x', isFileBacked: false });
    const tcp = createReadinessProbe({ kind: 'tcp', address: '127.0.0.1:1', isFileBacked: false });

    expect([socket.timeoutMs, socket.graceMs]).toEqual([5000, 200]);
    expect([pipe.timeoutMs, pipe.graceMs]).toEqual([10000, 200]);
    expect([tcp.timeoutMs, tcp.graceMs]).toEqual([10000, 300]);
    expect(DEFAULT_READINESS_TIMINGS.initialDelayMs).toBe(300);
  });
});

describe('waitForTransport', () => {
  it('resolves once the socket file appears', async () => {
    const files = new CountingFileProbe(3);

    await waitForTransport(socketConfig, { timings: fastTimings, files });

    expect(files.checks).toBe(3);
  });

  it('times out when the socket never appears', async () => {
    const files = new CountingFileProbe(Number.POSITIVE_INFINITY);

    const error = await captureError(waitForTransport(socketConfig, { timings: fastTimings, files }));

    expect(PlayerError.is(error, 'ReadinessTimeout')).toBe(true);
    expect(error).toHaveProperty('message', 'timeout waiting for IPC at /tmp/mpvsup-mpv-test.sock after 60ms');
  });

  it('stops when the caller cancels', async () => {
    const files = new CountingFileProbe(Number.POSITIVE_INFINITY);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const error = await captureError(
      waitForTransport(socketConfig, { timings: { ...fastTimings, socketTimeoutMs: 5000 }, files, signal: controller.signal }),
    );

    expect(PlayerError.is(error, 'Cancelled')).toBe(true);
    expect(error).toHaveProperty('message', 'cancelled while waiting for IPC at /tmp/mpvsup-mpv-test.sock');
  });

  it('rejects at once for an already aborted signal', async () => {
    const files = new CountingFileProbe(1);
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(waitForTransport(socketConfig, { timings: fastTimings, files, signal: controller.signal }));

    expect(PlayerError.is(error, 'Cancelled')).toBe(true);
    expect(files.checks).toBe(0);
  });

  it('waits for a TCP listener', async () => {
    const server = net.createServer((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    try {
      await expect(
        waitForTransport({ kind: 'tcp', address: `127.0.0.1:${port}`, isFileBacked: false }, { timings: fastTimings }),
      ).resolves.toBeUndefined();
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

describe('trialConnect', () => {
  it('is true when something listens on the socket', async () => {
    const socketPath = path.join(os.tmpdir(), `mpvsup-trial-${process.pid}.sock`);
    const server = net.createServer((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.listen(socketPath, resolve));

    try {
      await expect(trialConnect({ path: socketPath }, 200)).resolves.toBe(true);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it('is false when nothing listens', async () => {
    const socketPath = path.join(os.tmpdir(), `mpvsup-missing-${process.pid}.sock`);

    await expect(trialConnect({ path: socketPath }, 200)).resolves.toBe(false);
  });
});

describe('abortError', () => {
  it('passes player errors through', () => {
    const original = new PlayerError('ConnectFailed', 'boom');

    expect(abortError(original, 'connecting')).toBe(original);
  });

  it('classifies timeouts and cancellations', () => {
    const timeout = abortError(Object.assign(new Error('signal timed out'), { name: 'TimeoutError' }), 'connecting');
    const cancel = abortError(Object.assign(new Error('aborted'), { name: 'AbortError' }), 'connecting');

    expect([timeout.code, timeout.message]).toEqual(['ReadinessTimeout', 'timed out connecting']);
    expect([cancel.code, cancel.message]).toEqual(['Cancelled', 'cancelled while connecting']);
  });
});

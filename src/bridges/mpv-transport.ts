/**
 * IPC transport addresses for mpv sessions
 */

import * as crypto from 'crypto';
import * as path from 'path';
import { NetConnectOpts } from 'net';
import { DEFAULT_WSL_POLICY, Platform, usesWindowsBinary, WslPolicy } from './mpv-platform';
import { PlayerError } from './player-error';

export type TransportKind = 'unix-socket' | 'named-pipe' | 'tcp';

export interface TransportConfig {
  kind: TransportKind;
  address: string;
  /** True when the address is a filesystem entry that must be removed on release */
  isFileBacked: boolean;
}

export interface AddressOptions {
  appName: string;
  tmpdir: string;
  wslPolicy?: WslPolicy;
  randomBytes?: (size: number) => Buffer;
}

const SUFFIX_BYTES = 8;

/**
 * Generate a fresh transport config for one session
 */
export function generateAddress(platform: Platform, options: AddressOptions): TransportConfig {
  const suffix = randomSuffix(options.randomBytes ?? crypto.randomBytes);
  const name = `${options.appName}-mpv-${suffix}`;

  if (usesWindowsBinary(platform, options.wslPolicy ?? DEFAULT_WSL_POLICY)) {
    return {
      kind: 'named-pipe',
      address: `\\\\.\\pipe\\${name}`,
      isFileBacked: false,
    };
  }

  return {
    kind: 'unix-socket',
    address: path.join(options.tmpdir, `${name}.sock`),
    isFileBacked: true,
  };
}

function randomSuffix(randomBytes: (size: number) => Buffer): string {
  try {
    return randomBytes(SUFFIX_BYTES).toString('hex');
  } catch (error) {
    throw new PlayerError('AddressGenerationFailed', 'failed to generate IPC address', { cause: error });
  }
}

/**
 * The mpv command-line argument that opens the IPC server
 */
export function ipcArgument(config: TransportConfig): string {
  return `--input-ipc-server=${config.address}`;
}

/**
 * Socket options for connecting to a transport
 */
export function connectOptions(config: TransportConfig): NetConnectOpts {
  if (config.kind !== 'tcp') {
    return { path: config.address };
  }

  const separator = config.address.lastIndexOf(':');
  const host = separator > 0 ? config.address.slice(0, separator) : '127.0.0.1';
  const port = Number(config.address.slice(separator + 1));
  return { host: host.replace(/^\[|\]$/g, ''), port };
}

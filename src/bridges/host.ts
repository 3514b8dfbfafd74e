/**
 * Host collaborators for the mpv bridge
 * Everything the bridge needs from the operating system goes through these
 * interfaces so tests can swap in fakes (filesystem, search path, spawner).
 */

import { spawn, execSync, SpawnOptions } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';

/**
 * Operating system facts the platform resolver and address generator read
 */
export interface HostEnvironment {
  readonly platform: NodeJS.Platform;
  tmpdir(): string;
  /** Contents of the kernel identification file, or null when unreadable */
  readKernelVersion(): string | null;
}

export interface FileProbe {
  exists(filePath: string): boolean;
  /** Removes a file; a missing file is not an error */
  remove(filePath: string): void;
}

export interface ExecutableLocator {
  /** Full path of an executable on the search path, or null */
  locate(name: string): string | null;
  /** First line of `<executable> --version`, or null */
  version(executablePath: string): string | null;
}

/**
 * The slice of ChildProcess the launcher relies on
 */
export interface SpawnedProcess {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface ProcessSpawner {
  spawn(command: string, args: string[], options: SpawnOptions): SpawnedProcess;
}

export const nodeHostEnvironment: HostEnvironment = {
  platform: process.platform,
  tmpdir: () => os.tmpdir(),
  readKernelVersion: () => {
    try {
      return fs.readFileSync('/proc/version', 'utf8');
    } catch {
      return null;
    }
  },
};

export const nodeFileProbe: FileProbe = {
  exists: (filePath) => fs.existsSync(filePath),
  remove: (filePath) => {
    fs.rmSync(filePath, { force: true });
  },
};

export const nodeExecutableLocator: ExecutableLocator = {
  locate: (name) => {
    const checkCommand = process.platform === 'win32' ? 'where' : 'which';
    try {
      const output = execSync(`${checkCommand} ${name}`, {
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
        windowsHide: true,
      });
      const first = output.split(/\r?\n/).find((line) => line.trim().length > 0);
      return first ? first.trim() : null;
    } catch {
      return null;
    }
  },
  version: (executablePath) => {
    try {
      const output = execSync(`"${executablePath}" --version`, {
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
        timeout: 5000,
        windowsHide: true,
      });
      const first = output.split(/\r?\n/)[0]?.trim();
      return first ? first : null;
    } catch {
      return null;
    }
  },
};

export const nodeProcessSpawner: ProcessSpawner = {
  spawn: (command, args, options) => spawn(command, args, options),
};

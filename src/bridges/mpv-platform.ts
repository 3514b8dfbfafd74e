/**
 * Platform resolution for the mpv binary
 * Central source of truth for which executable and IPC transport a host uses
 */

import { ExecutableLocator, HostEnvironment } from './host';
import { PlayerError } from './player-error';

export type Platform = 'linux' | 'macos' | 'windows' | 'wsl';

/**
 * Which mpv a WSL host drives.
 * 'linux-binary' runs the Linux mpv over a Unix socket; named pipes created by
 * mpv.exe are not reachable from inside WSL without extra translation.
 * 'windows-binary' runs mpv.exe over a named pipe.
 */
export type WslPolicy = 'linux-binary' | 'windows-binary';

export const DEFAULT_WSL_POLICY: WslPolicy = 'linux-binary';

/**
 * Detect the platform from the host environment
 */
export function resolvePlatform(host: HostEnvironment): Platform {
  switch (host.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return isWslKernel(host.readKernelVersion()) ? 'wsl' : 'linux';
    default:
      return 'linux';
  }
}

/**
 * Check a kernel identification string for WSL vendor markers
 */
export function isWslKernel(kernelVersion: string | null): boolean {
  if (!kernelVersion) {
    return false;
  }
  const version = kernelVersion.toLowerCase();
  return version.includes('microsoft') || version.includes('wsl');
}

/**
 * True when the platform runs the Windows build of mpv
 */
export function usesWindowsBinary(platform: Platform, wslPolicy: WslPolicy = DEFAULT_WSL_POLICY): boolean {
  return platform === 'windows' || (platform === 'wsl' && wslPolicy === 'windows-binary');
}

/**
 * Get the mpv executable name for a platform
 */
export function executableName(platform: Platform, wslPolicy: WslPolicy = DEFAULT_WSL_POLICY): string {
  return usesWindowsBinary(platform, wslPolicy) ? 'mpv.exe' : 'mpv';
}

/**
 * Find the mpv executable on the search path
 */
export function findExecutable(
  platform: Platform,
  locator: ExecutableLocator,
  wslPolicy: WslPolicy = DEFAULT_WSL_POLICY,
): string {
  const name = executableName(platform, wslPolicy);
  const found = locator.locate(name);
  if (found) {
    return found;
  }

  if (platform === 'wsl' && wslPolicy === 'windows-binary') {
    throw new PlayerError(
      'ExecutableNotFound',
      `${name} not found in PATH. Please install mpv on Windows and ensure it's in your Windows PATH`,
    );
  }
  if (platform === 'wsl') {
    throw new PlayerError(
      'ExecutableNotFound',
      `${name} not found in PATH. Please install the Linux mpv package inside WSL`,
    );
  }
  throw new PlayerError('ExecutableNotFound', `${name} not found in PATH. Please install mpv`);
}

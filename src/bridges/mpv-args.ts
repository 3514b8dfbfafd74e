/**
 * mpv command-line construction
 */

import { PlayOptions } from './player.types';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Headers with a dedicated mpv option
const DEDICATED_HEADERS = new Set(['user-agent', 'referer']);

export interface MpvArgFlags {
  ipcArgument: string;
  loadUserConfig: boolean;
  debug: boolean;
}

/**
 * Build the argument vector for one playback. The URL is always last.
 */
export function buildMpvArgs(url: string, opts: PlayOptions, flags: MpvArgFlags): string[] {
  const args = [
    flags.ipcArgument,
    '--idle=yes', // keep mpv alive after playback ends
    '--no-ytdl', // streams arrive already resolved
  ];

  if (!flags.loadUserConfig) {
    args.push('--no-config');
  }

  if (!flags.debug) {
    args.push('--msg-level=all=warn');
  }

  if (opts.startTime !== undefined && opts.startTime > 0) {
    args.push(`--start=${formatNumber(opts.startTime)}`);
  }

  if (opts.volume !== undefined) {
    args.push(`--volume=${Math.round(Math.min(100, Math.max(0, opts.volume)))}`);
  }

  if (opts.speed !== undefined && opts.speed > 0) {
    args.push(`--speed=${formatNumber(opts.speed)}`);
  }

  if (opts.fullscreen) {
    args.push('--fullscreen');
  }

  if (opts.subtitleUrl) {
    args.push(`--sub-file=${opts.subtitleUrl}`);
  }

  if (opts.subtitleLang) {
    args.push(`--slang=${opts.subtitleLang}`);
  }

  if (opts.subtitleDelay !== undefined && opts.subtitleDelay !== 0) {
    args.push(`--sub-delay=${formatNumber(opts.subtitleDelay)}`);
  }

  if (opts.audioTrack !== undefined && opts.audioTrack > 0) {
    args.push(`--aid=${opts.audioTrack}`);
  }

  args.push(`--user-agent=${opts.userAgent || DEFAULT_USER_AGENT}`);

  if (opts.referer) {
    args.push(`--referrer=${opts.referer}`);
  }

  const headerFields = Object.entries(opts.headers ?? {})
    .filter(([key]) => !DEDICATED_HEADERS.has(key.toLowerCase()))
    .map(([key, value]) => `${key}: ${value}`);
  if (headerFields.length > 0) {
    args.push(`--http-header-fields=${headerFields.join(',')}`);
  }

  if (opts.title) {
    args.push(`--force-media-title=${opts.title}`);
  }

  if (opts.mpvArgs) {
    args.push(...opts.mpvArgs);
  }

  args.push(url);
  return args;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}

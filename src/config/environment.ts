import { WslPolicy } from '../bridges/mpv-platform';

export interface PlayerConfig {
  appName: string;
  debug: boolean;
  loadUserConfig: boolean;
  wslPolicy: WslPolicy;
  initTimeoutMs: number;
  progressIntervalMs: number;
}

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

const parsePositiveInteger = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const parseWslPolicy = (value: string | undefined): WslPolicy =>
  value === 'windows-binary' ? 'windows-binary' : 'linux-binary';

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env) {
  return {
    production: env.NODE_ENV === 'production',
    port: parsePositiveInteger(env.PORT, 3000),
    apiPrefix: 'api',

    cors: {
      origins: true, // Accept all origins
      methods: ['GET', 'POST', 'OPTIONS'],
    },

    socket: {
      path: '/socket.io',
      credentials: true,
    },

    player: {
      appName: env.MPV_APP_NAME?.trim() || 'mpvsup',
      debug: parseBoolean(env.MPV_DEBUG, false),
      loadUserConfig: parseBoolean(env.MPV_LOAD_USER_CONFIG, false),
      wslPolicy: parseWslPolicy(env.MPV_WSL_POLICY),
      initTimeoutMs: parsePositiveInteger(env.MPV_INIT_TIMEOUT_MS, 15000),
      progressIntervalMs: parsePositiveInteger(env.MPV_PROGRESS_INTERVAL_MS, 1000),
    } satisfies PlayerConfig,
  };
}

export type Environment = ReturnType<typeof loadEnvironment>;

export const environment: Environment = loadEnvironment();

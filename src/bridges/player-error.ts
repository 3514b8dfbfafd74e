/**
 * Error taxonomy for the mpv bridge
 */

export type PlayerErrorCode =
  | 'ExecutableNotFound'
  | 'AddressGenerationFailed'
  | 'SpawnFailed'
  | 'ReadinessTimeout'
  | 'ConnectFailed'
  | 'TransportError'
  | 'CommandFailed'
  | 'DeadTransport'
  | 'NotInitialized'
  | 'UnexpectedExit'
  | 'Cancelled';

export class PlayerError extends Error {
  readonly code: PlayerErrorCode;

  constructor(code: PlayerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlayerError';
    this.code = code;
  }

  static is(error: unknown, code?: PlayerErrorCode): error is PlayerError {
    return error instanceof PlayerError && (code === undefined || error.code === code);
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { HttpException, HttpStatus } from '@nestjs/common';
import { describeError, PlayerError, PlayerErrorCode } from '../bridges';

const STATUS_BY_CODE: Partial<Record<PlayerErrorCode, HttpStatus>> = {
  NotInitialized: HttpStatus.CONFLICT,
  ExecutableNotFound: HttpStatus.SERVICE_UNAVAILABLE,
  TransportError: HttpStatus.BAD_GATEWAY,
  CommandFailed: HttpStatus.BAD_GATEWAY,
  DeadTransport: HttpStatus.BAD_GATEWAY,
};

/**
 * Translate a player failure into the HTTP error a controller throws
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof PlayerError) {
    const status = STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
    return new HttpException({ success: false, code: error.code, message: error.message }, status);
  }
  return new HttpException({ success: false, message: describeError(error) }, HttpStatus.INTERNAL_SERVER_ERROR);
}

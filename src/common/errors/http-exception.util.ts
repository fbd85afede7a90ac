import {
  BadGatewayException,
  HttpException,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ServiceNotConfiguredError, UpstreamServiceError } from './service.errors';

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Maps anything thrown below a controller onto the HTTP error the client
 * sees. Exceptions that already carry a status pass through untouched.
 */
export function toHttpException(error: unknown, fallbackMessage: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof ServiceNotConfiguredError) {
    return new ServiceUnavailableException(error.message);
  }
  if (error instanceof UpstreamServiceError) {
    return new BadGatewayException(error.message);
  }
  const message = error instanceof Error && error.message ? error.message : fallbackMessage;
  return new HttpException(message, HttpStatus.INTERNAL_SERVER_ERROR);
}

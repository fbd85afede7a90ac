import { LogLevel } from '@nestjs/common';
import { Env, readInt, readList, readString } from './env.util';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  port: number;
  /** Empty list means any origin is allowed. */
  corsOrigins: string[];
  jsonBodyLimit: string;
  maxTranscriptChars: number;
  maxUploadBytes: number;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 8000),
    corsOrigins: readList(env, 'CORS_ORIGINS'),
    jsonBodyLimit: readString(env, 'JSON_BODY_LIMIT', '2mb'),
    maxTranscriptChars: readInt(env, 'MAX_TRANSCRIPT_CHARS', 200_000),
    maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', 1024 * 1024),
  };
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expands LOG_LEVEL into the list Nest expects, e.g. `log` enables
 * error, warn and log. Unknown values fall back to `debug`.
 */
export function resolveLogLevels(env: Env = process.env): LogLevel[] {
  const requested = readString(env, 'LOG_LEVEL', 'debug').toLowerCase();
  const index = LOG_LEVELS.findIndex((level) => level === requested);
  return LOG_LEVELS.slice(0, (index === -1 ? LOG_LEVELS.indexOf('debug') : index) + 1);
}

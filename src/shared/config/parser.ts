import { DEFAULT_REGION } from '../constants/aws';
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_WORKERS,
  ENV,
  LOG_LEVELS,
} from '../constants/upload';
import { ConfigValidationError } from '../errors/configValidation';
import type { LogLevel, RawUploadConfig, UploadConfig } from '../types/config';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseFlag(value: boolean | string): boolean {
  return String(value).toUpperCase() === 'TRUE';
}

function parseWorkers(value: number | string | undefined): number {
  if (value === undefined) {
    return DEFAULT_WORKERS;
  }
  const workers = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigValidationError(
      `Invalid worker count: ${value}. Expected a positive integer`,
    );
  }
  return workers;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Maps environment variables onto a raw configuration.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): RawUploadConfig {
  return {
    bucket: env[ENV.bucket],
    region: env[ENV.region],
    endpoint: env[ENV.endpoint],
    forcePathStyle: env[ENV.forcePathStyle],
    accessKeyId: env[ENV.accessKeyId],
    secretAccessKey: env[ENV.secretAccessKey],
    sessionToken: env[ENV.sessionToken],
    workers: env[ENV.workers],
    logLevel: env[ENV.logLevel],
    logPretty: env[ENV.logPretty],
  };
}

/**
 * Overlays `overrides` onto `base`, ignoring undefined values so that an
 * unset CLI flag leaves the environment value in place.
 */
export function mergeRawConfig(
  base: RawUploadConfig,
  overrides: RawUploadConfig,
): RawUploadConfig {
  const merged: RawUploadConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/**
 * Validates and normalizes the raw configuration.
 * @throws {ConfigValidationError} If a value is missing or malformed.
 */
export function parseUploadConfig(raw: RawUploadConfig): UploadConfig {
  const bucket = nonEmpty(raw.bucket);
  if (!bucket) {
    throw new ConfigValidationError(
      `Missing bucket name. Set ${ENV.bucket} or pass --bucket`,
    );
  }

  const accessKeyId = nonEmpty(raw.accessKeyId);
  const secretAccessKey = nonEmpty(raw.secretAccessKey);
  if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
    throw new ConfigValidationError(
      `${ENV.accessKeyId} and ${ENV.secretAccessKey} must be set together`,
    );
  }

  const logLevel = nonEmpty(raw.logLevel)?.toLowerCase() ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(logLevel)) {
    throw new ConfigValidationError(
      `Invalid log level: ${raw.logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }

  const endpoint = nonEmpty(raw.endpoint);

  return {
    bucket,
    region: nonEmpty(raw.region) ?? DEFAULT_REGION,
    endpoint,
    forcePathStyle:
      raw.forcePathStyle === undefined
        ? endpoint !== undefined
        : parseFlag(raw.forcePathStyle),
    accessKeyId,
    secretAccessKey,
    sessionToken: nonEmpty(raw.sessionToken),
    workers: parseWorkers(raw.workers),
    includeRoot: raw.includeRoot ?? false,
    exclude: raw.exclude ?? [],
    logLevel,
    logPretty: raw.logPretty === undefined ? true : parseFlag(raw.logPretty),
  };
}

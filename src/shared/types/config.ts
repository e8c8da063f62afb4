import type { LOG_LEVELS } from '../constants/upload';

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Unvalidated configuration as read from the environment and CLI flags.
 */
export interface RawUploadConfig {
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean | string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  workers?: number | string;
  includeRoot?: boolean;
  exclude?: string[];
  logLevel?: string;
  logPretty?: boolean | string;
}

export interface UploadConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  workers: number;
  includeRoot: boolean;
  exclude: string[];
  logLevel: LogLevel;
  logPretty: boolean;
}

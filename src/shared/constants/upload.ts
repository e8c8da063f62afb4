export const DEFAULT_WORKERS = 10;
export const DEFAULT_DESTINATION = '/';
export const IGNORED_FILE_NAMES = new Set(['.DS_Store']);
export const HIDDEN_FILE_PREFIX = '.';
export const INDEX_DOCUMENT = 'index.html';
export const NO_CACHE = 'no-cache';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const DEFAULT_LOG_LEVEL = 'info';

export const ENV = {
  bucket: 'S3_UPLOAD_BUCKET',
  region: 'S3_UPLOAD_REGION',
  endpoint: 'S3_UPLOAD_ENDPOINT',
  forcePathStyle: 'S3_UPLOAD_FORCE_PATH_STYLE',
  accessKeyId: 'S3_UPLOAD_ACCESS_KEY_ID',
  secretAccessKey: 'S3_UPLOAD_SECRET_ACCESS_KEY',
  sessionToken: 'S3_UPLOAD_SESSION_TOKEN',
  workers: 'S3_UPLOAD_WORKERS',
  logLevel: 'S3_UPLOAD_LOG_LEVEL',
  logPretty: 'S3_UPLOAD_LOG_PRETTY',
} as const;

export * from './config/parser';
export * from './constants/aws';
export * from './constants/content-types';
export * from './constants/upload';
export * from './errors';
export * from './logging/logger';
export * from './types/config';
export * from './types/logging';
export * from './types/s3';
export * from './types/upload';
export * from './utils/file-filter';
export * from './utils/files';
export * from './utils/key-mapper';
export * from './utils/metadata';
export * from './utils/path';

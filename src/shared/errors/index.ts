export * from './bucketUpload';
export * from './configValidation';
export * from './excludedSingleFile';
export * from './sourceNotFound';
export * from './transfer';
export * from './unsupportedPathType';

export * from './client';
export * from './upload';

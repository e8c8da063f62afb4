import { BucketUploadError } from './bucketUpload';

export class UnsupportedPathTypeError extends BucketUploadError {
  constructor(public readonly sourcePath: string) {
    super(`Source is neither a regular file nor a directory: ${sourcePath}`);
    this.name = 'UnsupportedPathTypeError';
  }
}

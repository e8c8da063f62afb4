import { BucketUploadError } from './bucketUpload';

export class SourceNotFoundError extends BucketUploadError {
  constructor(public readonly sourcePath: string) {
    super(`Source path does not exist: ${sourcePath}`);
    this.name = 'SourceNotFoundError';
  }
}

import { BucketUploadError } from './bucketUpload';

export class ExcludedSingleFileError extends BucketUploadError {
  constructor(public readonly sourcePath: string) {
    super(`Excluded file, nothing uploaded: ${sourcePath}`);
    this.name = 'ExcludedSingleFileError';
  }
}

import { BucketUploadError } from './bucketUpload';

export class ConfigValidationError extends BucketUploadError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

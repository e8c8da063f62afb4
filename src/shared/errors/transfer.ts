import { BucketUploadError, toErrorMessage } from './bucketUpload';

/**
 * A single file failed to upload. Recovered per task: the scheduler tallies
 * it and carries on with the remaining files.
 */
export class TransferError extends BucketUploadError {
  public readonly reason: string;

  constructor(
    public readonly localPath: string,
    public readonly key: string,
    cause: unknown,
  ) {
    const reason = toErrorMessage(cause);
    super(`Failed to upload ${localPath} to ${key}: ${reason}`, { cause });
    this.name = 'TransferError';
    this.reason = reason;
  }
}

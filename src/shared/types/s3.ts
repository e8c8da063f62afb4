import type { Metadata } from './upload';

/**
 * Transfers one local file to one remote key.
 * Implementations reject with a `TransferError` when the transfer fails.
 */
export interface StorageClient {
  uploadFile(localPath: string, key: string, metadata: Metadata): Promise<void>;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

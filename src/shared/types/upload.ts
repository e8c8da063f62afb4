import type { StorageClass } from '@aws-sdk/client-s3';
import type { TransferError } from '../errors/transfer';

/**
 * Whether the source directory's own name appears as a key segment.
 * `whole-tree` behaves like `cp -r src dst`, `contents-only` like `cp -r src/* dst`.
 */
export type UploadMode = 'whole-tree' | 'contents-only';

export type FileClassification = 'exclude' | 'warn' | 'include';

export interface Metadata {
  contentType?: string;
  cacheControl?: string;
  storageClass: StorageClass;
}

export interface UploadTask {
  readonly localPath: string;
  readonly remoteKey: string;
  readonly metadata: Metadata;
}

export interface TransferTally {
  uploaded: number;
  failed: number;
}

export type TaskOutcome =
  | { ok: true; task: UploadTask }
  | { ok: false; task: UploadTask; error: TransferError };

export interface UploadReport {
  success: boolean;
  tally: TransferTally;
  elapsedMs: number;
}

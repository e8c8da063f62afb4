import fs from 'node:fs';
import { PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import { type StorageClient, TransferError } from '@shared';

export interface S3StorageClientOptions {
  s3Client: S3Client;
  bucket: string;
}

/**
 * Storage client that sends each file as a single PutObject request.
 */
export function createS3StorageClient(
  options: S3StorageClientOptions,
): StorageClient {
  const { s3Client, bucket } = options;

  return {
    async uploadFile(localPath, key, metadata) {
      let handle: fs.promises.FileHandle | undefined;
      let body: fs.ReadStream | undefined;
      try {
        handle = await fs.promises.open(localPath);
        const { size } = await handle.stat();
        body = handle.createReadStream();

        await s3Client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentLength: size,
            ContentType: metadata.contentType,
            CacheControl: metadata.cacheControl,
            StorageClass: metadata.storageClass,
          }),
        );
      } catch (error) {
        throw new TransferError(localPath, key, error);
      } finally {
        body?.destroy();
        await handle?.close();
      }
    },
  };
}

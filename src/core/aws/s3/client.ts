import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { getAwsOptions } from '@core/aws/iam';
import type { UploadConfig } from '@shared';

export type CreateS3ClientOptions = Pick<
  UploadConfig,
  | 'region'
  | 'endpoint'
  | 'forcePathStyle'
  | 'accessKeyId'
  | 'secretAccessKey'
  | 'sessionToken'
>;

/**
 * Creates an S3 client for the configured region, credentials and endpoint.
 */
export function createS3Client(options: CreateS3ClientOptions): S3Client {
  const awsOptions = getAwsOptions(options);

  const config: S3ClientConfig = {
    region: awsOptions.region,
    credentials: awsOptions.credentials,
  };

  if (options.endpoint) {
    config.endpoint = options.endpoint;
  }
  if (options.forcePathStyle) {
    config.forcePathStyle = true;
  }

  return new S3Client(config);
}

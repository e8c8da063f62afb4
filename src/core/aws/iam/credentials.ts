import type { AwsCredentials, UploadConfig } from '@shared';

export interface AwsClientOptions {
  region: string;
  credentials?: AwsCredentials;
}

/**
 * Resolves region and credentials for the S3 client. Without a static key
 * pair the credentials are left to the SDK's default provider chain.
 */
export function getAwsOptions(
  config: Pick<
    UploadConfig,
    'region' | 'accessKeyId' | 'secretAccessKey' | 'sessionToken'
  >,
): AwsClientOptions {
  if (
    typeof config.accessKeyId !== 'undefined' &&
    typeof config.secretAccessKey !== 'undefined'
  ) {
    const credentials: AwsCredentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    };
    if (config.sessionToken) {
      credentials.sessionToken = config.sessionToken;
    }
    return { region: config.region, credentials };
  }

  return { region: config.region };
}

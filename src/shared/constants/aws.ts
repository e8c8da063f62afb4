import { StorageClass } from '@aws-sdk/client-s3';

export const DEFAULT_REGION = 'us-west-2';
export const DEFAULT_STORAGE_CLASS = StorageClass.STANDARD;

export * from './aws/iam';
export * from './aws/s3';
export * from './tally';
export * from './upload-scheduler';

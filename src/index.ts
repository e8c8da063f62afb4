import { createS3Client, createS3StorageClient, UploadScheduler } from '@core';
import {
  ConfigValidationError,
  createLogger,
  DEFAULT_DESTINATION,
  DEFAULT_LOG_LEVEL,
  type Logger,
  mergeRawConfig,
  parseUploadConfig,
  readEnvConfig,
  toS3Path,
  type UploadConfig,
} from '@shared';
import { Command, CommanderError } from 'commander';

interface CliOptions {
  includeRoot?: boolean;
  workers?: string;
  bucket?: string;
  region?: string;
  endpoint?: string;
  exclude?: string[];
  verbose?: boolean;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  /**
   * Replaces the pino logger, mostly for tests.
   */
  log?: Logger;
}

function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
): UploadConfig {
  return parseUploadConfig(
    mergeRawConfig(readEnvConfig(env), {
      bucket: options.bucket,
      region: options.region,
      endpoint: options.endpoint,
      workers: options.workers,
      includeRoot: options.includeRoot,
      exclude: options.exclude,
      logLevel: options.verbose ? 'debug' : undefined,
    }),
  );
}

async function uploadCommand(
  source: string,
  destination: string,
  options: CliOptions,
  deps: CliDependencies,
): Promise<number> {
  const env = deps.env ?? process.env;

  let config: UploadConfig;
  try {
    config = resolveConfig(options, env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      const log =
        deps.log ?? createLogger({ level: DEFAULT_LOG_LEVEL, pretty: true });
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  const log =
    deps.log ??
    createLogger({ level: config.logLevel, pretty: config.logPretty });
  const mode = config.includeRoot ? 'whole-tree' : 'contents-only';

  log.notice(`Source: ${source}`);
  log.notice(`Destination: s3://${config.bucket}/${toS3Path(destination)}`);
  log.notice(`Mode: ${mode}`);
  log.notice(`Workers: ${config.workers}`);

  const s3Client = createS3Client(config);
  try {
    const scheduler = new UploadScheduler({
      storage: createS3StorageClient({ s3Client, bucket: config.bucket }),
      log,
      workers: config.workers,
      exclude: config.exclude,
    });

    const report = await scheduler.upload({ source, destination, mode });
    if (report.success) {
      log.success('Upload complete');
      return 0;
    }
    log.error('Upload failed');
    return 1;
  } finally {
    s3Client.destroy();
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function createProgram(
  deps: CliDependencies = {},
  onExit: (code: number) => void = () => {},
): Command {
  return new Command()
    .name('bucket-upload')
    .description('Upload a local file or directory tree to an S3 bucket')
    .argument('<source-path>', 'local file or directory to upload')
    .argument(
      '[destination-path]',
      'destination prefix in the bucket; a file target not ending in "/" is the full key',
      DEFAULT_DESTINATION,
    )
    .option(
      '--include-root',
      'keep the source directory name in the keys (like cp -r src dst)',
    )
    .option('--workers <count>', 'maximum concurrent uploads (default: 10)')
    .option('--bucket <name>', 'target bucket')
    .option('--region <region>', 'bucket region')
    .option('--endpoint <url>', 'custom S3 endpoint')
    .option(
      '--exclude <glob>',
      'additional files to leave out (repeatable)',
      collect,
    )
    .option('--verbose', 'log debug output')
    .action(
      async (source: string, destination: string, options: CliOptions) => {
        onExit(await uploadCommand(source, destination, options, deps));
      },
    );
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function run(
  argv: string[],
  deps: CliDependencies = {},
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  }).exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

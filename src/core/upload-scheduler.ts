import fs from 'node:fs';
import path from 'node:path';
import {
  createFileFilter,
  DEFAULT_WORKERS,
  ExcludedSingleFileError,
  type FileFilter,
  getLocalFiles,
  type Logger,
  mapDirectoryFileKey,
  mapSingleFileKey,
  resolveMetadata,
  SourceNotFoundError,
  type StorageClient,
  type TaskOutcome,
  TransferError,
  type TransferTally,
  toErrorMessage,
  UnsupportedPathTypeError,
  type UploadMode,
  type UploadReport,
  type UploadTask,
} from '@shared';
import pLimit from 'p-limit';
import { createTally, recordOutcome } from './tally';

export interface UploadSchedulerOptions {
  storage: StorageClient;
  log: Logger;
  /**
   * Upper bound on concurrent uploads for directory sources.
   */
  workers?: number;
  /**
   * Extra exclusion globs on top of `.DS_Store`.
   */
  exclude?: readonly string[];
}

export interface UploadRequest {
  source: string;
  destination: string;
  mode: UploadMode;
}

export interface BuildUploadTasksOptions {
  sourceRoot: string;
  prefix: string;
  mode: UploadMode;
  filter: FileFilter;
  log?: Logger;
}

export interface UploadPlan {
  tasks: UploadTask[];
  excluded: string[];
  warned: string[];
}

export function createTask(localPath: string, remoteKey: string): UploadTask {
  return { localPath, remoteKey, metadata: resolveMetadata(localPath) };
}

/**
 * Walks `sourceRoot` and turns every file the filter lets through into a
 * task. Task order is walk order; it says nothing about completion order.
 */
export async function buildUploadTasks(
  options: BuildUploadTasksOptions,
): Promise<UploadPlan> {
  const { sourceRoot, prefix, mode, filter, log } = options;
  const plan: UploadPlan = { tasks: [], excluded: [], warned: [] };

  for await (const localPath of getLocalFiles(sourceRoot, log)) {
    const classification = filter(path.relative(sourceRoot, localPath));

    if (classification === 'exclude') {
      plan.excluded.push(localPath);
      continue;
    }
    if (classification === 'warn') {
      plan.warned.push(localPath);
    }

    plan.tasks.push(
      createTask(
        localPath,
        mapDirectoryFileKey(localPath, { sourceRoot, prefix, mode }),
      ),
    );
  }

  return plan;
}

async function statSource(source: string): Promise<fs.Stats> {
  try {
    return await fs.promises.stat(source);
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    ) {
      throw new SourceNotFoundError(source);
    }
    throw error;
  }
}

/**
 * Uploads a file or directory tree through a `StorageClient`.
 *
 * A single file, or a directory holding one eligible file, is uploaded
 * inline. Larger trees go through a pool of at most `workers` concurrent
 * uploads. A failed upload is counted and logged without stopping the
 * others; the run succeeds only when nothing failed.
 */
export class UploadScheduler {
  private readonly workers: number;
  private readonly filter: FileFilter;

  constructor(private readonly options: UploadSchedulerOptions) {
    this.workers = options.workers ?? DEFAULT_WORKERS;
    this.filter = createFileFilter(options.exclude);
  }

  async upload(request: UploadRequest): Promise<UploadReport> {
    const startedAt = performance.now();
    const tally = createTally();

    let success: boolean;
    try {
      success = await this.dispatch(request, tally);
    } catch (error) {
      this.options.log.error(toErrorMessage(error));
      success = false;
    }

    const elapsedMs = performance.now() - startedAt;
    this.options.log.notice(
      `Total elapsed: ${(elapsedMs / 1000).toFixed(2)}s`,
    );

    return { success, tally, elapsedMs };
  }

  private async dispatch(
    request: UploadRequest,
    tally: TransferTally,
  ): Promise<boolean> {
    const stats = await statSource(request.source);

    if (stats.isFile()) {
      return this.uploadSingleFile(request, tally);
    }
    if (stats.isDirectory()) {
      return this.uploadDirectory(request, tally);
    }
    throw new UnsupportedPathTypeError(request.source);
  }

  private async uploadSingleFile(
    request: UploadRequest,
    tally: TransferTally,
  ): Promise<boolean> {
    const { log } = this.options;

    const classification = this.filter(path.basename(request.source));
    if (classification === 'exclude') {
      throw new ExcludedSingleFileError(request.source);
    }
    if (classification === 'warn') {
      log.warning(
        `Uploading a file whose name starts with ".": ${request.source}`,
      );
      log.warning(
        'Such files are usually hidden; make sure it should be uploaded',
      );
    }

    const task = createTask(
      request.source,
      mapSingleFileKey(request.source, request.destination),
    );
    log.notice(`Uploading file: ${request.source} -> ${task.remoteKey}`);

    return this.runInline(task, tally);
  }

  private async uploadDirectory(
    request: UploadRequest,
    tally: TransferTally,
  ): Promise<boolean> {
    const { log } = this.options;

    log.notice(
      `Uploading directory: ${request.source} -> ${request.destination} (${request.mode})`,
    );

    const { tasks, excluded, warned } = await buildUploadTasks({
      sourceRoot: request.source,
      prefix: request.destination,
      mode: request.mode,
      filter: this.filter,
      log,
    });

    if (excluded.length > 0) {
      for (const file of excluded) {
        log.verbose(`Excluded: ${file}`);
      }
      log.notice(`Excluded ${excluded.length} file(s)`);
    }

    if (warned.length > 0) {
      log.warning(
        `Found ${warned.length} file(s) whose name starts with ".":`,
      );
      for (const file of warned) {
        log.warning(`  ${file}`);
      }
      log.warning(
        'Such files are usually hidden; make sure they should be uploaded',
      );
    }

    log.notice(`Found ${tasks.length} file(s) to upload`);

    const [first] = tasks;
    if (!first) {
      log.notice('Nothing to upload');
      return true;
    }
    if (tasks.length === 1) {
      return this.runInline(first, tally);
    }
    return this.runPool(tasks, tally);
  }

  private async runInline(
    task: UploadTask,
    tally: TransferTally,
  ): Promise<boolean> {
    const outcome = await this.runTask(task);
    this.record(tally, outcome);
    return outcome.ok;
  }

  private async runPool(
    tasks: UploadTask[],
    tally: TransferTally,
  ): Promise<boolean> {
    const { log } = this.options;
    log.notice(`Uploading concurrently with up to ${this.workers} workers`);

    const limit = pLimit(this.workers);
    await Promise.all(
      tasks.map((task) =>
        limit(async () => {
          this.record(tally, await this.runTask(task));
        }),
      ),
    );

    log.notice(
      `Concurrent upload finished: ${tally.uploaded} uploaded, ${tally.failed} failed`,
    );
    return tally.failed === 0;
  }

  /**
   * Never rejects: a failed upload becomes a failed outcome.
   */
  private async runTask(task: UploadTask): Promise<TaskOutcome> {
    try {
      await this.options.storage.uploadFile(
        task.localPath,
        task.remoteKey,
        task.metadata,
      );
      return { ok: true, task };
    } catch (error) {
      return {
        ok: false,
        task,
        error:
          error instanceof TransferError
            ? error
            : new TransferError(task.localPath, task.remoteKey, error),
      };
    }
  }

  private record(tally: TransferTally, outcome: TaskOutcome): void {
    const count = recordOutcome(tally, outcome);
    const name = path.basename(outcome.task.localPath);

    if (outcome.ok) {
      this.options.log.success(
        `Uploaded (${count}): ${name} -> ${outcome.task.remoteKey}`,
      );
    } else {
      this.options.log.error(
        `Failed (${count}): ${name} -> ${outcome.task.remoteKey} (${outcome.error.reason})`,
      );
    }
  }
}

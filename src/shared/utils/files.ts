import fs from 'node:fs';
import path from 'node:path';
import { toErrorMessage } from '../errors/bucketUpload';
import type { ErrorLogger } from '../types/logging';

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

/**
 * Lists all regular files in a directory recursively using an async generator.
 * Entries are visited in name order. Links to files are yielded under the
 * link's own path; links to directories are not followed.
 *
 * A failure to read `dir` itself rejects. Subdirectories that cannot be read
 * are logged and skipped.
 */
export async function* getLocalFiles(
  dir: string,
  log?: ErrorLogger,
): AsyncGenerator<string> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  yield* walkEntries(dir, entries, log);
}

async function* walkEntries(
  dir: string,
  entries: fs.Dirent[],
  log?: ErrorLogger,
): AsyncGenerator<string> {
  for (const entry of entries.sort(byName)) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      if (await isLinkToFile(fullPath, log)) {
        yield fullPath;
      }
    } else if (entry.isDirectory()) {
      yield* walkSubdirectory(fullPath, log);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

async function* walkSubdirectory(
  dir: string,
  log?: ErrorLogger,
): AsyncGenerator<string> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    log?.error(
      `Skipping unreadable directory ${dir}: ${toErrorMessage(error)}`,
    );
    return;
  }
  yield* walkEntries(dir, entries, log);
}

async function isLinkToFile(
  linkPath: string,
  log?: ErrorLogger,
): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(linkPath);
    if (stats.isDirectory()) {
      log?.warning(`Not following directory link: ${linkPath}`);
    }
    return stats.isFile();
  } catch (error) {
    log?.warning(`Ignoring broken link ${linkPath}: ${toErrorMessage(error)}`);
    return false;
  }
}

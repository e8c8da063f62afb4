import path from 'node:path';
import type { UploadMode } from '../types/upload';
import { toS3Path } from './path';

export interface DirectoryKeyOptions {
  sourceRoot: string;
  prefix: string;
  mode: UploadMode;
}

/**
 * Maps a single uploaded file to its key.
 *
 * An empty prefix or one ending in `/` is a directory: the file keeps its
 * name under it. Any other prefix is the full target key, like renaming
 * with `cp file dst`, taken as given apart from its leading slashes.
 */
export function mapSingleFileKey(localPath: string, prefix: string): string {
  const normalizedPrefix = prefix.replace(/\\/g, '/');
  if (normalizedPrefix === '' || normalizedPrefix.endsWith('/')) {
    return toS3Path(`${normalizedPrefix}/${path.basename(localPath)}`);
  }
  return normalizedPrefix.replace(/^\/+/, '');
}

/**
 * Maps a file found under `sourceRoot` to its key. In `whole-tree` mode the
 * path is taken relative to the root's parent, so the root's own name is
 * kept as the first segment under the prefix.
 */
export function mapDirectoryFileKey(
  localPath: string,
  options: DirectoryKeyOptions,
): string {
  const root = path.resolve(options.sourceRoot);
  const base = options.mode === 'whole-tree' ? path.dirname(root) : root;
  const relativePath = path.relative(base, path.resolve(localPath));
  return toS3Path(`${options.prefix}/${relativePath}`);
}

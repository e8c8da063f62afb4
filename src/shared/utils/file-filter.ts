import path from 'node:path';
import { Minimatch } from 'minimatch';
import { HIDDEN_FILE_PREFIX, IGNORED_FILE_NAMES } from '../constants/upload';
import type { FileClassification } from '../types/upload';
import { toS3Path } from './path';

export type FileFilter = (relativePath: string) => FileClassification;

/**
 * Builds a classifier for paths relative to the upload source.
 *
 * `.DS_Store` and anything matching one of `extraExcludes` is excluded.
 * Other dotfiles are uploaded but flagged. Globs without a slash match the
 * file name at any depth.
 */
export function createFileFilter(
  extraExcludes: readonly string[] = [],
): FileFilter {
  const matchers = extraExcludes.map(
    (pattern) => new Minimatch(pattern, { dot: true, matchBase: true }),
  );

  return (relativePath) => {
    const normalized = toS3Path(relativePath);
    const name = path.posix.basename(normalized);

    if (IGNORED_FILE_NAMES.has(name)) return 'exclude';
    if (matchers.some((matcher) => matcher.match(normalized))) return 'exclude';
    if (name.startsWith(HIDDEN_FILE_PREFIX)) return 'warn';
    return 'include';
  };
}

export function classifyFile(
  relativePath: string,
  extraExcludes?: readonly string[],
): FileClassification {
  return createFileFilter(extraExcludes)(relativePath);
}

import path from 'node:path';
import { Mime } from 'mime';
import { DEFAULT_STORAGE_CLASS } from '../constants/aws';
import { CONTENT_TYPES } from '../constants/content-types';
import { INDEX_DOCUMENT, NO_CACHE } from '../constants/upload';
import type { Metadata } from '../types/upload';

const contentTypes = new Mime(CONTENT_TYPES);

/**
 * Derives the object metadata sent with a file. The extension lookup
 * ignores case; dotfiles such as `.html` have no extension.
 */
export function resolveMetadata(localPath: string): Metadata {
  const name = path.basename(localPath);
  const extension = path.extname(name).slice(1).toLowerCase();
  const metadata: Metadata = { storageClass: DEFAULT_STORAGE_CLASS };

  const contentType = extension ? contentTypes.getType(extension) : null;
  if (contentType) {
    metadata.contentType = contentType;
  }

  if (name === INDEX_DOCUMENT) {
    metadata.cacheControl = NO_CACHE;
  }

  return metadata;
}

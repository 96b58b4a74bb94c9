/**
 * Attachment file layout under the staging directory.
 */

import { join } from 'node:path';

const UNSAFE_CHARS = /[^A-Za-z0-9._-]+/g;

/**
 * Filename reduced to a portable character set; never empty.
 */
export function safeFilename(filename: string): string {
  const cleaned = filename.replace(UNSAFE_CHARS, '_').replace(/^[._]+/, '');
  return cleaned.slice(0, 120) || 'attachment';
}

export function attachmentPath(root: string, runId: string, attachmentId: string, filename: string): string {
  return join(root, runId, `${safeFilename(attachmentId)}-${safeFilename(filename)}`);
}


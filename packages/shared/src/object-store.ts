/**
 * Object Store
 *
 * Filesystem-backed storage for the documents submitted with a run.
 * Keys are relative to the store root: runs/<run_id>/<position>_<filename>
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from './config';
import { logger } from './logger';
import type { InputDocument, StoredDocumentRef } from './types';

export interface ObjectStore {
  putDocument(runId: string, position: number, document: InputDocument): Promise<StoredDocumentRef>;
  getDocument(ref: StoredDocumentRef): Promise<InputDocument>;
  deleteRun(runId: string): Promise<void>;
}

/** Keep only characters that are safe in a file name on every platform */
export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const safe = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return safe || 'document';
}

export function documentKey(runId: string, position: number, filename: string): string {
  const prefix = String(position).padStart(4, '0');
  return path.posix.join('runs', runId, `${prefix}_${sanitizeFilename(filename)}`);
}

export class FileObjectStore implements ObjectStore {
  constructor(private readonly root: string = config.objectStorePath) {}

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.root, key);
    const root = path.resolve(this.root);
    if (!resolved.startsWith(root + path.sep)) {
      throw new Error(`Object key escapes the store root: ${key}`);
    }
    return resolved;
  }

  async putDocument(
    runId: string,
    position: number,
    document: InputDocument
  ): Promise<StoredDocumentRef> {
    const key = documentKey(runId, position, document.filename);
    const filePath = this.resolveKey(key);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, document.bytes);

    logger.debug('Stored document', { key, size_bytes: document.bytes.byteLength });
    return { key, filename: document.filename };
  }

  async getDocument(ref: StoredDocumentRef): Promise<InputDocument> {
    const bytes = await fs.readFile(this.resolveKey(ref.key));
    return { filename: ref.filename, bytes: new Uint8Array(bytes) };
  }

  async deleteRun(runId: string): Promise<void> {
    await fs.rm(this.resolveKey(path.posix.join('runs', runId)), { recursive: true, force: true });
  }
}

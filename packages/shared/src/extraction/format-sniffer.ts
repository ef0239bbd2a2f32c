/**
 * Format Sniffing
 *
 * The payroll system exports plain-text statements with a .pdf extension,
 * so the format is decided from the leading bytes only.
 */

import { SniffError } from '../errors';
import { logger } from '../logger';
import type { DocumentClassification } from '../types';

/** "%PDF-" */
export const PDF_MAGIC = Uint8Array.from([0x25, 0x50, 0x44, 0x46, 0x2d]);

export interface SniffResult {
  classification: DocumentClassification;
  content: Uint8Array;
}

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

function readable(input: unknown): Uint8Array {
  if (input instanceof Uint8Array) return input;
  if (input instanceof ArrayBuffer) return new Uint8Array(input);
  throw new SniffError(`Expected bytes, received ${input === null ? 'null' : typeof input}`);
}

/**
 * Classify raw input as a real PDF or a plain-text payload.
 * Never throws: unreadable input is treated as empty plain text.
 */
export function classify(input: Uint8Array | ArrayBuffer | null | undefined): SniffResult {
  let bytes: Uint8Array;
  try {
    bytes = readable(input);
  } catch (error) {
    logger.warn('Unreadable input, treating as empty plain text', {
      error: error instanceof Error ? error.message : String(error),
    });
    return { classification: 'plain_text', content: new Uint8Array(0) };
  }

  if (startsWith(bytes, PDF_MAGIC)) {
    return { classification: 'real_document', content: bytes };
  }

  return { classification: 'plain_text', content: bytes };
}

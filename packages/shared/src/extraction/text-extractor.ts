/**
 * Text Extraction
 *
 * Turns sniffed bytes into a flat text representation. Real PDFs go through
 * the layout strategy first and the stream strategy second; plain-text
 * payloads are decoded directly.
 */

import { ExtractionError } from '../errors';
import { logger } from '../logger';
import type { DocumentClassification, ExtractionMethod } from '../types';
import { pdfjsLayoutStrategy, pdfParseStreamStrategy, type TextStrategy } from './pdf-text';

export interface ExtractedText {
  text: string;
  method: ExtractionMethod;
}

export interface TextExtractorOptions {
  primary?: TextStrategy;
  fallback?: TextStrategy;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });
// WHATWG maps "latin1" to windows-1252, the legacy encoding of the exports
const windows1252 = new TextDecoder('latin1');

/**
 * Decode a plain-text payload. Falls back to windows-1252 when the bytes
 * are not valid UTF-8. A UTF-8 byte order mark is dropped.
 */
export function decodePlainText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return windows1252.decode(bytes);
  }
}

export class TextExtractor {
  private readonly primary: TextStrategy;
  private readonly fallback: TextStrategy;

  constructor(options: TextExtractorOptions = {}) {
    this.primary = options.primary ?? pdfjsLayoutStrategy;
    this.fallback = options.fallback ?? pdfParseStreamStrategy;
  }

  async extract(
    bytes: Uint8Array,
    classification: DocumentClassification,
    documentName: string = 'document'
  ): Promise<ExtractedText> {
    if (classification === 'plain_text') {
      const text = decodePlainText(bytes);
      logger.debug('Decoded plain-text payload', { chars: text.length });
      return { text, method: 'plain_text' };
    }

    const attempts: Array<{ strategy: string; reason: string }> = [];
    let lastError: unknown;

    for (const strategy of [this.primary, this.fallback]) {
      try {
        const text = await strategy.extract(bytes);
        if (text.trim().length > 0) {
          logger.info('PDF text extracted', {
            method: strategy.method,
            chars: text.length,
            fallback: strategy !== this.primary,
          });
          return { text, method: strategy.method };
        }
        attempts.push({ strategy: strategy.method, reason: 'no text content' });
      } catch (error) {
        lastError = error;
        attempts.push({
          strategy: strategy.method,
          reason: error instanceof Error ? error.message : String(error),
        });
        logger.warn('PDF text strategy failed', {
          method: strategy.method,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    throw new ExtractionError(documentName, attempts, { cause: lastError });
  }
}

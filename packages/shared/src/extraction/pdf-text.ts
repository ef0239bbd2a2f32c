/**
 * PDF Text Strategies
 *
 * Two ways to turn a real PDF into text. The layout strategy uses pdfjs-dist
 * and rebuilds table rows from item coordinates; the stream strategy uses
 * pdf-parse and keeps whatever order the content stream has.
 */

import { logger } from '../logger';
import type { ExtractionMethod } from '../types';

export interface TextStrategy {
  readonly method: ExtractionMethod;
  extract(bytes: Uint8Array): Promise<string>;
}

interface PositionedText {
  x: number;
  str: string;
}

type PdfParse = (data: Buffer) => Promise<{ text?: string; numpages?: number }>;

async function loadPdfjs() {
  const pdfjsLib = await import('pdfjs-dist');
  if (!pdfjsLib.GlobalWorkerOptions.workerSrc) {
    pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');
  }
  return pdfjsLib;
}

/**
 * Extract text from a PDF, preserving line structure.
 *
 * Groups text items by Y position so that each printed row of the
 * statement (label followed by its amount) ends up on one line.
 */
export const pdfjsLayoutStrategy: TextStrategy = {
  method: 'pdfjs_layout',

  async extract(bytes: Uint8Array): Promise<string> {
    const pdfjsLib = await loadPdfjs();
    // pdfjs refuses Buffer instances and may transfer the array it is given
    const data = new Uint8Array(bytes);
    const loadingTask = pdfjsLib.getDocument({
      data,
      isEvalSupported: false,
      useSystemFonts: true,
    });

    try {
      const pdf = await loadingTask.promise;
      const pageTexts: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();

        const itemsByY = new Map<number, PositionedText[]>();

        for (const item of textContent.items) {
          if (!('str' in item) || item.str.trim() === '') continue;

          // Text on the same visual line may have slight Y variations
          const y = Math.round(item.transform[5]);
          const x = Math.round(item.transform[4]);

          const line = itemsByY.get(y);
          if (line) {
            line.push({ x, str: item.str });
          } else {
            itemsByY.set(y, [{ x, str: item.str }]);
          }
        }

        // Top to bottom on the page
        const sortedY = [...itemsByY.keys()].sort((a, b) => b - a);

        const lines: string[] = [];
        for (const y of sortedY) {
          const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
          const lineText = lineItems.map((item) => item.str).join(' ').trim();
          if (lineText) {
            lines.push(lineText);
          }
        }

        if (lines.length > 0) {
          pageTexts.push(lines.join('\n'));
        }
        page.cleanup();
      }

      const text = pageTexts.join('\n');

      logger.debug('pdfjs layout extraction complete', {
        totalPages: pdf.numPages,
        totalChars: text.length,
      });

      return text;
    } finally {
      await loadingTask.destroy();
    }
  },
};

export const pdfParseStreamStrategy: TextStrategy = {
  method: 'pdf_parse',

  async extract(bytes: Uint8Array): Promise<string> {
    // The package entry point runs a self-test when loaded without a parent
    // module, so the library file is required directly.
    const pdfParse: PdfParse = require('pdf-parse/lib/pdf-parse.js');

    const data = await pdfParse(Buffer.from(bytes));
    const text = (data.text || '').replace(/\u0000/g, '');

    logger.debug('pdf-parse extraction complete', {
      totalPages: data.numpages,
      totalChars: text.length,
    });

    return text;
  },
};

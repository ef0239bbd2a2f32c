/**
 * Format Sniffing and Text Extraction Tests
 */

import {
  classify,
  decodePlainText,
  ExtractionError,
  TextExtractor,
  type TextStrategy,
} from '@payroll-consolidator/shared';

function bytesOf(text: string, encoding: BufferEncoding = 'utf8'): Uint8Array {
  return new Uint8Array(Buffer.from(text, encoding));
}

function strategy(
  method: TextStrategy['method'],
  impl: (bytes: Uint8Array) => Promise<string>
): TextStrategy & { extract: jest.Mock<Promise<string>, [Uint8Array]> } {
  return { method, extract: jest.fn(impl) };
}

describe('FormatSniffer', () => {
  it('should classify bytes starting with %PDF- as a real document', () => {
    const bytes = bytesOf('%PDF-1.4\n%âãÏÓ\n1 0 obj');
    const result = classify(bytes);

    expect(result.classification).toBe('real_document');
    expect(result.content).toBe(bytes);
  });

  it('should classify text as plain text regardless of a .pdf name', () => {
    const result = classify(bytesOf('Id. Hr: 1\nApellido y Nombre: PEREZ JUAN'));

    expect(result.classification).toBe('plain_text');
    expect(Buffer.from(result.content).toString('utf8')).toBe('Id. Hr: 1\nApellido y Nombre: PEREZ JUAN');
  });

  it('should require the full signature', () => {
    expect(classify(bytesOf('%PDF')).classification).toBe('plain_text');
    expect(classify(bytesOf(' %PDF-1.4')).classification).toBe('plain_text');
  });

  it('should accept an ArrayBuffer', () => {
    const buffer = new ArrayBuffer(5);
    new Uint8Array(buffer).set([0x25, 0x50, 0x44, 0x46, 0x2d]);

    expect(classify(buffer).classification).toBe('real_document');
  });

  it('should treat empty and unreadable input as empty plain text', () => {
    for (const input of [new Uint8Array(0), null, undefined]) {
      const result = classify(input);
      expect(result.classification).toBe('plain_text');
      expect(result.content.length).toBe(0);
    }
  });
});

describe('Plain-text decoding', () => {
  it('should decode UTF-8 and drop the byte order mark', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...bytesOf('MUÑOZ ANA')]);

    expect(decodePlainText(bytes)).toBe('MUÑOZ ANA');
  });

  it('should fall back to windows-1252 for legacy exports', () => {
    expect(decodePlainText(bytesOf('MUÑOZ ANA', 'latin1'))).toBe('MUÑOZ ANA');
  });
});

describe('TextExtractor', () => {
  it('should decode plain text without touching the PDF strategies', async () => {
    const primary = strategy('pdfjs_layout', async () => 'never');
    const fallback = strategy('pdf_parse', async () => 'never');
    const extractor = new TextExtractor({ primary, fallback });

    const result = await extractor.extract(bytesOf('Liq. Pesos: 10,00'), 'plain_text');

    expect(result).toEqual({ text: 'Liq. Pesos: 10,00', method: 'plain_text' });
    expect(primary.extract).not.toHaveBeenCalled();
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it('should use the layout strategy when it yields text', async () => {
    const primary = strategy('pdfjs_layout', async () => 'Apellido y Nombre: GOMEZ RAUL');
    const fallback = strategy('pdf_parse', async () => 'stream text');
    const extractor = new TextExtractor({ primary, fallback });

    const result = await extractor.extract(bytesOf('%PDF-1.7'), 'real_document');

    expect(result).toEqual({ text: 'Apellido y Nombre: GOMEZ RAUL', method: 'pdfjs_layout' });
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it('should fall back when the layout strategy throws', async () => {
    const primary = strategy('pdfjs_layout', async () => {
      throw new Error('Invalid XRef stream');
    });
    const fallback = strategy('pdf_parse', async () => 'stream text');
    const extractor = new TextExtractor({ primary, fallback });

    const result = await extractor.extract(bytesOf('%PDF-1.7'), 'real_document');

    expect(result).toEqual({ text: 'stream text', method: 'pdf_parse' });
    expect(primary.extract).toHaveBeenCalledTimes(1);
  });

  it('should fall back when the layout strategy yields only whitespace', async () => {
    const primary = strategy('pdfjs_layout', async () => '  \n\t ');
    const fallback = strategy('pdf_parse', async () => 'stream text');
    const extractor = new TextExtractor({ primary, fallback });

    const result = await extractor.extract(bytesOf('%PDF-1.7'), 'real_document');

    expect(result.method).toBe('pdf_parse');
  });

  it('should raise ExtractionError carrying both causes when every strategy fails', async () => {
    const cause = new Error('bad trailer');
    const primary = strategy('pdfjs_layout', async () => {
      throw new Error('Invalid XRef stream');
    });
    const fallback = strategy('pdf_parse', async () => {
      throw cause;
    });
    const extractor = new TextExtractor({ primary, fallback });

    const error = await extractor
      .extract(bytesOf('%PDF-1.7'), 'real_document', 'roto.pdf')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    if (!(error instanceof ExtractionError)) return;
    expect(error.code).toBe('extraction_error');
    expect(error.document).toBe('roto.pdf');
    expect(error.attempts).toEqual([
      { strategy: 'pdfjs_layout', reason: 'Invalid XRef stream' },
      { strategy: 'pdf_parse', reason: 'bad trailer' },
    ]);
    expect(error.message).toBe(
      'Could not extract text from roto.pdf (pdfjs_layout: Invalid XRef stream; pdf_parse: bad trailer)'
    );
    expect(error.cause).toBe(cause);
  });

  it('should report blank output from both strategies as no text content', async () => {
    const extractor = new TextExtractor({
      primary: strategy('pdfjs_layout', async () => ''),
      fallback: strategy('pdf_parse', async () => ' '),
    });

    await expect(extractor.extract(bytesOf('%PDF-1.7'), 'real_document', 'vacio.pdf')).rejects.toThrow(
      'Could not extract text from vacio.pdf (pdfjs_layout: no text content; pdf_parse: no text content)'
    );
  });
});

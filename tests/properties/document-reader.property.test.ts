// @vitest-environment node
/**
 * Property-Based Tests for the Document Reader
 *
 * Property: For every supported media type, the extracted text equals the
 * document's ordered text segments joined by a newline. Anything else is
 * rejected without touching a parser.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fc from 'fast-check';

const { extractRawText, getDocument } = vi.hoisted(() => ({
  extractRawText: vi.fn(),
  getDocument: vi.fn(),
}));

vi.mock('mammoth', () => ({
  default: { extractRawText },
}));

vi.mock('pdfjs-dist', () => ({
  getDocument,
  GlobalWorkerOptions: { workerSrc: '' },
  version: '3.11.174',
}));

import {
  extractText,
  inferMediaType,
  joinRawParagraphs,
  readDocument,
  resolveDocumentKind,
  MAX_FILE_SIZE,
} from '../../src/services/documentReader';
import {
  DecodeError,
  FileTooLargeError,
  ParseError,
  UnsupportedTypeError,
} from '../../src/services/errors';
import { MEDIA_TYPES, type SourceDocument } from '../../src/types';

/**
 * Copy bytes into a standalone ArrayBuffer
 */
const bytesOf = (data: string | number[]): ArrayBuffer => {
  const view = typeof data === 'string' ? new TextEncoder().encode(data) : Uint8Array.from(data);
  const copy = new ArrayBuffer(view.byteLength);
  new Uint8Array(copy).set(view);
  return copy;
};

const doc = (mediaType: string, bytes: ArrayBuffer, name = 'upload'): SourceDocument => ({
  name,
  mediaType,
  bytes,
});

/**
 * Fake pdf.js loading task; each page is a list of text lines
 */
const fakePdf = (pages: string[][]) => ({
  promise: Promise.resolve({
    numPages: pages.length,
    getPage: async (pageNumber: number) => ({
      getTextContent: async () => ({
        items: pages[pageNumber - 1].map((str, index, lines) => ({
          str,
          hasEOL: index < lines.length - 1,
        })),
      }),
    }),
  }),
  destroy: vi.fn(async () => undefined),
});

const failingPdf = (error: Error) => ({
  promise: Promise.reject(error),
  destroy: vi.fn(async () => undefined),
});

// Text segments without line breaks, so the join is unambiguous
const segmentArbitrary = fc.string({ maxLength: 40 }).filter((s) => !s.includes('\n'));
const lineArbitrary = fc.string({ minLength: 1, maxLength: 40 }).filter((s) => !s.includes('\n'));

const supportedMediaTypes: string[] = Object.values(MEDIA_TYPES);

const unsupportedMediaTypeArbitrary = fc
  .oneof(
    fc.constantFrom('image/png', 'application/msword', 'text/html', 'application/json', ''),
    fc.string({ maxLength: 30 })
  )
  .filter((s) => !supportedMediaTypes.includes(s.trim().toLowerCase()));

describe('Document Reader Property Tests', () => {
  beforeEach(() => {
    extractRawText.mockReset();
    getDocument.mockReset();
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('decodes any UTF-8 text verbatim', async () => {
    await fc.assert(
      fc.asyncProperty(fc.fullUnicodeString({ maxLength: 200 }), async (text) => {
        const result = await readDocument(doc(MEDIA_TYPES.text, bytesOf(text)));
        expect(result).toBe(text);
      }),
      { numRuns: 100 }
    );
  });

  it('reads "hello\\nworld" from a plain text upload', async () => {
    const result = await readDocument(doc('text/plain', bytesOf('hello\nworld')));
    expect(result).toBe('hello\nworld');
  });

  it('keeps a leading byte order mark', async () => {
    const result = await readDocument(doc(MEDIA_TYPES.text, bytesOf([0xef, 0xbb, 0xbf, 0x68, 0x69])));
    expect(result).toBe('\uFEFFhi');
  });

  it('rejects invalid UTF-8 with a DecodeError', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.integer({ min: 0, max: 0x7f }), { maxLength: 20 }),
        fc.array(fc.integer({ min: 0, max: 0x7f }), { maxLength: 20 }),
        async (before, after) => {
          // 0xFF never appears in well-formed UTF-8
          const bytes = bytesOf([...before, 0xff, ...after]);
          await expect(readDocument(doc(MEDIA_TYPES.text, bytes))).rejects.toBeInstanceOf(DecodeError);
        }
      ),
      { numRuns: 50 }
    );
  });

  it('joins DOCX paragraphs with a single newline in document order', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(segmentArbitrary, { maxLength: 10 }), async (paragraphs) => {
        extractRawText.mockResolvedValueOnce({
          value: paragraphs.map((p) => `${p}\n\n`).join(''),
          messages: [],
        });

        const result = await readDocument(doc(MEDIA_TYPES.docx, bytesOf('PK')));
        expect(result).toBe(paragraphs.join('\n'));
      }),
      { numRuns: 100 }
    );
  });

  it('collapses mammoth paragraph breaks', () => {
    expect(joinRawParagraphs('First\n\nSecond\n\n')).toBe('First\nSecond');
    expect(joinRawParagraphs('Only')).toBe('Only');
    expect(joinRawParagraphs('')).toBe('');
  });

  it('wraps a malformed DOCX container in a ParseError', async () => {
    extractRawText.mockRejectedValueOnce(new Error("Can't find end of central directory"));

    const error = await readDocument(doc(MEDIA_TYPES.docx, bytesOf('not a zip'))).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toHaveProperty('message', "Malformed DOCX container: Can't find end of central directory");
  });

  it('joins PDF pages with a newline in page order', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.array(lineArbitrary, { minLength: 1, maxLength: 4 }), { minLength: 1, maxLength: 5 }),
        async (pages) => {
          getDocument.mockReturnValueOnce(fakePdf(pages));

          const result = await readDocument(doc(MEDIA_TYPES.pdf, bytesOf('%PDF-1.7')));
          expect(result).toBe(pages.map((lines) => lines.join('\n')).join('\n'));
        }
      ),
      { numRuns: 100 }
    );
  });

  it('passes pdf.js a copy of the upload and leaves the original untouched', async () => {
    const bytes = bytesOf('%PDF-1.4 body');
    const before = Array.from(new Uint8Array(bytes));
    getDocument.mockReturnValueOnce(fakePdf([['Page one']]));

    await readDocument(doc(MEDIA_TYPES.pdf, bytes));

    const [{ data }] = getDocument.mock.calls[0];
    expect(data).toBeInstanceOf(Uint8Array);
    expect(data.buffer).not.toBe(bytes);
    expect(Array.from(new Uint8Array(bytes))).toEqual(before);
  });

  it('reports an encrypted PDF as a ParseError', async () => {
    const passwordError = Object.assign(new Error('No password given'), { name: 'PasswordException' });
    getDocument.mockImplementationOnce(() => failingPdf(passwordError));

    const error = await readDocument(doc(MEDIA_TYPES.pdf, bytesOf('%PDF'))).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toHaveProperty('message', 'PDF is encrypted');
  });

  it('reports a malformed PDF as a ParseError', async () => {
    getDocument.mockImplementationOnce(() => failingPdf(new Error('Invalid PDF structure.')));

    const error = await readDocument(doc(MEDIA_TYPES.pdf, bytesOf('garbage'))).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toHaveProperty('message', 'Malformed PDF: Invalid PDF structure.');
  });

  it('rejects any unsupported media type without invoking a parser', async () => {
    await fc.assert(
      fc.asyncProperty(unsupportedMediaTypeArbitrary, async (mediaType) => {
        await expect(readDocument(doc(mediaType, bytesOf('data')))).rejects.toBeInstanceOf(UnsupportedTypeError);
      }),
      { numRuns: 100 }
    );
    expect(extractRawText).not.toHaveBeenCalled();
    expect(getDocument).not.toHaveBeenCalled();
  });

  it('resolves media types case-insensitively', () => {
    expect(resolveDocumentKind('Application/PDF')).toBe('pdf');
    expect(resolveDocumentKind(' text/plain ')).toBe('text');
    expect(resolveDocumentKind(MEDIA_TYPES.docx)).toBe('docx');
  });

  it('infers the media type from the extension when the browser reports none', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(['.txt', MEDIA_TYPES.text], ['.docx', MEDIA_TYPES.docx], ['.pdf', MEDIA_TYPES.pdf]),
        fc.stringMatching(/^[a-z0-9_-]{1,12}$/),
        fc.boolean(),
        fc.constantFrom('', 'application/octet-stream', ' Application/Octet-Stream '),
        ([extension, expected], base, upper, declared) => {
          const name = `${base}${upper ? extension.toUpperCase() : extension}`;
          expect(inferMediaType(name, declared)).toBe(expected);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('keeps a declared media type and leaves unknown extensions unresolved', () => {
    expect(inferMediaType('photo.txt', 'image/png')).toBe('image/png');
    expect(inferMediaType('notes.txt', MEDIA_TYPES.text)).toBe(MEDIA_TYPES.text);
    expect(inferMediaType('archive.zip', '')).toBe('');
    expect(inferMediaType('README', 'application/octet-stream')).toBe('application/octet-stream');
  });

  it('refuses files over the size limit before parsing', async () => {
    const error = await readDocument(doc(MEDIA_TYPES.pdf, new ArrayBuffer(MAX_FILE_SIZE + 1))).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FileTooLargeError);
    expect(getDocument).not.toHaveBeenCalled();
  });

  it('extractText returns empty text alongside the failure', async () => {
    const extraction = await extractText(doc(MEDIA_TYPES.text, bytesOf([0xc3, 0x28])));

    expect(extraction.ok).toBe(false);
    expect(extraction.text).toBe('');
    if (!extraction.ok) {
      expect(extraction.error).toBeInstanceOf(DecodeError);
    }
  });

  it('extractText reports the kind on success', async () => {
    const extraction = await extractText(doc(MEDIA_TYPES.text, bytesOf('sunset')));
    expect(extraction).toEqual({ ok: true, kind: 'text', text: 'sunset' });
  });
});

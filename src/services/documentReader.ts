/**
 * Document Reader - Extracts plain text from uploaded .txt, .docx and .pdf files
 *
 * Segments (paragraphs or pages) are joined with a single newline in source order.
 */

import mammoth from 'mammoth';
import { DOCUMENT_KINDS, MEDIA_TYPES, type DocumentKind, type Extraction, type SourceDocument } from '../types';
import {
  DecodeError,
  FileTooLargeError,
  ParseError,
  UnsupportedTypeError,
  errorMessage,
} from './errors';

export const MAX_FILE_SIZE = 50 * 1024 * 1024; // 50MB

export const ACCEPTED_EXTENSIONS = ['.txt', '.docx', '.pdf'];

const KIND_BY_EXTENSION = new Map<string, DocumentKind>([
  ['.txt', 'text'],
  ['.docx', 'docx'],
  ['.pdf', 'pdf'],
]);

/** Types browsers report when the OS has no registration for the extension */
const GENERIC_MEDIA_TYPES = new Set(['', 'application/octet-stream']);

const KIND_BY_MEDIA_TYPE = new Map<string, DocumentKind>(
  DOCUMENT_KINDS.map(kind => [MEDIA_TYPES[kind], kind])
);

/**
 * Map a declared media type onto a supported document kind
 */
export function resolveDocumentKind(mediaType: string): DocumentKind {
  const kind = KIND_BY_MEDIA_TYPE.get(mediaType.trim().toLowerCase());
  if (!kind) {
    throw new UnsupportedTypeError(mediaType);
  }
  return kind;
}

/**
 * Media type of an upload, falling back to the file extension when the
 * browser reported nothing useful. Any other declared type is kept as is.
 */
export function inferMediaType(fileName: string, declaredType: string): string {
  if (!GENERIC_MEDIA_TYPES.has(declaredType.trim().toLowerCase())) {
    return declaredType;
  }
  const dot = fileName.lastIndexOf('.');
  const kind = dot >= 0 ? KIND_BY_EXTENSION.get(fileName.slice(dot).toLowerCase()) : undefined;
  return kind ? MEDIA_TYPES[kind] : declaredType;
}

/**
 * Strict UTF-8 decode. The byte order mark is kept so the text is verbatim.
 */
export function readTextDocument(bytes: ArrayBuffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new DecodeError(`Invalid UTF-8 byte sequence: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * mammoth terminates every paragraph with a blank line; collapse that to
 * one newline between paragraphs.
 */
export function joinRawParagraphs(rawText: string): string {
  const body = rawText.endsWith('\n\n') ? rawText.slice(0, -2) : rawText;
  return body.split('\n\n').join('\n');
}

export async function readDocxDocument(bytes: ArrayBuffer): Promise<string> {
  let rawText: string;
  try {
    const result = await mammoth.extractRawText({ arrayBuffer: bytes.slice(0) });
    rawText = result.value;
  } catch (error) {
    throw new ParseError(`Malformed DOCX container: ${errorMessage(error)}`, { cause: error });
  }
  return joinRawParagraphs(rawText);
}

const isPasswordError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'PasswordException';

export async function readPdfDocument(bytes: ArrayBuffer): Promise<string> {
  // Loaded on demand
  const pdfjsLib = await import('pdfjs-dist');
  if (typeof window !== 'undefined' && !pdfjsLib.GlobalWorkerOptions.workerSrc) {
    pdfjsLib.GlobalWorkerOptions.workerSrc = `//cdnjs.cloudflare.com/ajax/libs/pdf.js/${pdfjsLib.version}/pdf.worker.min.js`;
  }

  // pdf.js transfers the buffer to its worker, so hand it a copy
  const loadingTask = pdfjsLib.getDocument({ data: new Uint8Array(bytes.slice(0)) });

  try {
    const pdfDoc = await loadingTask.promise;
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
      const page = await pdfDoc.getPage(pageNumber);
      const content = await page.getTextContent();
      const pageText = content.items
        .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
        .join('');
      pages.push(pageText.replace(/\n+$/, ''));
    }
    return pages.join('\n');
  } catch (error) {
    if (isPasswordError(error)) {
      throw new ParseError('PDF is encrypted', { cause: error });
    }
    throw new ParseError(`Malformed PDF: ${errorMessage(error)}`, { cause: error });
  } finally {
    await loadingTask.destroy();
  }
}

/**
 * Extract the text of a document, throwing a typed ingestion error on failure
 */
export async function readDocument(doc: SourceDocument): Promise<string> {
  return readDocumentAs(doc, resolveDocumentKind(doc.mediaType));
}

async function readDocumentAs(doc: SourceDocument, kind: DocumentKind): Promise<string> {
  if (doc.bytes.byteLength > MAX_FILE_SIZE) {
    throw new FileTooLargeError(doc.bytes.byteLength, MAX_FILE_SIZE);
  }

  switch (kind) {
    case 'text':
      return readTextDocument(doc.bytes);
    case 'docx':
      return readDocxDocument(doc.bytes);
    case 'pdf':
      return readPdfDocument(doc.bytes);
    default: {
      const unreachable: never = kind;
      throw new UnsupportedTypeError(String(unreachable));
    }
  }
}

/**
 * Reporting boundary around readDocument: failures come back as a value with
 * empty text instead of a rejection.
 */
export async function extractText(doc: SourceDocument): Promise<Extraction> {
  try {
    const kind = resolveDocumentKind(doc.mediaType);
    const text = await readDocumentAs(doc, kind);
    console.debug(`[DocumentReader] Extracted ${text.length} characters from ${doc.name} (${kind})`);
    return { ok: true, kind, text };
  } catch (error) {
    const failure = error instanceof Error ? error : new ParseError(errorMessage(error));
    console.error(`[DocumentReader] Failed to read ${doc.name}:`, failure);
    return { ok: false, error: failure, text: '' };
  }
}

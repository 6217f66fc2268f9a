/**
 * Document-related type definitions
 */

export const MEDIA_TYPES = {
  text: 'text/plain',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pdf: 'application/pdf',
} as const;

export type DocumentKind = keyof typeof MEDIA_TYPES;

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['text', 'docx', 'pdf'];

/** An uploaded file, read once and then dropped. */
export interface SourceDocument {
  readonly name: string;
  readonly mediaType: string;
  readonly bytes: ArrayBuffer;
}

export type Extraction =
  | { ok: true; kind: DocumentKind; text: string }
  | { ok: false; error: Error; text: '' };

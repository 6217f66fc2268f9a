/**
 * Document Upload Component - Drag and drop or click to pick a .txt, .docx or .pdf file
 *
 * Only reads the file into memory; extraction happens when the form is submitted.
 */

import { useState, useRef, useCallback } from 'react';
import { ACCEPTED_EXTENSIONS, inferMediaType } from '../services/documentReader';
import { MEDIA_TYPES, type SourceDocument } from '../types';

interface DocumentUploadProps {
  document: SourceDocument | null;
  onSelect: (document: SourceDocument) => void;
  onClear: () => void;
  onError?: (message: string) => void;
  disabled?: boolean;
}

const ACCEPT_ATTRIBUTE = [...ACCEPTED_EXTENSIONS, ...Object.values(MEDIA_TYPES)].join(',');

/**
 * Read a browser File into an upload payload
 */
export async function toSourceDocument(file: File): Promise<SourceDocument> {
  return {
    name: file.name,
    mediaType: inferMediaType(file.name, file.type),
    bytes: await file.arrayBuffer(),
  };
}

export function DocumentUpload({ document, onSelect, onClear, onError, disabled = false }: DocumentUploadProps) {
  const [isDragging, setIsDragging] = useState(false);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const selectFile = useCallback(async (file: File) => {
    try {
      onSelect(await toSourceDocument(file));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Could not read file';
      console.error('[DocumentUpload] Failed to read file:', error);
      onError?.(message);
    }
  }, [onSelect, onError]);

  const handleDragEnter = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    e.stopPropagation();
    setIsDragging(true);
  }, []);

  const handleDragLeave = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    e.stopPropagation();
    setIsDragging(false);
  }, []);

  const handleDragOver = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    e.stopPropagation();
  }, []);

  const handleDrop = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    e.stopPropagation();
    setIsDragging(false);

    const files = Array.from(e.dataTransfer.files);
    if (files.length > 0) {
      void selectFile(files[0]);
    }
  }, [selectFile]);

  const handleClick = useCallback(() => {
    fileInputRef.current?.click();
  }, []);

  const handleFileChange = useCallback((e: React.ChangeEvent<HTMLInputElement>) => {
    const files = e.target.files;
    if (files && files.length > 0) {
      void selectFile(files[0]);
    }
    // Reset input value to allow picking the same file again
    e.target.value = '';
  }, [selectFile]);

  if (document) {
    return (
      <div
        className="flex items-center justify-between rounded-xl border border-[var(--border-color)] px-4 py-3"
        data-testid="selected-document"
      >
        <span className="text-sm text-[var(--text-primary)] truncate">{document.name}</span>
        <button
          type="button"
          onClick={onClear}
          disabled={disabled}
          className="ml-4 text-xs text-primary-500 hover:text-primary-600"
        >
          Remove
        </button>
      </div>
    );
  }

  return (
    <div
      className={`
        relative rounded-xl border-2 border-dashed transition-all duration-200 cursor-pointer
        ${isDragging
          ? 'border-primary-500 bg-primary-50 dark:bg-primary-900/20'
          : 'border-[var(--border-color)] hover:border-primary-400 hover:bg-[var(--bg-tertiary)]'
        }
        ${disabled ? 'pointer-events-none opacity-75' : ''}
      `}
      onDragEnter={handleDragEnter}
      onDragLeave={handleDragLeave}
      onDragOver={handleDragOver}
      onDrop={handleDrop}
      onClick={handleClick}
      role="button"
      tabIndex={0}
      onKeyDown={(e) => {
        if (e.key === 'Enter' || e.key === ' ') {
          e.preventDefault();
          handleClick();
        }
      }}
      aria-label="Upload a text file"
    >
      <input
        ref={fileInputRef}
        type="file"
        accept={ACCEPT_ATTRIBUTE}
        onChange={handleFileChange}
        className="hidden"
        hidden
        aria-hidden="true"
        data-testid="document-input"
      />

      <div className="flex flex-col items-center justify-center py-6 px-4">
        <p className="text-sm font-medium text-[var(--text-primary)] mb-1">
          {isDragging ? 'Drop your file here' : 'Or upload a text file (txt, docx, pdf)'}
        </p>
        <p className="text-xs text-[var(--text-muted)]">
          Drag and drop, or <span className="text-primary-500 hover:text-primary-600">browse</span>
        </p>
      </div>
    </div>
  );
}

export default DocumentUpload;

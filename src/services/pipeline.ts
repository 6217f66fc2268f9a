/**
 * Recommendation Pipeline - One submit, from raw input to a history entry
 *
 * UI-agnostic: returns what happened plus the notices the UI should show,
 * and touches no state other than the session history it is given.
 */

import type { HistoryStore } from '../stores/historyStore';
import type { ToastType } from '../stores/uiStore';
import {
  MEDIA_TYPES,
  type ApiStatus,
  type ImageMode,
  type RecommendationQuery,
  type RecommendationResult,
  type SourceDocument,
} from '../types';
import { extractText, inferMediaType } from './documentReader';
import { IngestionError, type NetworkError } from './errors';
import { modeToUseAI, toNetworkError, type RecommendationClient } from './recommendationClient';

export const MESSAGES = {
  emptyText: 'Please enter text or upload a file to get recommendations.',
  apiDown: 'Cannot perform recommendations as the API is not running.',
  unsupportedType: 'Unsupported file type',
} as const;

export const MODE_LABELS: Record<ImageMode, string> = {
  ai: 'AI',
  stock: 'Stock Images',
};

export interface Notice {
  type: ToastType;
  message: string;
}

/** `text` is ignored when a document is supplied */
export interface PipelineInput extends RecommendationQuery {
  document?: SourceDocument;
}

export interface PipelineDeps {
  client: RecommendationClient;
  history: HistoryStore;
  now?: () => Date;
}

export type PipelineOutcome =
  | { status: 'recommended'; apiStatus: 'Running'; result: RecommendationResult; notices: Notice[] }
  | { status: 'rejected'; apiStatus?: ApiStatus; notices: Notice[] }
  | { status: 'failed'; apiStatus: 'Running'; error: NetworkError; notices: Notice[] };

/**
 * User-facing message for a failed extraction
 */
export function describeIngestionError(error: Error, mediaType: string): string {
  if (!(error instanceof IngestionError)) {
    return `Error processing file: ${error.message}`;
  }
  switch (error.kind) {
    case 'unsupported_type':
      return MESSAGES.unsupportedType;
    case 'file_too_large':
      return error.message;
    case 'decode':
      return `Error reading text file: ${error.message}`;
    case 'parse': {
      const label = mediaType === MEDIA_TYPES.pdf ? 'PDF' : 'DOCX';
      return `Error reading ${label} file: ${error.message}`;
    }
    default: {
      const unreachable: never = error.kind;
      return `Error processing file: ${String(unreachable)}`;
    }
  }
}

/**
 * User-facing message for a failed request
 */
export function describeNetworkError(error: NetworkError): string {
  switch (error.kind) {
    case 'http':
      return `HTTP error occurred: ${error.message}`;
    case 'connection':
      return `Connection error occurred: ${error.message}`;
    case 'timeout':
      return `Timeout error occurred: ${error.message}`;
    case 'unexpected':
      return `An unexpected error occurred: ${error.message}`;
    default: {
      const unreachable: never = error.kind;
      return `An unexpected error occurred: ${String(unreachable)}`;
    }
  }
}

/**
 * Keep history timestamps non-decreasing even if the clock steps back
 */
const stampAfter = (result: RecommendationResult, previous: RecommendationResult | null, now: Date): RecommendationResult => {
  const floor = previous ? Date.parse(previous.createdAt) : Number.NEGATIVE_INFINITY;
  const createdAt = Math.max(now.getTime(), floor);
  return { ...result, createdAt: new Date(createdAt).toISOString() };
};

export async function runRecommendation(input: PipelineInput, deps: PipelineDeps): Promise<PipelineOutcome> {
  const { client, history } = deps;
  const now = deps.now ?? (() => new Date());
  const notices: Notice[] = [];

  let queryText = input.text;
  if (input.document) {
    const document = { ...input.document, mediaType: inferMediaType(input.document.name, input.document.mediaType) };
    const extraction = await extractText(document);
    if (!extraction.ok) {
      notices.push({ type: 'error', message: describeIngestionError(extraction.error, document.mediaType) });
      if (extraction.error instanceof IngestionError && extraction.error.kind === 'unsupported_type') {
        return { status: 'rejected', notices };
      }
    }
    queryText = extraction.text;
  }

  if (queryText.length === 0) {
    notices.push({ type: 'error', message: MESSAGES.emptyText });
    return { status: 'rejected', notices };
  }

  const apiStatus = await client.checkStatus();
  if (apiStatus !== 'Running') {
    notices.push({ type: 'error', message: MESSAGES.apiDown });
    return { status: 'rejected', apiStatus, notices };
  }

  let fetched: RecommendationResult;
  try {
    fetched = await client.fetchRecommendation(queryText, modeToUseAI(input.mode));
  } catch (error) {
    const failure = toNetworkError(error);
    notices.push({ type: 'error', message: describeNetworkError(failure) });
    return { status: 'failed', apiStatus, error: failure, notices };
  }

  const result = Object.freeze(stampAfter(fetched, history.getState().latest(), now()));
  history.getState().append(result);
  console.debug(`[Pipeline] Recorded recommendation ${result.id} (${history.getState().all().length} in session)`);

  notices.push({ type: 'success', message: `Recommended ${MODE_LABELS[input.mode]} images received` });
  return { status: 'recommended', apiStatus, result, notices };
}

/**
 * Recommendation Client - HTTP access to the image recommendation service
 *
 * One request per call: no retries, no caching.
 */

import axios, { type AxiosInstance } from 'axios';
import type { AppConfig } from '../config';
import type { ApiStatus, ImageMode, RecommendationResult } from '../types';
import {
  ConnectionError,
  HttpError,
  NetworkError,
  TimeoutError,
  UnexpectedError,
  errorMessage,
} from './errors';

export const STATUS_ENDPOINT = '/status';
export const RECOMMEND_ENDPOINT = '/recommend_images';

/** Value of the `status` field reported by a healthy service */
export const RUNNING_STATUS_TEXT = 'API is running';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CONNECTION_CODES = new Set(['ERR_NETWORK', 'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN']);

export interface RecommendationClient {
  checkStatus: () => Promise<ApiStatus>;
  fetchRecommendation: (queryText: string, useAI: boolean) => Promise<RecommendationResult>;
}

export interface ClientOptions {
  /** Clock used to stamp results */
  now?: () => Date;
  /** Result id generator */
  generateId?: () => string;
}

const defaultGenerateId = () => `rec-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;

/**
 * Map an ImageMode onto the service's use_ai flag
 */
export function modeToUseAI(mode: ImageMode): boolean {
  switch (mode) {
    case 'ai':
      return true;
    case 'stock':
      return false;
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown image mode: ${String(unreachable)}`);
    }
  }
}

const hasField = (value: unknown, field: string): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && field in value;

/**
 * Pull a readable message from an error response body
 */
const describeHttpFailure = (status: number, statusText: string, body: unknown): string => {
  let message = `HTTP ${status}: ${statusText || 'Request failed'}`;
  if (hasField(body, 'detail') && typeof body.detail === 'string') {
    message = body.detail;
  } else if (hasField(body, 'message') && typeof body.message === 'string') {
    message = body.message;
  } else if (hasField(body, 'error') && typeof body.error === 'string') {
    message = body.error;
  }
  return message;
};

/**
 * Translate whatever the transport threw into the network error taxonomy
 */
export function toNetworkError(error: unknown): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, statusText, data } = error.response;
      return new HttpError(status, describeHttpFailure(status, statusText, data), data);
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(error.message, { cause: error });
    }
    if (error.code && CONNECTION_CODES.has(error.code)) {
      return new ConnectionError(error.message, { cause: error });
    }
  }

  return new UnexpectedError(errorMessage(error), { cause: error });
}

/**
 * Create a client bound to the configured service.
 * Pass `http` to swap the transport (tests use an in-process adapter).
 */
export function createRecommendationClient(
  config: AppConfig,
  http: AxiosInstance = axios.create({ baseURL: config.apiBaseUrl, timeout: config.timeoutMs }),
  options: ClientOptions = {}
): RecommendationClient {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? defaultGenerateId;

  const checkStatus = async (): Promise<ApiStatus> => {
    try {
      const response = await http.get<unknown>(STATUS_ENDPOINT);
      const body = response.data;
      if (hasField(body, 'status') && body.status === RUNNING_STATUS_TEXT) {
        return 'Running';
      }
      return 'UnknownStatus';
    } catch (error) {
      console.error('[RecommendationClient] Status check failed:', errorMessage(error));
      return 'NotAvailable';
    }
  };

  const fetchRecommendation = async (queryText: string, useAI: boolean): Promise<RecommendationResult> => {
    let payload: unknown;
    try {
      const response = await http.get<unknown>(RECOMMEND_ENDPOINT, {
        params: { query: queryText, use_ai: useAI },
      });
      payload = response.data;
    } catch (error) {
      const failure = toNetworkError(error);
      console.error(`[RecommendationClient] Recommendation request failed (${failure.kind}):`, failure.message);
      throw failure;
    }

    console.debug('[RecommendationClient] Received recommendation for query of length', queryText.length);

    const result: RecommendationResult = {
      id: generateId(),
      query: queryText,
      mode: useAI ? 'ai' : 'stock',
      payload,
      createdAt: now().toISOString(),
    };
    return Object.freeze(result);
  };

  return { checkStatus, fetchRecommendation };
}

/**
 * Recommendation-related type definitions
 */

export type ImageMode = 'ai' | 'stock';

export type ApiStatus = 'Running' | 'NotAvailable' | 'UnknownStatus';

export interface RecommendationQuery {
  text: string;
  mode: ImageMode;
}

export interface RecommendationResult {
  readonly id: string;
  readonly query: string;
  readonly mode: ImageMode;
  /** Response body as returned by the service. */
  readonly payload: unknown;
  readonly createdAt: string;
}

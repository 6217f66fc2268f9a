/**
 * Services barrel export
 */

export {
  extractText,
  readDocument,
  resolveDocumentKind,
  inferMediaType,
  ACCEPTED_EXTENSIONS,
  MAX_FILE_SIZE,
} from './documentReader';
export {
  createRecommendationClient,
  modeToUseAI,
  toNetworkError,
  type RecommendationClient,
  type ClientOptions,
} from './recommendationClient';
export {
  runRecommendation,
  describeIngestionError,
  describeNetworkError,
  MESSAGES,
  MODE_LABELS,
  type Notice,
  type PipelineDeps,
  type PipelineInput,
  type PipelineOutcome,
} from './pipeline';
export * from './errors';

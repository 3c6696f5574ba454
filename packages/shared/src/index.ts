/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  setContextFilename,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  loadConfig,
  parseExtensionList,
  documentPolicyOf,
  secretsOf,
  DEPLOYMENT_PROFILES,
  type Config,
  type PromptVariant,
} from './config';

// Types
export * from './types';

// Errors
export {
  ExtractionError,
  PipelineError,
  describeError,
  isAbortError,
  isExtractionError,
  isPipelineError,
  type ExtractionErrorKind,
  type PipelineErrorKind,
} from './errors';

// Redaction
export { redactSecrets, registerSecrets, clearRegisteredSecrets } from './redact';

// Records
export { normalizeRecord, missingFields } from './record';

// Metrics
export {
  register,
  documentsProcessedCounter,
  stageDurationHistogram,
  providerRequestsCounter,
  providerRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  observeProviderCall,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schema validation
export { validateInsuranceRecord, type ValidationResult } from './schemas';

// Templates
export {
  getExtractionTemplate,
  getTranscriptionPrompt,
  getAvailablePromptVariants,
  renderUserPrompt,
  type ExtractionTemplate,
  type TranscriptionPrompt,
} from './templates';

// Providers
export * from './providers';

// Text extraction
export * from './text-extraction';

// Field extraction
export * from './field-extraction';

// Pipeline
export * from './pipeline';

/**
 * Prometheus Metrics
 *
 * Metrics for monitoring pipeline outcomes, provider calls, and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
if (process.env.NODE_ENV !== 'test') {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'policy_extract_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['deployment_mode', 'outcome'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'policy_extract_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage', 'status'],
  buckets: [0.01, 0.1, 0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Provider Metrics
// ============================================================================

export const providerRequestsCounter = new promClient.Counter({
  name: 'policy_extract_provider_requests_total',
  help: 'Total number of OCR, vision and LLM provider requests',
  labelNames: ['provider', 'model', 'status'],
  registers: [register],
});

export const providerRequestDurationHistogram = new promClient.Histogram({
  name: 'policy_extract_provider_request_duration_seconds',
  help: 'Duration of provider requests',
  labelNames: ['provider', 'model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'policy_extract_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'policy_extract_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Time a provider call and record its outcome.
 */
export async function observeProviderCall<T>(
  provider: string,
  model: string,
  call: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await call();
    providerRequestsCounter.inc({ provider, model, status: 'success' });
    return result;
  } catch (error) {
    providerRequestsCounter.inc({ provider, model, status: 'error' });
    throw error;
  } finally {
    providerRequestDurationHistogram.observe({ provider, model }, (Date.now() - startTime) / 1000);
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

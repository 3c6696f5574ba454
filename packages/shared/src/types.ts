/**
 * Shared TypeScript Types
 *
 * Types for the insurance document extraction pipeline, matching the JSON schema in docs/contracts/
 */

// ============================================================================
// Insurance Record
// ============================================================================

/**
 * Canonical field order. Every produced record carries exactly these keys.
 */
export const INSURANCE_RECORD_FIELDS = [
  'name',
  'policy_number',
  'email',
  'policy_name',
  'plan_type',
  'sum_assured',
  'room_rent_limit',
  'waiting_period',
] as const;

export type InsuranceRecordField = (typeof INSURANCE_RECORD_FIELDS)[number];

/**
 * Structured fields extracted from one insurance policy document.
 * `null` is the absent marker; an empty string never stands in for it.
 */
export type InsuranceRecord = Readonly<Record<InsuranceRecordField, string | null>>;

// ============================================================================
// Documents
// ============================================================================

/** Transient upload; discarded once text has been extracted. */
export interface UploadedDocument {
  bytes: Buffer;
  filename: string;
  /** Lower-cased extension including the dot, e.g. `.pdf` */
  extension: string;
}

/** Text extraction strategy, chosen per deployment. */
export type DeploymentMode = 'ocr' | 'native';

/** Which uploads a deployment accepts. */
export interface DocumentPolicy {
  supportedExtensions: readonly string[];
  maxDocumentBytes: number;
}

export type DocumentValidation =
  | { ok: true; extension: string }
  | { ok: false; reason: string };

// ============================================================================
// API Envelopes
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  service: string;
  deployment_mode: DeploymentMode;
  prompt_variant: string;
  providers: Record<string, boolean>;
  supported_formats: string[];
  max_document_bytes: number;
  timestamp: string;
}

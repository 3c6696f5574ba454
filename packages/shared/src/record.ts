/**
 * Insurance Record Normalization
 *
 * Turns the loosely-typed object an LLM returns into a canonical,
 * frozen InsuranceRecord: every canonical key present, values trimmed
 * strings or null.
 */

import { ExtractionError } from './errors';
import { INSURANCE_RECORD_FIELDS, type InsuranceRecord, type InsuranceRecordField } from './types';

function normalizeValue(field: InsuranceRecordField, value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  throw new ExtractionError(
    'malformed_output',
    `Field "${field}" has unsupported type ${Array.isArray(value) ? 'array' : typeof value}`
  );
}

/**
 * Normalize a parsed LLM object into an InsuranceRecord.
 *
 * Missing canonical keys become null, keys outside the schema are dropped.
 * Throws ExtractionError('malformed_output') for values that are neither
 * text, a number, nor null.
 */
export function normalizeRecord(raw: Record<string, unknown>): InsuranceRecord {
  const record: InsuranceRecord = {
    name: normalizeValue('name', raw.name),
    policy_number: normalizeValue('policy_number', raw.policy_number),
    email: normalizeValue('email', raw.email),
    policy_name: normalizeValue('policy_name', raw.policy_name),
    plan_type: normalizeValue('plan_type', raw.plan_type),
    sum_assured: normalizeValue('sum_assured', raw.sum_assured),
    room_rent_limit: normalizeValue('room_rent_limit', raw.room_rent_limit),
    waiting_period: normalizeValue('waiting_period', raw.waiting_period),
  };

  return Object.freeze(record);
}

/**
 * Canonical fields absent from a raw LLM object.
 */
export function missingFields(raw: Record<string, unknown>): InsuranceRecordField[] {
  return INSURANCE_RECORD_FIELDS.filter((field) => !(field in raw));
}


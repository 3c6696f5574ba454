/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for insurance records.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow descriptive keywords next to $ref
  allErrors: true,
});

const INSURANCE_RECORD_SCHEMA_FILE = 'insurance_record.schema.json';

// Compiled lazily on first use
let insuranceRecordValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to the shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to the compiled output under dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content) as object;
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getInsuranceRecordValidator(): ValidateFunction {
  if (!insuranceRecordValidator) {
    insuranceRecordValidator = ajv.compile(loadSchema(INSURANCE_RECORD_SCHEMA_FILE));
  }
  return insuranceRecordValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate an InsuranceRecord against insurance_record.schema.json
 */
export function validateInsuranceRecord(data: unknown): ValidationResult {
  const validate = getInsuranceRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('InsuranceRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

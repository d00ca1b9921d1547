/**
 * Ajv-based validator for fact input (POST /v1/cases/:case_id/facts)
 */

import type { FactSource, FactValue, RejectionReason, ValidationResult } from '../../shared/types.js';
import { ErrorCodes } from '../../shared/error-codes.js';
import factSchema from '../schemas/fact.json' with { type: 'json' };
import { createAjv, toRejectionReasons } from './ajv-errors.js';

/** Body of a fact append request */
export interface FactInput {
  key: string;
  value: FactValue;
  source: FactSource;
  /** RFC3339 with timezone; defaults to the time the fact is received */
  created_at?: string;
}

const validate = createAjv().compile<FactInput>(factSchema);

/**
 * Validate a fact body against the JSON Schema, then check created_at is a real instant
 */
export function validateFactInput(data: unknown): ValidationResult & { parsed?: FactInput } {
  if (!validate(data)) {
    return { valid: false, errors: toRejectionReasons(validate.errors) };
  }

  if (data.created_at !== undefined && Number.isNaN(Date.parse(data.created_at))) {
    const error: RejectionReason = {
      code: ErrorCodes.INVALID_FORMAT,
      message: 'created_at is not a valid date',
      field_path: 'created_at',
    };
    return { valid: false, errors: [error] };
  }

  return { valid: true, errors: [], parsed: data };
}

/**
 * Ajv-based validator for the EligibilityResult output contract
 */

import type { ValidationResult } from '../../shared/types.js';
import resultSchema from '../schemas/eligibility-result.json' with { type: 'json' };
import { createAjv, toRejectionReasons } from './ajv-errors.js';

const validate = createAjv().compile(resultSchema);

/**
 * Validate an EligibilityResult against the JSON Schema
 */
export function validateEligibilityResult(data: unknown): ValidationResult {
  const valid = validate(data);
  return {
    valid,
    errors: valid ? [] : toRejectionReasons(validate.errors),
  };
}

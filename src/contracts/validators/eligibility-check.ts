/**
 * Ajv-based validator for POST /v1/eligibility-checks bodies
 */

import type {
  AIVerdict,
  Citation,
  EligibilityCheckRequest,
  ValidationResult,
} from '../../shared/types.js';
import { ErrorCodes } from '../../shared/error-codes.js';
import { isCalendarDate } from '../../shared/dates.js';
import requestSchema from '../schemas/eligibility-check-request.json' with { type: 'json' };
import { createAjv, toRejectionReasons } from './ajv-errors.js';

/** AI verdict as supplied by the caller; citations may be omitted */
export type AIVerdictInput = Omit<AIVerdict, 'citations'> & { citations?: Citation[] };

export interface EligibilityCheckBody extends EligibilityCheckRequest {
  ai_verdict?: AIVerdictInput;
}

const validate = createAjv().compile<EligibilityCheckBody>(requestSchema);

/**
 * Validate an eligibility check body.
 * as_of must be a real calendar date, not just YYYY-MM-DD shaped.
 */
export function validateEligibilityCheckBody(
  data: unknown
): ValidationResult & { parsed?: EligibilityCheckBody } {
  if (!validate(data)) {
    return { valid: false, errors: toRejectionReasons(validate.errors) };
  }

  if (data.as_of !== undefined && !isCalendarDate(data.as_of)) {
    return {
      valid: false,
      errors: [
        {
          code: ErrorCodes.INVALID_DATE,
          message: `as_of '${data.as_of}' is not a calendar date`,
          field_path: 'as_of',
        },
      ],
    };
  }

  return { valid: true, errors: [], parsed: data };
}

/** Fill optional verdict fields */
export function toAIVerdict(input: AIVerdictInput): AIVerdict {
  return {
    outcome: input.outcome,
    confidence: input.confidence,
    reasoning: input.reasoning,
    citations: input.citations ?? [],
  };
}

/**
 * Eligibility Query Validator
 * Validates GET /v1/eligibility-results query params
 */

import type { GetEligibilityResultsRequest, RejectionReason, ValidationResult } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';

const PAGE_TOKEN_REGEX = /^v1:\d+$/;

/**
 * Validate GET /v1/eligibility-results query parameters.
 * case_id (required), page_size (1-1000), page_token (optional, v1 cursor).
 *
 * @param params - Raw query params (e.g. from Fastify request.query)
 * @returns Validation result with parsed request on success
 */
export function validateGetEligibilityResultsRequest(
  params: unknown
): ValidationResult & { parsed?: GetEligibilityResultsRequest } {
  if (params === null || typeof params !== 'object' || Array.isArray(params)) {
    return {
      valid: false,
      errors: [{ code: ErrorCodes.MISSING_REQUIRED_FIELD, message: 'Query params must be an object' }],
    };
  }

  const errors: RejectionReason[] = [];
  const caseId: unknown = 'case_id' in params ? params.case_id : undefined;
  const rawPageSize: unknown = 'page_size' in params ? params.page_size : undefined;
  const rawPageToken: unknown = 'page_token' in params ? params.page_token : undefined;

  if (typeof caseId !== 'string' || caseId.trim() === '') {
    errors.push({
      code: ErrorCodes.MISSING_REQUIRED_FIELD,
      message: 'case_id is required and must be non-empty',
      field_path: 'case_id',
    });
  }

  let pageSize: number | undefined;
  if (rawPageSize !== undefined) {
    const n = typeof rawPageSize === 'string' ? Number(rawPageSize) : rawPageSize;
    if (typeof n !== 'number' || !Number.isInteger(n)) {
      errors.push({ code: ErrorCodes.INVALID_TYPE, message: 'page_size must be an integer', field_path: 'page_size' });
    } else if (n < 1 || n > 1000) {
      errors.push({
        code: ErrorCodes.PAGE_SIZE_OUT_OF_RANGE,
        message: 'page_size must be between 1 and 1000',
        field_path: 'page_size',
      });
    } else {
      pageSize = n;
    }
  }

  let pageToken: string | undefined;
  if (rawPageToken !== undefined && rawPageToken !== '') {
    if (typeof rawPageToken !== 'string') {
      errors.push({ code: ErrorCodes.INVALID_TYPE, message: 'page_token must be a string', field_path: 'page_token' });
    } else if (!PAGE_TOKEN_REGEX.test(Buffer.from(rawPageToken, 'base64').toString('utf-8'))) {
      errors.push({
        code: ErrorCodes.INVALID_PAGE_TOKEN,
        message: 'page_token is malformed or invalid',
        field_path: 'page_token',
      });
    } else {
      pageToken = rawPageToken;
    }
  }

  if (errors.length > 0 || typeof caseId !== 'string') {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors: [],
    parsed: { case_id: caseId, page_size: pageSize, page_token: pageToken },
  };
}

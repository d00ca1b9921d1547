/**
 * Canonical error codes for the Eligibility Engine
 * These codes are used in rejection reasons and evaluation outcomes
 */

export const ErrorCodes = {
  /** Required field is absent */
  MISSING_REQUIRED_FIELD: 'missing_required_field',

  /** Field has wrong type */
  INVALID_TYPE: 'invalid_type',

  /** Field format is wrong (e.g., malformed JSON) */
  INVALID_FORMAT: 'invalid_format',

  /** Date is not YYYY-MM-DD or not a real calendar date */
  INVALID_DATE: 'invalid_date',

  /** effective_from is after effective_to */
  INVALID_DATE_RANGE: 'invalid_date_range',

  /** page_token is malformed or invalid */
  INVALID_PAGE_TOKEN: 'invalid_page_token',

  /** page_size is 0, negative, or > 1000 */
  PAGE_SIZE_OUT_OF_RANGE: 'page_size_out_of_range',

  // ==========================================================================
  // Rule Versioning Error Codes
  // ==========================================================================

  /** Resolution found no published version covering the evaluation date */
  NO_ACTIVE_RULE_VERSION: 'no_active_rule_version',

  /** Proposed range collides with a published version (blocks publish) */
  RULE_VERSION_CONFLICT: 'rule_version_conflict',

  /** Expected monotonic_version did not match the stored one */
  OPTIMISTIC_LOCK_CONFLICT: 'optimistic_lock_conflict',

  /** Rule version id unknown */
  RULE_VERSION_NOT_FOUND: 'rule_version_not_found',

  /** Published versions are read-only */
  RULE_VERSION_NOT_EDITABLE: 'rule_version_not_editable',

  /** Two requirements in one version share a code */
  DUPLICATE_REQUIREMENT_CODE: 'duplicate_requirement_code',

  // ==========================================================================
  // Evaluation Error Codes
  // ==========================================================================

  /** Expression failed structural/operator validation */
  INVALID_EXPRESSION: 'invalid_expression',

  /** AI reasoning failed or timed out; fallback verdict used */
  AI_REASONING_UNAVAILABLE: 'ai_reasoning_unavailable',
} as const;

/**
 * Eligibility Handler
 * Handles POST /eligibility-checks (run and store a check) and
 * GET /eligibility-results (query stored results).
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type {
  AIReasoningProvider,
  EligibilityResult,
  GetEligibilityResultsResponse,
  RejectionReason,
} from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { validateEligibilityCheckBody, toAIVerdict } from '../contracts/validators/eligibility-check.js';
import { storedRuleVersionProvider } from '../rules/authoring.js';
import { storedFactProvider } from '../facts/store.js';
import { runEligibilityCheck } from './engine.js';
import { createRuleVersionCache } from './rule-version-cache.js';
import { validateGetEligibilityResultsRequest } from './validator.js';
import { saveEligibilityResult, getEligibilityResults, encodePageToken } from './store.js';

/** Resolution cache shared by all checks; invalidated on publish (see routes) */
export const ruleVersionCache = createRuleVersionCache(storedRuleVersionProvider);

/**
 * Error response structure for eligibility requests
 */
interface EligibilityErrorResponse {
  error: string;
  code: string;
  field_path?: string;
  details?: RejectionReason[];
}

function errorResponse(errors: RejectionReason[]): EligibilityErrorResponse {
  const first = errors[0] ?? { code: ErrorCodes.INVALID_FORMAT, message: 'Invalid request' };
  return {
    error: first.message,
    code: first.code,
    field_path: first.field_path,
    details: errors.length > 1 ? errors : undefined,
  };
}

/** No verdict supplied: the engine maps the failure to its fallback verdict */
const noVerdictSupplied: AIReasoningProvider = {
  evaluate: () => Promise.reject(new Error('no AI verdict supplied with the request')),
};

/**
 * Handle POST /eligibility-checks
 *
 * 1. Validate body (Ajv)
 * 2. Run the check against stored facts and published rule versions,
 *    using the supplied AI verdict
 * 3. Persist the result (append-only)
 * 4. Return 200 with the EligibilityResult
 */
export async function handleEligibilityCheck(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<EligibilityResult | EligibilityErrorResponse> {
  const validation = validateEligibilityCheckBody(request.body);
  if (!validation.valid || !validation.parsed) {
    reply.status(400);
    return errorResponse(validation.errors);
  }

  const body = validation.parsed;
  const suppliedVerdict = body.ai_verdict ? toAIVerdict(body.ai_verdict) : null;
  const ai: AIReasoningProvider = suppliedVerdict
    ? { evaluate: () => Promise.resolve(suppliedVerdict) }
    : noVerdictSupplied;

  const outcome = await runEligibilityCheck(
    { case_id: body.case_id, rule_set_id: body.rule_set_id, as_of: body.as_of },
    { facts: storedFactProvider, rules: ruleVersionCache, ai }
  );
  if (!outcome.ok) {
    reply.status(400);
    return errorResponse(outcome.errors);
  }

  saveEligibilityResult(outcome.result);
  reply.status(200);
  return outcome.result;
}

/**
 * Handle GET /eligibility-results
 *
 * 1. Validate query parameters
 * 2. If invalid, return 400
 * 3. Query store, build next_page_token
 */
export async function handleGetEligibilityResults(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<GetEligibilityResultsResponse | EligibilityErrorResponse> {
  const validation = validateGetEligibilityResultsRequest(request.query);
  if (!validation.valid || !validation.parsed) {
    reply.status(400);
    return errorResponse(validation.errors);
  }

  const queryResult = getEligibilityResults(validation.parsed);

  reply.status(200);
  return {
    case_id: validation.parsed.case_id,
    results: queryResult.results,
    next_page_token:
      queryResult.hasMore && queryResult.nextCursor !== undefined
        ? encodePageToken(queryResult.nextCursor)
        : null,
  };
}

/**
 * Fact Handler
 * Handles POST /cases/:case_id/facts (append to a case's fact history).
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { RejectionReason, StoredFact } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { validateFactInput } from '../contracts/validators/fact.js';
import { appendFact } from './store.js';

/**
 * Error response structure for fact requests
 */
interface FactErrorResponse {
  error: string;
  code: string;
  field_path?: string;
  details?: RejectionReason[];
}

function errorResponse(errors: RejectionReason[]): FactErrorResponse {
  const first = errors[0] ?? { code: ErrorCodes.INVALID_FORMAT, message: 'Invalid request' };
  return {
    error: first.message,
    code: first.code,
    field_path: first.field_path,
    details: errors.length > 1 ? errors : undefined,
  };
}

/**
 * Handle POST /cases/:case_id/facts
 *
 * 1. Validate case_id and body
 * 2. If invalid, return 400
 * 3. Append the fact (created_at defaults to now)
 * 4. Return 201 with the stored fact
 */
export async function handleAppendFact(
  request: FastifyRequest<{ Params: { case_id: string } }>,
  reply: FastifyReply
): Promise<StoredFact | FactErrorResponse> {
  const caseId = request.params.case_id.trim();
  if (caseId === '') {
    reply.status(400);
    return errorResponse([
      { code: ErrorCodes.MISSING_REQUIRED_FIELD, message: 'case_id is required', field_path: 'case_id' },
    ]);
  }

  const validation = validateFactInput(request.body);
  if (!validation.valid || !validation.parsed) {
    reply.status(400);
    return errorResponse(validation.errors);
  }

  const input = validation.parsed;
  const stored = appendFact(caseId, {
    key: input.key,
    value: input.value,
    source: input.source,
    created_at: input.created_at ?? new Date().toISOString(),
  });

  request.log.info({ case_id: caseId, key: stored.key, source: stored.source }, 'fact appended');
  reply.status(201);
  return stored;
}

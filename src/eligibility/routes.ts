/**
 * Eligibility Routes
 * Registers POST /eligibility-checks and GET /eligibility-results with Fastify.
 */

import type { FastifyInstance } from 'fastify';
import { onRuleVersionPublished } from '../rules/authoring.js';
import { handleEligibilityCheck, handleGetEligibilityResults, ruleVersionCache } from './handler.js';

/**
 * Register eligibility routes with Fastify.
 * Also ties the resolution cache to publish events for the app's lifetime.
 *
 * @param app - Fastify instance
 */
export function registerEligibilityRoutes(app: FastifyInstance): void {
  const unsubscribe = onRuleVersionPublished((event) => {
    ruleVersionCache.invalidate(event.rule_set_id);
  });
  app.addHook('onClose', async () => {
    unsubscribe();
    ruleVersionCache.clear();
  });

  /**
   * POST /eligibility-checks
   * Run an eligibility check for a case against a rule set
   *
   * Body: { case_id, rule_set_id, as_of?, ai_verdict? }
   *
   * Response:
   * - 200: EligibilityResult (stored)
   * - 400: Validation error
   */
  app.post('/eligibility-checks', handleEligibilityCheck);

  /**
   * GET /eligibility-results
   * Stored results for a case, in evaluation order
   *
   * Query Parameters:
   * - case_id (required)
   * - page_token (optional): Pagination token from previous response
   * - page_size (optional): 1-1000, default 100
   */
  app.get('/eligibility-results', handleGetEligibilityResults);
}

/**
 * Fact Routes
 * Registers POST /cases/:case_id/facts with Fastify.
 */

import type { FastifyInstance } from 'fastify';
import { handleAppendFact } from './handler.js';

/**
 * Register fact routes with Fastify
 *
 * @param app - Fastify instance
 */
export function registerFactRoutes(app: FastifyInstance): void {
  /**
   * POST /cases/:case_id/facts
   * Append one fact to a case's history
   *
   * Response:
   * - 201: Stored fact with fact_id
   * - 400: Validation error
   */
  app.post<{ Params: { case_id: string } }>('/cases/:case_id/facts', handleAppendFact);
}

/**
 * Contract Tests for Eligibility API (ELIG-API-001 through ELIG-API-004)
 * HTTP-level tests for POST /eligibility-checks and GET /eligibility-results
 * using Fastify app.inject().
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerEligibilityRoutes } from '../../src/eligibility/routes.js';
import { ruleVersionCache } from '../../src/eligibility/handler.js';
import {
  initEligibilityStore,
  closeEligibilityStore,
  clearEligibilityStore,
} from '../../src/eligibility/store.js';
import { initFactStore, closeFactStore, clearFactStore, appendFact } from '../../src/facts/store.js';
import { initRuleStore, closeRuleStore, clearRuleStore } from '../../src/rules/store.js';
import { createRuleVersion, publishRuleVersion } from '../../src/rules/authoring.js';
import { validateEligibilityResult } from '../../src/contracts/validators/eligibility-result.js';
import type { EligibilityResult, GetEligibilityResultsResponse } from '../../src/shared/types.js';

describe('Eligibility API Contract Tests', () => {
  let app: FastifyInstance;

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  function publishSalaryRule(effectiveFrom = '2024-01-01'): string {
    const draft = createRuleVersion({
      rule_set_id: 'visa-a',
      effective_from: effectiveFrom,
      effective_to: null,
      requirements: [
        {
          requirement_code: 'salary',
          label: 'Minimum salary',
          mandatory: true,
          expression: { '>=': [{ var: 'min_salary' }, 25000] },
        },
      ],
    });
    if (!draft.ok) throw new Error('draft rejected');
    const published = publishRuleVersion(draft.result.rule_version_id, draft.result.monotonic_version);
    if (!published.ok) throw new Error('publish rejected');
    return published.result.rule_version_id;
  }

  async function postCheck(payload: unknown) {
    return app.inject({
      method: 'POST',
      url: '/eligibility-checks',
      payload: JSON.stringify(payload),
      headers: { 'content-type': 'application/json' },
    });
  }

  async function queryResults(params: Record<string, string | number | undefined>) {
    const queryString = Object.entries(params)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${encodeURIComponent(String(v))}`)
      .join('&');

    return app.inject({ method: 'GET', url: `/eligibility-results?${queryString}` });
  }

  const AI_ELIGIBLE = { outcome: 'eligible', confidence: 0.9, reasoning: 'test reasoning' };

  // ---------------------------------------------------------------------------
  // Setup / Teardown
  // ---------------------------------------------------------------------------

  beforeAll(async () => {
    initRuleStore(':memory:');
    initFactStore(':memory:');
    initEligibilityStore(':memory:');

    app = Fastify({ logger: false });
    registerEligibilityRoutes(app);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    closeEligibilityStore();
    closeFactStore();
    closeRuleStore();
  });

  beforeEach(() => {
    clearRuleStore();
    clearFactStore();
    clearEligibilityStore();
    ruleVersionCache.clear();
  });

  // ---------------------------------------------------------------------------
  // ELIG-API-001: Run a check
  // ---------------------------------------------------------------------------

  describe('ELIG-API-001: POST /eligibility-checks', () => {
    it('should return 200 with a stored result that satisfies the output contract', async () => {
      const ruleVersionId = publishSalaryRule();
      appendFact('case-1', { key: 'min_salary', value: 30000, source: 'user', created_at: '2024-03-01T00:00:00Z' });

      const response = await postCheck({
        case_id: 'case-1',
        rule_set_id: 'visa-a',
        as_of: '2024-05-01',
        ai_verdict: AI_ELIGIBLE,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<EligibilityResult>();
      expect(body.rule_version_id).toBe(ruleVersionId);
      expect(body.outcome).toBe('eligible');
      expect(body.ai_verdict).toEqual({ ...AI_ELIGIBLE, citations: [] });
      expect(validateEligibilityResult(body)).toEqual({ valid: true, errors: [] });

      const stored = await queryResults({ case_id: 'case-1' });
      expect(stored.json<GetEligibilityResultsResponse>().results).toEqual([body]);
    });

    it('should fall back when no AI verdict is supplied', async () => {
      publishSalaryRule();
      appendFact('case-1', { key: 'min_salary', value: 30000, source: 'user', created_at: '2024-03-01T00:00:00Z' });

      const response = await postCheck({ case_id: 'case-1', rule_set_id: 'visa-a', as_of: '2024-05-01' });

      expect(response.statusCode).toBe(200);
      const body = response.json<EligibilityResult>();
      expect(body.outcome).toBe('requires_review');
      expect(body.ai_verdict?.reasoning).toBe('AI reasoning unavailable: no AI verdict supplied with the request');
      expect(body.warnings).toEqual(['ai_reasoning_unavailable: no AI verdict supplied with the request']);
    });

    it('should return a requires_review result when no version is in force', async () => {
      const response = await postCheck({
        case_id: 'case-1',
        rule_set_id: 'visa-a',
        as_of: '2024-05-01',
        ai_verdict: AI_ELIGIBLE,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<EligibilityResult>();
      expect(body.escalation_reasons).toEqual(['no_active_rule_version']);
      expect(body.aggregate).toBeNull();
      expect(validateEligibilityResult(body).valid).toBe(true);
    });

    it('should see a version published after an earlier check for the same day', async () => {
      const before = await postCheck({ case_id: 'case-1', rule_set_id: 'visa-a', as_of: '2024-05-01' });
      expect(before.json<EligibilityResult>().rule_version_id).toBeNull();

      const ruleVersionId = publishSalaryRule();
      const after = await postCheck({ case_id: 'case-1', rule_set_id: 'visa-a', as_of: '2024-05-01' });

      expect(after.json<EligibilityResult>().rule_version_id).toBe(ruleVersionId);
    });
  });

  // ---------------------------------------------------------------------------
  // ELIG-API-002: Request validation
  // ---------------------------------------------------------------------------

  describe('ELIG-API-002: Invalid check requests', () => {
    it('should reject a missing rule_set_id', async () => {
      const response = await postCheck({ case_id: 'case-1' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'Missing required field: rule_set_id',
        code: 'missing_required_field',
        field_path: 'rule_set_id',
      });
    });

    it('should reject an impossible as_of date', async () => {
      const response = await postCheck({ case_id: 'case-1', rule_set_id: 'visa-a', as_of: '2024-02-30' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "as_of '2024-02-30' is not a calendar date",
        code: 'invalid_date',
        field_path: 'as_of',
      });
    });

    it('should reject an out-of-range AI confidence', async () => {
      const response = await postCheck({
        case_id: 'case-1',
        rule_set_id: 'visa-a',
        ai_verdict: { ...AI_ELIGIBLE, confidence: 1.5 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'invalid_format', field_path: 'ai_verdict.confidence' });
    });
  });

  // ---------------------------------------------------------------------------
  // ELIG-API-003: Listing results
  // ---------------------------------------------------------------------------

  describe('ELIG-API-003: GET /eligibility-results', () => {
    it('should page through results in evaluation order', async () => {
      publishSalaryRule();
      const ids: string[] = [];
      for (let i = 0; i < 3; i++) {
        const response = await postCheck({
          case_id: 'case-1',
          rule_set_id: 'visa-a',
          as_of: '2024-05-01',
          ai_verdict: AI_ELIGIBLE,
        });
        ids.push(response.json<EligibilityResult>().result_id);
      }

      const first = await queryResults({ case_id: 'case-1', page_size: 2 });
      expect(first.statusCode).toBe(200);
      const firstBody = first.json<GetEligibilityResultsResponse>();
      expect(firstBody.case_id).toBe('case-1');
      expect(firstBody.results.map((r) => r.result_id)).toEqual(ids.slice(0, 2));
      expect(firstBody.next_page_token).not.toBeNull();

      const second = await queryResults({
        case_id: 'case-1',
        page_size: 2,
        page_token: firstBody.next_page_token ?? undefined,
      });
      const secondBody = second.json<GetEligibilityResultsResponse>();
      expect(secondBody.results.map((r) => r.result_id)).toEqual(ids.slice(2));
      expect(secondBody.next_page_token).toBeNull();
    });

    it('should return an empty list for a case without results', async () => {
      const response = await queryResults({ case_id: 'nobody' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ case_id: 'nobody', results: [], next_page_token: null });
    });
  });

  // ---------------------------------------------------------------------------
  // ELIG-API-004: Query validation
  // ---------------------------------------------------------------------------

  describe('ELIG-API-004: Invalid queries', () => {
    it('should reject a missing case_id', async () => {
      const response = await queryResults({});

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'missing_required_field', field_path: 'case_id' });
    });

    it('should reject page_size out of range', async () => {
      const response = await queryResults({ case_id: 'case-1', page_size: 0 });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'page_size_out_of_range', field_path: 'page_size' });
    });

    it('should reject a malformed page_token', async () => {
      const response = await queryResults({ case_id: 'case-1', page_token: 'garbage' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'invalid_page_token' });
    });
  });
});

/**
 * Eligibility Engine
 * Orchestrates one eligibility check:
 * resolve rule version → normalize facts → evaluate requirements →
 * aggregate → AI verdict (with timeout) → combine.
 *
 * Fatal resolution failures become requires_review results, never exceptions.
 */

import * as crypto from 'crypto';
import type {
  AggregateResult,
  AggregationPolicy,
  AIReasoningProvider,
  AIVerdict,
  CombinerPolicy,
  EligibilityCheckOutcome,
  EligibilityCheckRequest,
  EligibilityResult,
  Fact,
  FactProvider,
  RejectionReason,
  RuleVersion,
} from '../shared/types.js';
import { ELIGIBILITY_OUTCOMES } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { isCalendarDate, todayUtc } from '../shared/dates.js';
import { componentLogger } from '../shared/logger.js';
import { config, DEFAULT_AGGREGATION_POLICY, DEFAULT_COMBINER_POLICY } from '../config.js';
import { normalizeFacts } from '../facts/normalizer.js';
import { evaluateRequirement } from '../rules/expression-evaluator.js';
import { aggregateOutcomes } from './aggregator.js';
import { combineVerdicts } from './combiner.js';
import type { RuleVersionSource } from './rule-version-cache.js';

const log = componentLogger('eligibility-engine');

export interface EligibilityEngineDeps {
  facts: FactProvider;
  rules: RuleVersionSource;
  ai: AIReasoningProvider;
  aggregationPolicy?: AggregationPolicy;
  combinerPolicy?: CombinerPolicy;
  /** Budget for the AI call; defaults to config.ai.timeoutMs */
  aiTimeoutMs?: number;
  /** Clock, for the default as_of and evaluated_at */
  now?: () => Date;
}

/**
 * Verdict used when the AI call fails or times out.
 * Neutral outcome, zero confidence: the combiner escalates on its own.
 */
export function fallbackVerdict(reason: string): AIVerdict {
  return {
    outcome: 'requires_review',
    confidence: 0,
    reasoning: `AI reasoning unavailable: ${reason}`,
    citations: [],
  };
}

/**
 * Evaluate every requirement of a rule version against a fact history,
 * in requirement order, and aggregate.
 */
export function evaluateRuleVersion(
  version: RuleVersion,
  facts: readonly Fact[],
  policy: AggregationPolicy = DEFAULT_AGGREGATION_POLICY
): AggregateResult {
  const values = normalizeFacts(facts);
  const results = version.requirements.map((requirement) => evaluateRequirement(requirement, values));
  return aggregateOutcomes(results, policy);
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, errorMessage: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function validateCheckRequest(request: EligibilityCheckRequest): RejectionReason[] {
  const errors: RejectionReason[] = [];
  if (request.case_id.trim() === '') {
    errors.push({ code: ErrorCodes.MISSING_REQUIRED_FIELD, message: 'case_id is required', field_path: 'case_id' });
  }
  if (request.rule_set_id.trim() === '') {
    errors.push({
      code: ErrorCodes.MISSING_REQUIRED_FIELD,
      message: 'rule_set_id is required',
      field_path: 'rule_set_id',
    });
  }
  if (request.as_of !== undefined && !isCalendarDate(request.as_of)) {
    errors.push({
      code: ErrorCodes.INVALID_DATE,
      message: `as_of '${request.as_of}' is not a YYYY-MM-DD calendar date`,
      field_path: 'as_of',
    });
  }
  return errors;
}

/** The provider is external; a verdict with an outcome the combiner cannot rank is a failed call */
function checkVerdict(verdict: AIVerdict): AIVerdict {
  if (!ELIGIBILITY_OUTCOMES.includes(verdict.outcome)) {
    throw new Error(`AI verdict outcome must be one of: ${ELIGIBILITY_OUTCOMES.join(', ')}`);
  }
  return verdict;
}

async function requestVerdict(
  deps: EligibilityEngineDeps,
  caseId: string,
  ruleSetId: string
): Promise<{ verdict: AIVerdict; warning: string | null }> {
  const timeoutMs = deps.aiTimeoutMs ?? config.ai.timeoutMs;
  try {
    const verdict = await withTimeout(
      deps.ai.evaluate(caseId, ruleSetId),
      timeoutMs,
      `AI reasoning timed out after ${timeoutMs}ms`
    );
    return { verdict: checkVerdict(verdict), warning: null };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn({ case_id: caseId, rule_set_id: ruleSetId, err: reason }, 'AI reasoning failed; using fallback verdict');
    return {
      verdict: fallbackVerdict(reason),
      warning: `${ErrorCodes.AI_REASONING_UNAVAILABLE}: ${reason}`,
    };
  }
}

/**
 * Run one eligibility check.
 *
 * Returns { ok: false } only for malformed requests. A rule set with no
 * version in force on as_of yields a requires_review result and skips the AI call.
 */
export async function runEligibilityCheck(
  request: EligibilityCheckRequest,
  deps: EligibilityEngineDeps
): Promise<EligibilityCheckOutcome> {
  const errors = validateCheckRequest(request);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const now = deps.now ?? (() => new Date());
  const caseId = request.case_id;
  const ruleSetId = request.rule_set_id;
  const asOf = request.as_of ?? todayUtc(now());

  const resolution = deps.rules.resolve(ruleSetId, asOf);
  if (!resolution.ok) {
    log.warn(
      { case_id: caseId, rule_set_id: ruleSetId, as_of: asOf, code: resolution.error.code },
      resolution.error.message
    );
    return {
      ok: true,
      result: {
        result_id: crypto.randomUUID(),
        case_id: caseId,
        rule_set_id: ruleSetId,
        rule_version_id: null,
        as_of: asOf,
        evaluated_at: now().toISOString(),
        outcome: 'requires_review',
        confidence: 0,
        conflict_detected: false,
        requires_review: true,
        escalation_reasons: ['no_active_rule_version'],
        reasoning_summary: `${resolution.error.message}. Human review required.`,
        aggregate: null,
        ai_verdict: null,
        warnings: [],
      },
    };
  }

  for (const warning of resolution.warnings) {
    log.warn({ case_id: caseId, rule_set_id: ruleSetId, as_of: asOf }, warning);
  }

  const version = resolution.version;
  const aggregate = evaluateRuleVersion(version, deps.facts.currentFacts(caseId), deps.aggregationPolicy);
  const { verdict, warning: aiWarning } = await requestVerdict(deps, caseId, ruleSetId);
  const combined = combineVerdicts(aggregate, verdict, deps.combinerPolicy);

  const result: EligibilityResult = {
    result_id: crypto.randomUUID(),
    case_id: caseId,
    rule_set_id: ruleSetId,
    rule_version_id: version.rule_version_id,
    as_of: asOf,
    evaluated_at: now().toISOString(),
    outcome: combined.outcome,
    confidence: combined.confidence,
    conflict_detected: combined.conflict_detected,
    requires_review: combined.requires_review,
    escalation_reasons: combined.escalation_reasons,
    reasoning_summary: combined.reasoning_summary,
    aggregate: combined.aggregate,
    ai_verdict: combined.ai_verdict,
    warnings: [...resolution.warnings, ...aggregate.warnings, ...(aiWarning ? [aiWarning] : [])],
  };

  const logFields = {
    case_id: caseId,
    rule_set_id: ruleSetId,
    rule_version_id: version.rule_version_id,
    outcome: result.outcome,
    confidence: result.confidence,
  };
  if (result.requires_review) {
    log.info({ ...logFields, escalation_reasons: result.escalation_reasons }, 'eligibility check escalated');
  }
  log.info(logFields, 'eligibility check completed');

  return { ok: true, result };
}

/**
 * Eligibility Combiner
 * Fuses the deterministic rule verdict with the AI verdict.
 *
 * - Disagreement is resolved conservatively: the more restrictive outcome wins.
 * - A hard conflict (eligible vs not_eligible) takes the lower confidence.
 * - Escalation triggers are independent; any one sets requires_review.
 */

import type {
  AggregateResult,
  AIVerdict,
  CombinedResult,
  CombinerPolicy,
  EligibilityOutcome,
  EscalationReason,
} from '../shared/types.js';
import { DEFAULT_COMBINER_POLICY } from '../config.js';

/** Higher = more restrictive */
const RESTRICTIVENESS: Record<EligibilityOutcome, number> = {
  eligible: 0,
  requires_review: 1,
  not_eligible: 2,
};

/** Clamp to [0,1]; NaN becomes 0 */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** True iff one side says eligible and the other not_eligible */
export function isDecisionConflict(a: EligibilityOutcome, b: EligibilityOutcome): boolean {
  return (a === 'eligible' && b === 'not_eligible') || (a === 'not_eligible' && b === 'eligible');
}

export function mostRestrictive(a: EligibilityOutcome, b: EligibilityOutcome): EligibilityOutcome {
  return RESTRICTIVENESS[b] > RESTRICTIVENESS[a] ? b : a;
}

/** Freeze a value and everything reachable from it */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

const percent = (value: number): string => `${Math.round(value * 100)}%`;

function summarize(
  aggregate: AggregateResult,
  ai: AIVerdict,
  conflict: boolean,
  confidence: number,
  reasons: readonly EscalationReason[],
  policy: CombinerPolicy
): string {
  const parts: string[] = [];

  if (conflict) {
    parts.push(
      `Rule engine evaluation indicates ${aggregate.outcome}, while AI reasoning suggests ${ai.outcome}.`
    );
  } else {
    parts.push(
      `Rule engine evaluation: ${aggregate.requirements_passed} of ${aggregate.requirements_total} requirements passed (${aggregate.outcome}, ${percent(clampConfidence(aggregate.confidence))}).`
    );
    parts.push(`AI reasoning: ${ai.outcome} (${percent(clampConfidence(ai.confidence))}).`);
  }

  if (reasons.includes('low_confidence')) {
    parts.push(`Confidence is below threshold (${percent(confidence)} < ${percent(policy.confidenceFloor)}).`);
  }
  if (reasons.includes('missing_mandatory_facts')) {
    parts.push(`Missing mandatory facts: ${aggregate.mandatory_missing_facts.join(', ')}.`);
  }
  if (reasons.length > 0) {
    parts.push('Human review recommended.');
  }

  return parts.join(' ');
}

/**
 * Combine an aggregate with an AI verdict. Pure and deterministic; inputs
 * are not mutated. The result is deeply frozen and holds its own copies of
 * the aggregate and the AI verdict.
 */
export function combineVerdicts(
  aggregate: AggregateResult,
  ai: AIVerdict,
  policy: CombinerPolicy = DEFAULT_COMBINER_POLICY
): CombinedResult {
  const ruleConfidence = clampConfidence(aggregate.confidence);
  const aiConfidence = clampConfidence(ai.confidence);

  const conflict = isDecisionConflict(aggregate.outcome, ai.outcome);
  const outcome = mostRestrictive(aggregate.outcome, ai.outcome);
  const confidence = conflict
    ? Math.min(ruleConfidence, aiConfidence)
    : clampConfidence(policy.ruleEngineWeight * ruleConfidence + policy.aiWeight * aiConfidence);

  const reasons: EscalationReason[] = [];
  if (confidence < policy.confidenceFloor) reasons.push('low_confidence');
  if (conflict) reasons.push('rule_ai_conflict');
  if (aggregate.mandatory_missing_facts.length > 0) reasons.push('missing_mandatory_facts');

  return deepFreeze<CombinedResult>({
    outcome,
    confidence,
    conflict_detected: conflict,
    requires_review: reasons.length > 0,
    escalation_reasons: reasons,
    reasoning_summary: summarize(aggregate, ai, conflict, confidence, reasons, policy),
    aggregate: structuredClone(aggregate),
    ai_verdict: structuredClone(ai),
  });
}

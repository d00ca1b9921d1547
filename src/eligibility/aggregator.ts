/**
 * Result Aggregator
 * Folds per-requirement outcomes into one deterministic verdict.
 *
 * Fail-closed: a version with no requirements, or with nothing evaluable,
 * never produces eligible.
 */

import type {
  AggregateResult,
  AggregationPolicy,
  EligibilityOutcome,
  RequirementResult,
} from '../shared/types.js';
import { DEFAULT_AGGREGATION_POLICY } from '../config.js';

function pushUnique(target: string[], seen: Set<string>, keys: readonly string[]): void {
  for (const key of keys) {
    if (!seen.has(key)) {
      seen.add(key);
      target.push(key);
    }
  }
}

function outcomeFor(
  confidence: number,
  evaluable: number,
  mandatoryFailed: boolean,
  mandatoryIncomplete: boolean,
  policy: AggregationPolicy
): EligibilityOutcome {
  if (mandatoryFailed) return 'not_eligible';
  if (mandatoryIncomplete) return 'requires_review';
  if (evaluable === 0) return 'not_eligible';
  if (confidence >= policy.eligibleThreshold) return 'eligible';
  if (confidence <= policy.notEligibleThreshold) return 'not_eligible';
  return 'requires_review';
}

/**
 * Aggregate requirement results, in requirement order.
 *
 * confidence = passed / (passed + failed). A failed mandatory requirement
 * forces not_eligible; otherwise a mandatory requirement with missing facts
 * or an error forces requires_review; otherwise thresholds decide.
 */
export function aggregateOutcomes(
  results: readonly RequirementResult[],
  policy: AggregationPolicy = DEFAULT_AGGREGATION_POLICY
): AggregateResult {
  let passed = 0;
  let failed = 0;
  let missing = 0;
  let errored = 0;
  let mandatoryFailed = false;
  let mandatoryIncomplete = false;

  const missingFacts: string[] = [];
  const seenMissing = new Set<string>();
  const mandatoryMissingFacts: string[] = [];
  const seenMandatoryMissing = new Set<string>();
  const warnings: string[] = [];

  for (const result of results) {
    switch (result.status) {
      case 'passed':
        passed++;
        break;
      case 'failed':
        failed++;
        if (result.mandatory) mandatoryFailed = true;
        break;
      case 'missing_facts':
        missing++;
        if (result.mandatory) mandatoryIncomplete = true;
        pushUnique(missingFacts, seenMissing, result.missing_facts);
        if (result.mandatory) {
          pushUnique(mandatoryMissingFacts, seenMandatoryMissing, result.missing_facts);
        }
        break;
      case 'error':
        errored++;
        if (result.mandatory) mandatoryIncomplete = true;
        warnings.push(
          `Requirement '${result.requirement_code}' could not be evaluated (${result.error?.kind ?? 'unknown'}): ${result.error?.message ?? 'no detail'}`
        );
        break;
    }
  }

  const total = results.length;
  const evaluable = passed + failed;
  const confidence = evaluable === 0 ? 0 : passed / evaluable;

  if (total === 0) {
    warnings.unshift('no requirements defined');
  } else if (evaluable === 0) {
    warnings.unshift('no evaluable requirements');
  }

  return {
    outcome:
      total === 0
        ? 'not_eligible'
        : outcomeFor(confidence, evaluable, mandatoryFailed, mandatoryIncomplete, policy),
    confidence,
    requirements_total: total,
    requirements_passed: passed,
    requirements_failed: failed,
    requirements_missing_facts: missing,
    requirements_errored: errored,
    missing_facts: missingFacts,
    mandatory_missing_facts: mandatoryMissingFacts,
    warnings,
    requirement_results: [...results],
  };
}

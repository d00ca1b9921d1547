/**
 * Unit tests for the Eligibility Combiner
 */

import { describe, it, expect } from 'vitest';
import {
  combineVerdicts,
  clampConfidence,
  isDecisionConflict,
  mostRestrictive,
} from '../../src/eligibility/combiner.js';
import type { AggregateResult, AIVerdict, EligibilityOutcome } from '../../src/shared/types.js';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

function aggregate(outcome: EligibilityOutcome, confidence: number, overrides: Partial<AggregateResult> = {}): AggregateResult {
  return {
    outcome,
    confidence,
    requirements_total: 2,
    requirements_passed: 2,
    requirements_failed: 0,
    requirements_missing_facts: 0,
    requirements_errored: 0,
    missing_facts: [],
    mandatory_missing_facts: [],
    warnings: [],
    requirement_results: [],
    ...overrides,
  };
}

function verdict(outcome: EligibilityOutcome, confidence: number): AIVerdict {
  return { outcome, confidence, reasoning: 'test reasoning', citations: [] };
}

const OUTCOMES: EligibilityOutcome[] = ['eligible', 'not_eligible', 'requires_review'];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Eligibility Combiner', () => {
  describe('helpers', () => {
    it('clamps confidences into [0, 1] and maps NaN to 0', () => {
      expect(clampConfidence(-0.5)).toBe(0);
      expect(clampConfidence(1.7)).toBe(1);
      expect(clampConfidence(0.42)).toBe(0.42);
      expect(clampConfidence(Number.NaN)).toBe(0);
    });

    it('flags only eligible versus not_eligible as a conflict', () => {
      expect(isDecisionConflict('eligible', 'not_eligible')).toBe(true);
      expect(isDecisionConflict('not_eligible', 'eligible')).toBe(true);
      expect(isDecisionConflict('eligible', 'requires_review')).toBe(false);
      expect(isDecisionConflict('not_eligible', 'not_eligible')).toBe(false);
    });

    it('orders outcomes eligible < requires_review < not_eligible', () => {
      expect(mostRestrictive('eligible', 'requires_review')).toBe('requires_review');
      expect(mostRestrictive('requires_review', 'not_eligible')).toBe('not_eligible');
      expect(mostRestrictive('not_eligible', 'eligible')).toBe('not_eligible');
    });
  });

  describe('combineVerdicts', () => {
    it('resolves a hard conflict to the restrictive outcome at the lower confidence', () => {
      const result = combineVerdicts(aggregate('eligible', 0.9), verdict('not_eligible', 0.8));

      expect(result.outcome).toBe('not_eligible');
      expect(result.conflict_detected).toBe(true);
      expect(result.confidence).toBe(0.8);
      expect(result.requires_review).toBe(true);
      expect(result.escalation_reasons).toEqual(['rule_ai_conflict']);
      expect(result.reasoning_summary).toBe(
        'Rule engine evaluation indicates eligible, while AI reasoning suggests not_eligible. Human review recommended.'
      );
    });

    it('blends confidences when both sides agree', () => {
      const result = combineVerdicts(aggregate('eligible', 1), verdict('eligible', 0.9));

      expect(result.outcome).toBe('eligible');
      expect(result.conflict_detected).toBe(false);
      expect(result.confidence).toBeCloseTo(0.96, 10);
      expect(result.requires_review).toBe(false);
      expect(result.escalation_reasons).toEqual([]);
      expect(result.reasoning_summary).toBe(
        'Rule engine evaluation: 2 of 2 requirements passed (eligible, 100%). AI reasoning: eligible (90%).'
      );
    });

    it('does not treat requires_review as a conflict or as an escalation trigger', () => {
      const result = combineVerdicts(aggregate('eligible', 1), verdict('requires_review', 0.5));

      expect(result.outcome).toBe('requires_review');
      expect(result.conflict_detected).toBe(false);
      expect(result.confidence).toBeCloseTo(0.8, 10);
      expect(result.requires_review).toBe(false);
      expect(result.escalation_reasons).toEqual([]);
    });

    it('leaves a confident requires_review aggregate without escalation', () => {
      const result = combineVerdicts(aggregate('requires_review', 0.7), verdict('eligible', 0.9));

      expect(result.outcome).toBe('requires_review');
      expect(result.confidence).toBeCloseTo(0.78, 10);
      expect(result.conflict_detected).toBe(false);
      expect(result.requires_review).toBe(false);
      expect(result.escalation_reasons).toEqual([]);
    });

    it('escalates low confidence and says so', () => {
      const result = combineVerdicts(
        aggregate('not_eligible', 0.3, { requirements_passed: 3, requirements_total: 10 }),
        verdict('not_eligible', 0.4)
      );

      expect(result.outcome).toBe('not_eligible');
      expect(result.confidence).toBeCloseTo(0.34, 10);
      expect(result.escalation_reasons).toEqual(['low_confidence']);
      expect(result.reasoning_summary).toBe(
        'Rule engine evaluation: 3 of 10 requirements passed (not_eligible, 30%). AI reasoning: not_eligible (40%). Confidence is below threshold (34% < 60%). Human review recommended.'
      );
    });

    it('escalates missing mandatory facts and names them', () => {
      const result = combineVerdicts(
        aggregate('requires_review', 1, {
          requirements_passed: 1,
          requirements_missing_facts: 1,
          missing_facts: ['has_valid_passport'],
          mandatory_missing_facts: ['has_valid_passport'],
        }),
        verdict('eligible', 0.9)
      );

      expect(result.outcome).toBe('requires_review');
      expect(result.escalation_reasons).toEqual(['missing_mandatory_facts']);
      expect(result.reasoning_summary).toBe(
        'Rule engine evaluation: 1 of 2 requirements passed (requires_review, 100%). AI reasoning: eligible (90%). Missing mandatory facts: has_valid_passport. Human review recommended.'
      );
    });

    it('clamps out-of-range AI confidences before blending', () => {
      expect(combineVerdicts(aggregate('eligible', 1), verdict('eligible', 1.7)).confidence).toBeCloseTo(1, 10);
      expect(combineVerdicts(aggregate('eligible', 1), verdict('eligible', Number.NaN)).confidence).toBeCloseTo(
        0.6,
        10
      );
    });

    it('applies a custom policy', () => {
      const result = combineVerdicts(aggregate('eligible', 1), verdict('eligible', 0.5), {
        confidenceFloor: 0.9,
        ruleEngineWeight: 0.5,
        aiWeight: 0.5,
      });

      expect(result.confidence).toBeCloseTo(0.75, 10);
      expect(result.escalation_reasons).toEqual(['low_confidence']);
    });

    it('returns a frozen result and leaves its inputs untouched', () => {
      const rule = aggregate('eligible', 0.9);
      const ai = verdict('not_eligible', 0.8);
      const before = JSON.stringify([rule, ai]);

      const result = combineVerdicts(rule, ai);

      expect(Object.isFrozen(result)).toBe(true);
      expect(JSON.stringify([rule, ai])).toBe(before);
    });

    it('freezes nested fields and detaches them from the inputs', () => {
      const rule = aggregate('eligible', 0.9, { warnings: ['no requirements defined'] });
      const ai = { ...verdict('not_eligible', 0.8), citations: [{ source: 'policy-manual' }] };

      const result = combineVerdicts(rule, ai);

      expect(() => result.escalation_reasons.push('low_confidence')).toThrow(TypeError);
      expect(() => {
        result.aggregate.outcome = 'eligible';
      }).toThrow(TypeError);
      expect(() => result.aggregate.warnings.push('extra')).toThrow(TypeError);
      expect(() => {
        result.ai_verdict.confidence = 1;
      }).toThrow(TypeError);
      expect(() => result.ai_verdict.citations.push({ source: 'extra' })).toThrow(TypeError);

      expect(result.escalation_reasons).toEqual(['rule_ai_conflict']);
      expect(result.aggregate).toEqual(rule);
      expect(result.aggregate).not.toBe(rule);
      expect(Object.isFrozen(rule)).toBe(false);
      expect(Object.isFrozen(ai.citations)).toBe(false);
    });

    it('is deterministic and never less restrictive than either side', () => {
      for (const ruleOutcome of OUTCOMES) {
        for (const aiOutcome of OUTCOMES) {
          const first = combineVerdicts(aggregate(ruleOutcome, 0.7), verdict(aiOutcome, 0.7));
          const second = combineVerdicts(aggregate(ruleOutcome, 0.7), verdict(aiOutcome, 0.7));

          expect(second).toEqual(first);
          if (ruleOutcome === 'not_eligible' || aiOutcome === 'not_eligible') {
            expect(first.outcome).toBe('not_eligible');
          }
          if (ruleOutcome === aiOutcome) {
            expect(first.conflict_detected).toBe(false);
            expect(first.outcome).toBe(ruleOutcome);
          }
          expect(first.requires_review).toBe(first.escalation_reasons.length > 0);
        }
      }
    });
  });
});

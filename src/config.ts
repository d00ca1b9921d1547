/**
 * Centralized configuration
 * Read once from the environment; invalid numbers fall back to defaults.
 */

import type { AggregationPolicy, CombinerPolicy } from './shared/types.js';

const env = (name: string, fallback: string): string => process.env[name] ?? fallback;

function ratio(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 && n <= 1 ? n : fallback;
}

function positiveInt(name: string, fallback: number): number {
  const n = Number(process.env[name]);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

const ruleEngineWeight = ratio('RULE_ENGINE_WEIGHT', 0.6);

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),
  port: positiveInt('PORT', 3000),
  logLevel: env('LOG_LEVEL', 'info'),

  // ── Storage ──────────────────────────────────────────────────────
  storage: {
    ruleDbPath: env('RULE_DB_PATH', './data/rules.db'),
    factDbPath: env('FACT_DB_PATH', './data/facts.db'),
    eligibilityDbPath: env('ELIGIBILITY_DB_PATH', './data/eligibility.db'),
  },

  // ── Decision policy (product-owned constants) ────────────────────
  aggregation: {
    eligibleThreshold: ratio('ELIGIBLE_THRESHOLD', 0.8),
    notEligibleThreshold: ratio('NOT_ELIGIBLE_THRESHOLD', 0.4),
  } satisfies AggregationPolicy,

  combiner: {
    confidenceFloor: ratio('CONFIDENCE_FLOOR', 0.6),
    ruleEngineWeight,
    aiWeight: 1 - ruleEngineWeight,
  } satisfies CombinerPolicy,

  // ── Rule version cache ───────────────────────────────────────────
  cache: {
    maxEntries: positiveInt('RULE_VERSION_CACHE_MAX_ENTRIES', 1000),
  },

  // ── AI reasoning ─────────────────────────────────────────────────
  ai: {
    timeoutMs: positiveInt('AI_TIMEOUT_MS', 10000),
  },
} as const;

/** Default aggregation thresholds */
export const DEFAULT_AGGREGATION_POLICY: AggregationPolicy = config.aggregation;

/** Default fusion weights and escalation floor */
export const DEFAULT_COMBINER_POLICY: CombinerPolicy = config.combiner;

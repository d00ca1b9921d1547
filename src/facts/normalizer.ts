/**
 * Fact Normalizer
 * Resolves fact history to current values and coerces raw values into the
 * types an expression expects. Never fails: un-coercible values pass through
 * and surface as evaluation errors only where they are used.
 */

import type { Fact, FactScalar, FactValues, UsageContext } from '../shared/types.js';

const NUMERIC_STRING_REGEX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Most recently created fact per key.
 * Ties on created_at go to the fact that appears later in the input.
 */
export function selectCurrentFacts(facts: readonly Fact[]): Map<string, Fact> {
  const current = new Map<string, Fact>();
  for (const fact of facts) {
    const existing = current.get(fact.key);
    if (!existing || Date.parse(fact.created_at) >= Date.parse(existing.created_at)) {
      current.set(fact.key, fact);
    }
  }
  return current;
}

/** Prototype-free record, so keys such as toString or __proto__ are plain data */
function emptyValues(): Record<string, FactScalar> {
  return Object.create(null);
}

/** True when the fact values carry the key itself, not an inherited property */
export function hasFact(values: FactValues, key: string): boolean {
  return Object.hasOwn(values, key);
}

/** Value of a fact key, or undefined when the case has no such fact */
export function factValue(values: FactValues, key: string): FactScalar | undefined {
  return hasFact(values, key) ? values[key] : undefined;
}

/**
 * Flat map of current fact values. Facts whose current value is null are absent,
 * never replaced by a default.
 */
export function normalizeFacts(facts: readonly Fact[]): FactValues {
  const values = emptyValues();
  for (const [key, fact] of selectCurrentFacts(facts)) {
    if (fact.value !== null) {
      values[key] = fact.value;
    }
  }
  return values;
}

function toNumber(value: FactScalar): FactScalar {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (!NUMERIC_STRING_REGEX.test(trimmed)) return value;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : value;
}

function toBoolean(value: FactScalar): FactScalar {
  if (typeof value !== 'string') return value;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return value;
}

/**
 * Apply usage-driven coercion: numeric-looking strings become numbers in a
 * numeric context, "true"/"false" become booleans in a boolean context.
 * Keys without an inferred context are returned as-is. Does not mutate input.
 */
export function coerceFactValues(
  values: FactValues,
  usage: Readonly<Record<string, UsageContext>>
): FactValues {
  const coerced = emptyValues();
  for (const [key, value] of Object.entries(values)) {
    coerced[key] = value;
  }
  for (const [key, context] of Object.entries(usage)) {
    const raw = factValue(coerced, key);
    if (raw === undefined) continue;
    coerced[key] = context === 'number' ? toNumber(raw) : toBoolean(raw);
  }
  return coerced;
}

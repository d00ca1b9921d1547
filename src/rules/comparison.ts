/**
 * Rule Version Comparison
 * Requirement-level diff between two rule versions, matched by requirement_code.
 */

import type { JsonValue, RejectionReason, Requirement, RuleVersionComparison } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { getRuleVersionById } from './store.js';

export type ComparisonOutcome =
  | { ok: true; result: RuleVersionComparison }
  | { ok: false; errors: RejectionReason[] };

/** Structural equality; object key order is ignored */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && jsonEquals(item, other);
    });
  }

  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => {
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && jsonEquals(left, right);
  });
}

/**
 * Diff requirement lists. added/modified/unchanged follow `after` order;
 * removed follows `before` order.
 */
export function compareRequirements(
  before: readonly Requirement[],
  after: readonly Requirement[]
): RuleVersionComparison {
  const beforeByCode = new Map(before.map((r) => [r.requirement_code, r]));
  const afterCodes = new Set(after.map((r) => r.requirement_code));
  const comparison: RuleVersionComparison = { added: [], removed: [], modified: [], unchanged: [] };

  for (const next of after) {
    const prev = beforeByCode.get(next.requirement_code);
    if (!prev) {
      comparison.added.push(next);
      continue;
    }

    const changes: RuleVersionComparison['modified'][number]['changes'] = [];
    if (prev.label !== next.label) {
      changes.push({ field: 'label', old: prev.label, new: next.label });
    }
    if (prev.mandatory !== next.mandatory) {
      changes.push({ field: 'mandatory', old: prev.mandatory, new: next.mandatory });
    }
    if (!jsonEquals(prev.expression, next.expression)) {
      changes.push({ field: 'expression', old: prev.expression, new: next.expression });
    }

    if (changes.length > 0) {
      comparison.modified.push({ requirement_code: next.requirement_code, changes });
    } else {
      comparison.unchanged.push(next.requirement_code);
    }
  }

  comparison.removed = before.filter((r) => !afterCodes.has(r.requirement_code));
  return comparison;
}

/**
 * Compare two stored rule versions (before → after).
 */
export function compareRuleVersions(beforeId: string, afterId: string): ComparisonOutcome {
  const errors: RejectionReason[] = [];
  const before = getRuleVersionById(beforeId);
  const after = getRuleVersionById(afterId);

  if (!before) {
    errors.push({
      code: ErrorCodes.RULE_VERSION_NOT_FOUND,
      message: `Rule version '${beforeId}' not found`,
      field_path: 'before',
    });
  }
  if (!after) {
    errors.push({
      code: ErrorCodes.RULE_VERSION_NOT_FOUND,
      message: `Rule version '${afterId}' not found`,
      field_path: 'after',
    });
  }
  if (!before || !after) {
    return { ok: false, errors };
  }

  return { ok: true, result: compareRequirements(before.requirements, after.requirements) };
}

/**
 * Rule Authoring
 * Draft, publish and close rule versions. Publishing is the only write that
 * can break the "one published version per date" invariant, so it runs the
 * conflict check and a compare-and-swap on monotonic_version in one
 * transaction.
 */

import * as crypto from 'crypto';
import type {
  DateRange,
  RejectionReason,
  Requirement,
  RuleVersion,
  RuleVersionConflict,
  RuleVersionProvider,
} from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { isCalendarDate } from '../shared/dates.js';
import { componentLogger } from '../shared/logger.js';
import { validateExpression, formatExpressionIssues } from './expression-validator.js';
import { analyzeGaps as findCoverageGaps, detectConflicts as detectRangeConflicts } from './conflict-detector.js';
import * as ruleStore from './store.js';

const log = componentLogger('rule-authoring');

/** Outcome of an authoring operation */
export type AuthoringOutcome =
  | { ok: true; result: RuleVersion }
  | { ok: false; errors: RejectionReason[] };

export interface RuleVersionDraftInput {
  rule_set_id: string;
  effective_from: string;
  effective_to?: string | null;
  requirements: Requirement[];
}

export interface RuleVersionPublishedEvent {
  rule_set_id: string;
  rule_version_id: string;
  /** 'closed' = an already published version had its range shortened */
  change: 'published' | 'closed';
}

type PublishListener = (event: RuleVersionPublishedEvent) => void;

const listeners = new Set<PublishListener>();

/**
 * Subscribe to publish events. Returns an unsubscribe function.
 */
export function onRuleVersionPublished(listener: PublishListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

function emitPublished(event: RuleVersionPublishedEvent): void {
  for (const listener of listeners) {
    listener(event);
  }
}

// =============================================================================
// Validation
// =============================================================================

function validateRange(effectiveFrom: string, effectiveTo: string | null): RejectionReason[] {
  const errors: RejectionReason[] = [];
  if (!isCalendarDate(effectiveFrom)) {
    errors.push({
      code: ErrorCodes.INVALID_DATE,
      message: 'effective_from must be a YYYY-MM-DD calendar date',
      field_path: 'effective_from',
    });
  }
  if (effectiveTo !== null && !isCalendarDate(effectiveTo)) {
    errors.push({
      code: ErrorCodes.INVALID_DATE,
      message: 'effective_to must be a YYYY-MM-DD calendar date or null',
      field_path: 'effective_to',
    });
  }
  if (errors.length === 0 && effectiveTo !== null && effectiveTo < effectiveFrom) {
    errors.push({
      code: ErrorCodes.INVALID_DATE_RANGE,
      message: `effective_to (${effectiveTo}) is before effective_from (${effectiveFrom})`,
      field_path: 'effective_to',
    });
  }
  return errors;
}

function validateRequirements(requirements: readonly Requirement[]): RejectionReason[] {
  const errors: RejectionReason[] = [];
  const seen = new Set<string>();

  for (const [i, requirement] of requirements.entries()) {
    const code = requirement.requirement_code.trim();
    if (code === '') {
      errors.push({
        code: ErrorCodes.MISSING_REQUIRED_FIELD,
        message: 'requirement_code is required',
        field_path: `requirements[${i}].requirement_code`,
      });
    } else if (seen.has(code)) {
      errors.push({
        code: ErrorCodes.DUPLICATE_REQUIREMENT_CODE,
        message: `requirement_code '${code}' appears more than once`,
        field_path: `requirements[${i}].requirement_code`,
      });
    }
    seen.add(code);

    const validation = validateExpression(requirement.expression);
    if (!validation.ok) {
      errors.push({
        code: ErrorCodes.INVALID_EXPRESSION,
        message: formatExpressionIssues(validation.errors).join('; '),
        field_path: `requirements[${i}].expression`,
      });
    }
  }

  return errors;
}

function validateDraft(input: RuleVersionDraftInput): RejectionReason[] {
  const errors: RejectionReason[] = [];
  if (input.rule_set_id.trim() === '') {
    errors.push({
      code: ErrorCodes.MISSING_REQUIRED_FIELD,
      message: 'rule_set_id is required',
      field_path: 'rule_set_id',
    });
  }
  errors.push(...validateRange(input.effective_from, input.effective_to ?? null));
  errors.push(...validateRequirements(input.requirements));
  return errors;
}

function notFound(ruleVersionId: string): AuthoringOutcome {
  return {
    ok: false,
    errors: [
      {
        code: ErrorCodes.RULE_VERSION_NOT_FOUND,
        message: `Rule version '${ruleVersionId}' not found`,
        field_path: 'rule_version_id',
      },
    ],
  };
}

function staleVersion(current: RuleVersion, expectedVersion: number): AuthoringOutcome {
  return {
    ok: false,
    errors: [
      {
        code: ErrorCodes.OPTIMISTIC_LOCK_CONFLICT,
        message: `Rule version '${current.rule_version_id}' is at monotonic_version ${current.monotonic_version}, expected ${expectedVersion}; re-fetch and retry`,
        field_path: 'monotonic_version',
      },
    ],
  };
}

function conflictErrors(conflicts: readonly RuleVersionConflict[]): RejectionReason[] {
  return conflicts.map((c) => ({
    code: ErrorCodes.RULE_VERSION_CONFLICT,
    message: `Effective range ${c.conflict_type === 'overlap' ? 'overlaps' : c.conflict_type === 'contains' ? 'contains' : 'is contained by'} published rule version '${c.rule_version_id}' [${c.effective_from}, ${c.effective_to ?? 'open'}]`,
    field_path: 'effective_from',
  }));
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Create an unpublished rule version.
 * Expressions are validated up front so a published version never holds an
 * invalid one.
 */
export function createRuleVersion(input: RuleVersionDraftInput): AuthoringOutcome {
  const errors = validateDraft(input);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const version: RuleVersion = {
    rule_version_id: crypto.randomUUID(),
    rule_set_id: input.rule_set_id,
    effective_from: input.effective_from,
    effective_to: input.effective_to ?? null,
    published: false,
    monotonic_version: 1,
    created_at: new Date().toISOString(),
    requirements: input.requirements.map((r) => ({ ...r, requirement_code: r.requirement_code.trim() })),
  };

  ruleStore.insertRuleVersion(version);
  log.info(
    { rule_set_id: version.rule_set_id, rule_version_id: version.rule_version_id },
    'rule version draft created'
  );
  return { ok: true, result: version };
}

/**
 * Replace a draft's range and requirements.
 * Fails with optimistic_lock_conflict when expectedVersion is stale.
 */
export function updateDraftRuleVersion(
  ruleVersionId: string,
  expectedVersion: number,
  input: Omit<RuleVersionDraftInput, 'rule_set_id'>
): AuthoringOutcome {
  const current = ruleStore.getRuleVersionById(ruleVersionId);
  if (!current) return notFound(ruleVersionId);

  if (current.published) {
    return {
      ok: false,
      errors: [
        {
          code: ErrorCodes.RULE_VERSION_NOT_EDITABLE,
          message: `Rule version '${ruleVersionId}' is published; create a new version instead`,
          field_path: 'rule_version_id',
        },
      ],
    };
  }

  const errors = validateDraft({ ...input, rule_set_id: current.rule_set_id });
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const requirements = input.requirements.map((r) => ({ ...r, requirement_code: r.requirement_code.trim() }));
  const effectiveTo = input.effective_to ?? null;
  const applied = ruleStore.replaceDraft(ruleVersionId, expectedVersion, {
    effective_from: input.effective_from,
    effective_to: effectiveTo,
    requirements,
  });
  if (!applied) {
    return staleVersion(ruleStore.getRuleVersionById(ruleVersionId) ?? current, expectedVersion);
  }

  return {
    ok: true,
    result: {
      ...current,
      effective_from: input.effective_from,
      effective_to: effectiveTo,
      requirements,
      monotonic_version: expectedVersion + 1,
    },
  };
}

/**
 * Publish a draft.
 *
 * Rejected with rule_version_conflict when its range collides with any
 * published version of the same rule set, and with optimistic_lock_conflict
 * when expectedVersion is stale. Emits a publish event on success.
 */
export function publishRuleVersion(ruleVersionId: string, expectedVersion: number): AuthoringOutcome {
  const outcome = ruleStore.runInRuleTransaction((): AuthoringOutcome => {
    const current = ruleStore.getRuleVersionById(ruleVersionId);
    if (!current) return notFound(ruleVersionId);
    if (current.monotonic_version !== expectedVersion) return staleVersion(current, expectedVersion);
    if (current.published) {
      return {
        ok: false,
        errors: [
          {
            code: ErrorCodes.RULE_VERSION_NOT_EDITABLE,
            message: `Rule version '${ruleVersionId}' is already published`,
            field_path: 'rule_version_id',
          },
        ],
      };
    }

    const conflicts = detectRangeConflicts(
      ruleStore.listPublishedRuleVersions(current.rule_set_id),
      current.rule_set_id,
      current.effective_from,
      current.effective_to,
      { excludeVersionId: current.rule_version_id, publishedOnly: true }
    );
    if (conflicts.length > 0) {
      return { ok: false, errors: conflictErrors(conflicts) };
    }

    const applied = ruleStore.updateRuleVersionState(ruleVersionId, expectedVersion, {
      published: true,
      effective_to: current.effective_to,
    });
    if (!applied) return staleVersion(current, expectedVersion);

    return {
      ok: true,
      result: { ...current, published: true, monotonic_version: expectedVersion + 1 },
    };
  });

  if (!outcome.ok) {
    log.warn(
      { rule_version_id: ruleVersionId, codes: outcome.errors.map((e) => e.code) },
      'rule version publish rejected'
    );
    return outcome;
  }

  log.info(
    { rule_set_id: outcome.result.rule_set_id, rule_version_id: ruleVersionId },
    'rule version published'
  );
  emitPublished({
    rule_set_id: outcome.result.rule_set_id,
    rule_version_id: ruleVersionId,
    change: 'published',
  });
  return outcome;
}

/**
 * End a version's effective range at effectiveTo (inclusive), typically so a
 * successor can be published. A range may only shrink, so no new conflict can
 * arise.
 */
export function closeRuleVersion(
  ruleVersionId: string,
  expectedVersion: number,
  effectiveTo: string
): AuthoringOutcome {
  const outcome = ruleStore.runInRuleTransaction((): AuthoringOutcome => {
    const current = ruleStore.getRuleVersionById(ruleVersionId);
    if (!current) return notFound(ruleVersionId);
    if (current.monotonic_version !== expectedVersion) return staleVersion(current, expectedVersion);

    const errors = validateRange(current.effective_from, effectiveTo);
    if (errors.length === 0 && current.effective_to !== null && effectiveTo > current.effective_to) {
      errors.push({
        code: ErrorCodes.INVALID_DATE_RANGE,
        message: `effective_to may only move earlier (currently ${current.effective_to})`,
        field_path: 'effective_to',
      });
    }
    if (errors.length > 0) return { ok: false, errors };

    const applied = ruleStore.updateRuleVersionState(ruleVersionId, expectedVersion, {
      published: current.published,
      effective_to: effectiveTo,
    });
    if (!applied) return staleVersion(current, expectedVersion);

    return {
      ok: true,
      result: { ...current, effective_to: effectiveTo, monotonic_version: expectedVersion + 1 },
    };
  });

  if (outcome.ok && outcome.result.published) {
    log.info(
      { rule_set_id: outcome.result.rule_set_id, rule_version_id: ruleVersionId, effective_to: effectiveTo },
      'published rule version closed'
    );
    emitPublished({
      rule_set_id: outcome.result.rule_set_id,
      rule_version_id: ruleVersionId,
      change: 'closed',
    });
  }
  return outcome;
}

/**
 * Versions of a rule set (drafts included) that a proposed range would collide with.
 */
export function detectConflicts(
  ruleSetId: string,
  effectiveFrom: string,
  effectiveTo: string | null
): RuleVersionConflict[] {
  return detectRangeConflicts(ruleStore.listRuleVersions(ruleSetId), ruleSetId, effectiveFrom, effectiveTo);
}

/**
 * Date ranges of a rule set not covered by any published version.
 */
export function analyzeGaps(ruleSetId: string, window?: DateRange): DateRange[] {
  return findCoverageGaps(ruleStore.listPublishedRuleVersions(ruleSetId), ruleSetId, window);
}

/** RuleVersionProvider backed by the rule store */
export const storedRuleVersionProvider: RuleVersionProvider = {
  publishedVersions: (ruleSetId) => ruleStore.listPublishedRuleVersions(ruleSetId),
};

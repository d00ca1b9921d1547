/**
 * Rule Version Resolver
 * Picks the published rule version whose effective range contains a date.
 */

import type { ResolutionOutcome, RuleVersion } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';

/** True when the version's inclusive range contains asOf */
export function isEffectiveOn(version: RuleVersion, asOf: string): boolean {
  return (
    version.effective_from <= asOf &&
    (version.effective_to === null || asOf <= version.effective_to)
  );
}

/**
 * Resolve the rule version in force for a rule set on a date.
 *
 * - none qualifies → no_active_rule_version
 * - several qualify → the latest created_at wins (ties: later input entry),
 *   with a data-integrity warning naming every candidate
 */
export function resolveRuleVersion(
  versions: readonly RuleVersion[],
  ruleSetId: string,
  asOf: string
): ResolutionOutcome {
  const candidates = versions.filter(
    (v) => v.rule_set_id === ruleSetId && v.published && isEffectiveOn(v, asOf)
  );

  let selected: RuleVersion | undefined;
  for (const candidate of candidates) {
    if (!selected || Date.parse(candidate.created_at) >= Date.parse(selected.created_at)) {
      selected = candidate;
    }
  }

  if (!selected) {
    return {
      ok: false,
      error: {
        code: ErrorCodes.NO_ACTIVE_RULE_VERSION,
        message: `No published rule version of '${ruleSetId}' is effective on ${asOf}`,
        field_path: 'as_of',
      },
    };
  }

  const warnings: string[] = [];
  if (candidates.length > 1) {
    const ids = candidates.map((c) => c.rule_version_id).join(', ');
    warnings.push(
      `${candidates.length} published rule versions of '${ruleSetId}' are effective on ${asOf} (${ids}); using most recently created '${selected.rule_version_id}'`
    );
  }

  return { ok: true, version: selected, warnings };
}

/**
 * Conflict Detector
 * Authoring-time checks that keep published effective ranges disjoint,
 * plus gap and overlap reports over a rule set's published coverage.
 *
 * Ranges are compared half-open: an inclusive effective_to becomes an
 * exclusive end one day later, and a null end is +infinity.
 */

import type {
  DateRange,
  RangeOverlap,
  RangeRelation,
  RuleVersion,
  RuleVersionConflict,
} from '../shared/types.js';
import { addDays, endBefore, exclusiveEnd } from '../shared/dates.js';

export interface DetectConflictsOptions {
  /** Ignore this version (the one being published or edited) */
  excludeVersionId?: string;
  /** Only compare against published versions */
  publishedOnly?: boolean;
}

function intersects(a: DateRange, b: DateRange): boolean {
  return (
    endBefore(a.effective_from, exclusiveEnd(b.effective_to)) &&
    endBefore(b.effective_from, exclusiveEnd(a.effective_to))
  );
}

function covers(outer: DateRange, inner: DateRange): boolean {
  return (
    outer.effective_from <= inner.effective_from &&
    !endBefore(exclusiveEnd(outer.effective_to), exclusiveEnd(inner.effective_to))
  );
}

/**
 * Relation of range a to range b.
 * Identical ranges are an overlap, so the relation stays symmetric.
 */
export function classifyRanges(a: DateRange, b: DateRange): RangeRelation {
  if (!intersects(a, b)) return 'no_conflict';
  const aCoversB = covers(a, b);
  const bCoversA = covers(b, a);
  if (aCoversB && bCoversA) return 'overlap';
  if (aCoversB) return 'contains';
  if (bCoversA) return 'contained_by';
  return 'overlap';
}

/**
 * Versions of a rule set whose range collides with [effectiveFrom, effectiveTo].
 * conflict_type describes the proposed range relative to the existing version.
 */
export function detectConflicts(
  versions: readonly RuleVersion[],
  ruleSetId: string,
  effectiveFrom: string,
  effectiveTo: string | null,
  options: DetectConflictsOptions = {}
): RuleVersionConflict[] {
  const proposed: DateRange = { effective_from: effectiveFrom, effective_to: effectiveTo };
  const conflicts: RuleVersionConflict[] = [];

  for (const version of versions) {
    if (version.rule_set_id !== ruleSetId) continue;
    if (version.rule_version_id === options.excludeVersionId) continue;
    if (options.publishedOnly && !version.published) continue;

    const relation = classifyRanges(proposed, version);
    if (relation === 'no_conflict') continue;

    conflicts.push({
      rule_version_id: version.rule_version_id,
      effective_from: version.effective_from,
      effective_to: version.effective_to,
      published: version.published,
      conflict_type: relation,
    });
  }

  return conflicts;
}

function publishedRanges(versions: readonly RuleVersion[], ruleSetId: string): RuleVersion[] {
  return versions
    .filter((v) => v.rule_set_id === ruleSetId && v.published)
    .sort((a, b) => (a.effective_from < b.effective_from ? -1 : a.effective_from > b.effective_from ? 1 : 0));
}

/**
 * Date sub-ranges inside the window that no published version covers.
 * The default window runs from the earliest published effective_from to
 * +infinity; with nothing published and no window there is nothing to report.
 */
export function analyzeGaps(
  versions: readonly RuleVersion[],
  ruleSetId: string,
  window?: DateRange
): DateRange[] {
  const published = publishedRanges(versions, ruleSetId);
  const first = published[0];
  const bounds: DateRange | undefined =
    window ?? (first ? { effective_from: first.effective_from, effective_to: null } : undefined);
  if (!bounds) return [];

  const windowEnd = exclusiveEnd(bounds.effective_to);
  const gaps: DateRange[] = [];
  // First uncovered day; null once coverage reaches +infinity
  let cursor: string | null = bounds.effective_from;

  for (const version of published) {
    if (cursor === null || !endBefore(cursor, windowEnd)) break;
    if (!intersects(version, bounds)) continue;

    if (version.effective_from > cursor) {
      const gapEnd = endBefore(windowEnd, version.effective_from) ? windowEnd : version.effective_from;
      if (gapEnd !== null) {
        gaps.push({ effective_from: cursor, effective_to: addDays(gapEnd, -1) });
      }
    }

    const versionEnd = exclusiveEnd(version.effective_to);
    if (endBefore(cursor, versionEnd)) cursor = versionEnd;
  }

  if (cursor !== null && endBefore(cursor, windowEnd)) {
    gaps.push({
      effective_from: cursor,
      effective_to: windowEnd === null ? null : addDays(windowEnd, -1),
    });
  }

  return gaps;
}

/**
 * Pairwise intersections between published versions of a rule set.
 * Empty whenever the authoring checks have held.
 */
export function findOverlaps(versions: readonly RuleVersion[], ruleSetId: string): RangeOverlap[] {
  const published = publishedRanges(versions, ruleSetId);
  const overlaps: RangeOverlap[] = [];

  for (const [i, a] of published.entries()) {
    for (const b of published.slice(i + 1)) {
      if (!intersects(a, b)) continue;
      const from = a.effective_from > b.effective_from ? a.effective_from : b.effective_from;
      const end = endBefore(exclusiveEnd(a.effective_to), exclusiveEnd(b.effective_to))
        ? a.effective_to
        : b.effective_to;
      overlaps.push({
        rule_version_ids: [a.rule_version_id, b.rule_version_id],
        effective_from: from,
        effective_to: end,
      });
    }
  }

  return overlaps;
}

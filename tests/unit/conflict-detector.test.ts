/**
 * Unit tests for the Conflict Detector
 * Range classification, conflict detection, gap analysis and overlap reports
 */

import { describe, it, expect } from 'vitest';
import {
  classifyRanges,
  detectConflicts,
  analyzeGaps,
  findOverlaps,
} from '../../src/rules/conflict-detector.js';
import type { DateRange, RuleVersion } from '../../src/shared/types.js';

function range(effective_from: string, effective_to: string | null): DateRange {
  return { effective_from, effective_to };
}

function version(
  rule_version_id: string,
  effective_from: string,
  effective_to: string | null,
  published = true
): RuleVersion {
  return {
    rule_version_id,
    rule_set_id: 'visa-a',
    effective_from,
    effective_to,
    published,
    monotonic_version: 1,
    created_at: '2024-01-01T00:00:00Z',
    requirements: [],
  };
}

describe('Conflict Detector', () => {
  // ---------------------------------------------------------------------------
  // classifyRanges
  // ---------------------------------------------------------------------------

  describe('classifyRanges', () => {
    it('classifies a partial intersection as overlap in both directions', () => {
      const a = range('2024-01-01', '2024-06-30');
      const b = range('2024-04-01', null);

      expect(classifyRanges(a, b)).toBe('overlap');
      expect(classifyRanges(b, a)).toBe('overlap');
    });

    it('treats adjacent ranges as disjoint', () => {
      expect(classifyRanges(range('2024-01-01', '2024-03-31'), range('2024-04-01', null))).toBe('no_conflict');
    });

    it('detects a one-day intersection', () => {
      expect(classifyRanges(range('2024-01-01', '2024-04-01'), range('2024-04-01', null))).toBe('overlap');
    });

    it('distinguishes contains from contained_by', () => {
      const outer = range('2024-01-01', null);
      const inner = range('2024-03-01', '2024-04-30');

      expect(classifyRanges(outer, inner)).toBe('contains');
      expect(classifyRanges(inner, outer)).toBe('contained_by');
    });

    it('classifies a shared start with a shorter end as contained_by', () => {
      expect(classifyRanges(range('2024-01-01', '2024-06-30'), range('2024-01-01', null))).toBe('contained_by');
    });

    it('classifies identical ranges as overlap', () => {
      expect(classifyRanges(range('2024-01-01', null), range('2024-01-01', null))).toBe('overlap');
      expect(classifyRanges(range('2024-01-01', '2024-01-31'), range('2024-01-01', '2024-01-31'))).toBe('overlap');
    });

    it('treats an end of 9999-12-31 as open-ended', () => {
      const forever = range('2024-01-01', '9999-12-31');

      expect(classifyRanges(range('2025-01-01', null), forever)).toBe('contained_by');
      expect(classifyRanges(forever, range('2025-01-01', '2025-12-31'))).toBe('contains');
      expect(classifyRanges(forever, range('2024-01-01', null))).toBe('overlap');
    });
  });

  describe('9999-12-31 end dates', () => {
    it('blocks an open-ended version starting inside a range that ends on 9999-12-31', () => {
      const conflicts = detectConflicts([version('rv-1', '2024-01-01', '9999-12-31')], 'visa-a', '2025-01-01', null);

      expect(conflicts).toEqual([
        {
          rule_version_id: 'rv-1',
          effective_from: '2024-01-01',
          effective_to: '9999-12-31',
          published: true,
          conflict_type: 'contained_by',
        },
      ]);
    });

    it('reports no trailing gap after a range that ends on 9999-12-31', () => {
      expect(analyzeGaps([version('rv-1', '2024-01-01', '9999-12-31')], 'visa-a')).toEqual([]);
    });

    it('reports the intersection with an open-ended version', () => {
      const versions = [version('rv-1', '2024-01-01', '9999-12-31'), version('rv-2', '2025-01-01', null)];

      expect(findOverlaps(versions, 'visa-a')).toEqual([
        { rule_version_ids: ['rv-1', 'rv-2'], effective_from: '2025-01-01', effective_to: null },
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // detectConflicts
  // ---------------------------------------------------------------------------

  describe('detectConflicts', () => {
    const versions = [
      version('rv-1', '2024-01-01', '2024-06-30'),
      version('rv-2', '2024-04-01', null, false),
      { ...version('other', '2024-01-01', null), rule_set_id: 'visa-b' },
    ];

    it('reports every version of the rule set that collides', () => {
      expect(detectConflicts(versions, 'visa-a', '2024-04-01', null)).toEqual([
        {
          rule_version_id: 'rv-1',
          effective_from: '2024-01-01',
          effective_to: '2024-06-30',
          published: true,
          conflict_type: 'overlap',
        },
        {
          rule_version_id: 'rv-2',
          effective_from: '2024-04-01',
          effective_to: null,
          published: false,
          conflict_type: 'overlap',
        },
      ]);
    });

    it('skips the excluded version', () => {
      const conflicts = detectConflicts(versions, 'visa-a', '2024-04-01', null, { excludeVersionId: 'rv-2' });

      expect(conflicts.map((c) => c.rule_version_id)).toEqual(['rv-1']);
    });

    it('skips drafts when only published versions count', () => {
      const conflicts = detectConflicts(versions, 'visa-a', '2024-05-01', '2024-05-31', { publishedOnly: true });

      expect(conflicts).toHaveLength(1);
      expect(conflicts[0]?.rule_version_id).toBe('rv-1');
      expect(conflicts[0]?.conflict_type).toBe('contained_by');
    });

    it('returns nothing for an adjacent range', () => {
      expect(detectConflicts(versions, 'visa-a', '2024-07-01', null, { publishedOnly: true })).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // analyzeGaps
  // ---------------------------------------------------------------------------

  describe('analyzeGaps', () => {
    it('finds interior and trailing gaps from the earliest published start', () => {
      const versions = [
        version('rv-3', '2024-05-01', '2024-06-30'),
        version('rv-1', '2024-01-01', '2024-03-31'),
        version('draft', '2024-04-01', '2024-04-30', false),
      ];

      expect(analyzeGaps(versions, 'visa-a')).toEqual([
        range('2024-04-01', '2024-04-30'),
        range('2024-07-01', null),
      ]);
    });

    it('clips gaps to an explicit window', () => {
      const versions = [version('rv-1', '2024-03-01', null)];

      expect(analyzeGaps(versions, 'visa-a', range('2024-01-01', '2024-12-31'))).toEqual([
        range('2024-01-01', '2024-02-29'),
      ]);
    });

    it('reports the whole window when nothing is published', () => {
      expect(analyzeGaps([], 'visa-a', range('2024-01-01', '2024-01-31'))).toEqual([
        range('2024-01-01', '2024-01-31'),
      ]);
    });

    it('returns nothing without published versions or a window', () => {
      expect(analyzeGaps([version('draft', '2024-01-01', null, false)], 'visa-a')).toEqual([]);
    });

    it('returns nothing when coverage is continuous', () => {
      const versions = [version('rv-1', '2024-01-01', '2024-03-31'), version('rv-2', '2024-04-01', null)];

      expect(analyzeGaps(versions, 'visa-a')).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // findOverlaps
  // ---------------------------------------------------------------------------

  describe('findOverlaps', () => {
    it('reports the intersection of two published versions', () => {
      const versions = [version('rv-2', '2024-04-01', null), version('rv-1', '2024-01-01', '2024-06-30')];

      expect(findOverlaps(versions, 'visa-a')).toEqual([
        { rule_version_ids: ['rv-1', 'rv-2'], effective_from: '2024-04-01', effective_to: '2024-06-30' },
      ]);
    });

    it('ignores drafts and disjoint versions', () => {
      const versions = [
        version('rv-1', '2024-01-01', '2024-03-31'),
        version('rv-2', '2024-04-01', null),
        version('draft', '2024-02-01', null, false),
      ];

      expect(findOverlaps(versions, 'visa-a')).toEqual([]);
    });
  });
});

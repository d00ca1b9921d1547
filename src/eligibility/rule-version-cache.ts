/**
 * Rule Version Cache
 * Read-through cache of resolution outcomes keyed by (rule_set_id, as_of day).
 * Owned by the orchestration; the pure resolver never sees it.
 * Entries for a rule set are dropped when one of its versions is published.
 * Holds at most maxEntries outcomes; the least recently used one is evicted first.
 */

import type { ResolutionOutcome, RuleVersionProvider } from '../shared/types.js';
import { config } from '../config.js';
import { resolveRuleVersion } from '../rules/version-resolver.js';

/** Anything that can resolve the rule version in force on a date */
export interface RuleVersionSource {
  resolve(ruleSetId: string, asOf: string): ResolutionOutcome;
}

export interface RuleVersionCache extends RuleVersionSource {
  /** Drop every cached entry of a rule set */
  invalidate(ruleSetId: string): void;
  clear(): void;
  readonly size: number;
}

interface CacheEntry {
  ruleSetId: string;
  outcome: ResolutionOutcome;
}

/** Uncached source that asks the provider on every call */
export function directRuleVersionSource(provider: RuleVersionProvider): RuleVersionSource {
  return {
    resolve: (ruleSetId, asOf) => resolveRuleVersion(provider.publishedVersions(ruleSetId), ruleSetId, asOf),
  };
}

export function createRuleVersionCache(
  provider: RuleVersionProvider,
  maxEntries: number = config.cache.maxEntries
): RuleVersionCache {
  // Map iteration order doubles as recency order: oldest first
  const entries = new Map<string, CacheEntry>();
  const source = directRuleVersionSource(provider);
  const keyOf = (ruleSetId: string, asOf: string): string => JSON.stringify([ruleSetId, asOf]);

  return {
    resolve(ruleSetId, asOf) {
      const key = keyOf(ruleSetId, asOf);
      const cached = entries.get(key);
      if (cached) {
        entries.delete(key);
        entries.set(key, cached);
        return cached.outcome;
      }

      const outcome = source.resolve(ruleSetId, asOf);
      entries.set(key, { ruleSetId, outcome });
      for (const oldest of entries.keys()) {
        if (entries.size <= maxEntries) break;
        entries.delete(oldest);
      }
      return outcome;
    },

    invalidate(ruleSetId) {
      for (const [key, entry] of entries) {
        if (entry.ruleSetId === ruleSetId) entries.delete(key);
      }
    },

    clear() {
      entries.clear();
    },

    get size() {
      return entries.size;
    },
  };
}

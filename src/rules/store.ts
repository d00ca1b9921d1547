/**
 * Rule Store
 * SQLite-backed storage for rule versions and their ordered requirements.
 *
 * Core guarantees:
 * - Every mutation bumps monotonic_version and is conditioned on the
 *   expected value (compare-and-swap); a stale writer changes nothing
 * - Requirements keep their authored order (position)
 * - Published rows are never rewritten except to close their range
 */

import Database from 'better-sqlite3';
import type { Requirement, RuleVersion } from '../shared/types.js';

let db: Database.Database | null = null;

function requireDb(): Database.Database {
  if (!db) {
    throw new Error('Rule store not initialized. Call initRuleStore first.');
  }
  return db;
}

/**
 * Initialize the rule store with SQLite.
 *
 * @param dbPath - Path to SQLite database file, or ':memory:' for in-memory
 */
export function initRuleStore(dbPath: string): void {
  db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS rule_versions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      rule_version_id TEXT NOT NULL UNIQUE,
      rule_set_id TEXT NOT NULL,
      effective_from TEXT NOT NULL,
      effective_to TEXT,
      published INTEGER NOT NULL DEFAULT 0,
      monotonic_version INTEGER NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS requirements (
      rule_version_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      requirement_code TEXT NOT NULL,
      label TEXT NOT NULL,
      mandatory INTEGER NOT NULL,
      expression TEXT NOT NULL,
      PRIMARY KEY (rule_version_id, requirement_code),
      UNIQUE (rule_version_id, position)
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_rule_versions_set
    ON rule_versions(rule_set_id, published, effective_from)
  `);

  db.pragma('journal_mode = WAL');
}

/**
 * Close the database connection.
 * Call this during graceful shutdown.
 */
export function closeRuleStore(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run fn inside one SQLite transaction. Reads inside see a consistent
 * snapshot; a throw rolls everything back.
 */
export function runInRuleTransaction<T>(fn: () => T): T {
  return requireDb().transaction(fn)();
}

/**
 * Insert a new rule version with its requirements.
 *
 * @throws Error on UNIQUE constraint (duplicate rule_version_id or requirement_code)
 */
export function insertRuleVersion(version: RuleVersion): void {
  const database = requireDb();

  const insertVersion = database.prepare<[string, string, string, string | null, number, number, string]>(`
    INSERT INTO rule_versions (
      rule_version_id, rule_set_id, effective_from, effective_to, published, monotonic_version, created_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  database.transaction((v: RuleVersion) => {
    insertVersion.run(
      v.rule_version_id,
      v.rule_set_id,
      v.effective_from,
      v.effective_to,
      v.published ? 1 : 0,
      v.monotonic_version,
      v.created_at
    );
    insertRequirements(database, v.rule_version_id, v.requirements);
  })(version);
}

/**
 * Replace a draft's range and requirements if its monotonic_version still
 * equals expectedVersion.
 *
 * @returns true when the write applied, false when the row was stale, missing or published
 */
export function replaceDraft(
  ruleVersionId: string,
  expectedVersion: number,
  patch: { effective_from: string; effective_to: string | null; requirements: Requirement[] }
): boolean {
  const database = requireDb();

  const update = database.prepare<[string, string | null, string, number]>(`
    UPDATE rule_versions
    SET effective_from = ?, effective_to = ?, monotonic_version = monotonic_version + 1
    WHERE rule_version_id = ? AND monotonic_version = ? AND published = 0
  `);
  const clear = database.prepare<[string]>('DELETE FROM requirements WHERE rule_version_id = ?');

  return database.transaction(() => {
    const info = update.run(patch.effective_from, patch.effective_to, ruleVersionId, expectedVersion);
    if (info.changes === 0) return false;
    clear.run(ruleVersionId);
    insertRequirements(database, ruleVersionId, patch.requirements);
    return true;
  })();
}

/**
 * Flip published and/or effective_to if monotonic_version still equals expectedVersion.
 *
 * @returns true when the write applied
 */
export function updateRuleVersionState(
  ruleVersionId: string,
  expectedVersion: number,
  patch: { published: boolean; effective_to: string | null }
): boolean {
  const stmt = requireDb().prepare<[number, string | null, string, number]>(`
    UPDATE rule_versions
    SET published = ?, effective_to = ?, monotonic_version = monotonic_version + 1
    WHERE rule_version_id = ? AND monotonic_version = ?
  `);
  const info = stmt.run(patch.published ? 1 : 0, patch.effective_to, ruleVersionId, expectedVersion);
  return info.changes > 0;
}

/**
 * Retrieve a rule version with its requirements.
 *
 * @returns The RuleVersion or null if not found
 */
export function getRuleVersionById(ruleVersionId: string): RuleVersion | null {
  const database = requireDb();
  const row = database
    .prepare<[string], RuleVersionRow>(`${SELECT_VERSION} WHERE rule_version_id = ?`)
    .get(ruleVersionId);
  return row ? rowToRuleVersion(database, row) : null;
}

/**
 * All versions of a rule set (drafts included), oldest first.
 */
export function listRuleVersions(ruleSetId: string): RuleVersion[] {
  const database = requireDb();
  return database
    .prepare<[string], RuleVersionRow>(`${SELECT_VERSION} WHERE rule_set_id = ? ORDER BY created_at ASC, id ASC`)
    .all(ruleSetId)
    .map((row) => rowToRuleVersion(database, row));
}

/**
 * Published versions of a rule set, oldest first.
 */
export function listPublishedRuleVersions(ruleSetId: string): RuleVersion[] {
  const database = requireDb();
  return database
    .prepare<[string], RuleVersionRow>(
      `${SELECT_VERSION} WHERE rule_set_id = ? AND published = 1 ORDER BY created_at ASC, id ASC`
    )
    .all(ruleSetId)
    .map((row) => rowToRuleVersion(database, row));
}

/**
 * Clear all rule versions and requirements (for testing only).
 */
export function clearRuleStore(): void {
  const database = requireDb();
  database.exec('DELETE FROM requirements');
  database.exec('DELETE FROM rule_versions');
}

// =============================================================================
// Internal helpers
// =============================================================================

const SELECT_VERSION = `
  SELECT id, rule_version_id, rule_set_id, effective_from, effective_to,
         published, monotonic_version, created_at
  FROM rule_versions
`;

interface RuleVersionRow {
  id: number;
  rule_version_id: string;
  rule_set_id: string;
  effective_from: string;
  effective_to: string | null;
  published: number;
  monotonic_version: number;
  created_at: string;
}

interface RequirementRow {
  requirement_code: string;
  label: string;
  mandatory: number;
  expression: string;
}

function insertRequirements(
  database: Database.Database,
  ruleVersionId: string,
  requirements: readonly Requirement[]
): void {
  const insert = database.prepare<[string, number, string, string, number, string]>(`
    INSERT INTO requirements (rule_version_id, position, requirement_code, label, mandatory, expression)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  for (const [position, r] of requirements.entries()) {
    insert.run(
      ruleVersionId,
      position,
      r.requirement_code,
      r.label,
      r.mandatory ? 1 : 0,
      JSON.stringify(r.expression)
    );
  }
}

function rowToRuleVersion(database: Database.Database, row: RuleVersionRow): RuleVersion {
  const requirementRows = database
    .prepare<[string], RequirementRow>(`
      SELECT requirement_code, label, mandatory, expression
      FROM requirements
      WHERE rule_version_id = ?
      ORDER BY position ASC
    `)
    .all(row.rule_version_id);

  return {
    rule_version_id: row.rule_version_id,
    rule_set_id: row.rule_set_id,
    effective_from: row.effective_from,
    effective_to: row.effective_to,
    published: row.published === 1,
    monotonic_version: row.monotonic_version,
    created_at: row.created_at,
    requirements: requirementRows.map((r) => ({
      requirement_code: r.requirement_code,
      label: r.label,
      mandatory: r.mandatory === 1,
      expression: JSON.parse(r.expression) as Requirement['expression'],
    })),
  };
}

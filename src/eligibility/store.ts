/**
 * Eligibility Result Store
 * SQLite-backed immutable, append-only storage for eligibility results.
 *
 * Core guarantees:
 * - Immutability: no UPDATE or DELETE; a re-check stores a new result
 * - Cursor-based pagination in evaluation order (id ASC)
 */

import Database from 'better-sqlite3';
import type { EligibilityResult, GetEligibilityResultsRequest } from '../shared/types.js';

let db: Database.Database | null = null;

function requireDb(): Database.Database {
  if (!db) {
    throw new Error('Eligibility store not initialized. Call initEligibilityStore first.');
  }
  return db;
}

/**
 * Initialize the eligibility result store with SQLite.
 *
 * @param dbPath - Path to SQLite database file, or ':memory:' for in-memory
 */
export function initEligibilityStore(dbPath: string): void {
  db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS eligibility_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      result_id TEXT NOT NULL UNIQUE,
      case_id TEXT NOT NULL,
      rule_set_id TEXT NOT NULL,
      rule_version_id TEXT,
      as_of TEXT NOT NULL,
      evaluated_at TEXT NOT NULL,
      outcome TEXT NOT NULL,
      confidence REAL NOT NULL,
      requires_review INTEGER NOT NULL,
      payload TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_eligibility_results_case
    ON eligibility_results(case_id, id)
  `);

  db.pragma('journal_mode = WAL');
}

/**
 * Close the database connection.
 * Call this during graceful shutdown.
 */
export function closeEligibilityStore(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Persist a result. Insert only; duplicate result_id throws.
 *
 * @throws Error on UNIQUE constraint (duplicate result_id)
 */
export function saveEligibilityResult(result: EligibilityResult): void {
  requireDb()
    .prepare<[string, string, string, string | null, string, string, string, number, number, string]>(`
      INSERT INTO eligibility_results (
        result_id, case_id, rule_set_id, rule_version_id, as_of, evaluated_at,
        outcome, confidence, requires_review, payload
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      result.result_id,
      result.case_id,
      result.rule_set_id,
      result.rule_version_id,
      result.as_of,
      result.evaluated_at,
      result.outcome,
      result.confidence,
      result.requires_review ? 1 : 0,
      JSON.stringify(result)
    );
}

/**
 * Query a case's results with cursor-based pagination.
 *
 * @returns results, hasMore, and nextCursor (id of last row returned, for next page)
 */
export function getEligibilityResults(request: GetEligibilityResultsRequest): {
  results: EligibilityResult[];
  hasMore: boolean;
  nextCursor?: number;
} {
  const pageSize = Math.min(Math.max(1, request.page_size ?? 100), 1000);
  const cursorId = request.page_token ? decodePageToken(request.page_token) : 0;

  const rows = requireDb()
    .prepare<[string, number, number], ResultRow>(`
      SELECT id, payload
      FROM eligibility_results
      WHERE case_id = ? AND id > ?
      ORDER BY id ASC
      LIMIT ?
    `)
    .all(request.case_id, cursorId, pageSize + 1);

  const hasMore = rows.length > pageSize;
  const resultRows = hasMore ? rows.slice(0, pageSize) : rows;
  const lastRow = resultRows[resultRows.length - 1];

  return {
    results: resultRows.map(rowToResult),
    hasMore,
    nextCursor: hasMore && lastRow ? lastRow.id : undefined,
  };
}

/**
 * Retrieve a single result by result_id.
 *
 * @returns The EligibilityResult or null if not found
 */
export function getEligibilityResultById(resultId: string): EligibilityResult | null {
  const row = requireDb()
    .prepare<[string], ResultRow>('SELECT id, payload FROM eligibility_results WHERE result_id = ?')
    .get(resultId);
  return row ? rowToResult(row) : null;
}

/**
 * Clear all results (for testing only).
 */
export function clearEligibilityStore(): void {
  requireDb().exec('DELETE FROM eligibility_results');
}

// =============================================================================
// Internal helpers
// =============================================================================

interface ResultRow {
  id: number;
  payload: string;
}

function rowToResult(row: ResultRow): EligibilityResult {
  return JSON.parse(row.payload) as EligibilityResult;
}

/**
 * Decode page token to cursor id (v1:<id> base64).
 * Returns 0 if token is invalid.
 */
export function decodePageToken(token: string): number {
  const decoded = Buffer.from(token, 'base64').toString('utf-8');
  if (!decoded.startsWith('v1:')) {
    return 0;
  }
  const cursor = parseInt(decoded.substring(3), 10);
  return isNaN(cursor) || cursor < 0 ? 0 : cursor;
}

/**
 * Encode cursor id as page token.
 */
export function encodePageToken(cursorId: number): string {
  return Buffer.from(`v1:${cursorId}`).toString('base64');
}

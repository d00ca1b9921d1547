/**
 * Fact Store
 * SQLite-backed append-only fact history per case.
 *
 * Core guarantees:
 * - Immutability: no UPDATE or DELETE; a new value for a key is a new row
 * - History is returned in insertion order, so later insertions win
 *   created_at ties during normalization
 */

import Database from 'better-sqlite3';
import * as crypto from 'crypto';
import type { Fact, FactProvider, FactSource, FactValue, StoredFact } from '../shared/types.js';
import { FACT_SOURCES } from '../shared/types.js';

let db: Database.Database | null = null;

function requireDb(): Database.Database {
  if (!db) {
    throw new Error('Fact store not initialized. Call initFactStore first.');
  }
  return db;
}

/**
 * Initialize the fact store with SQLite.
 *
 * @param dbPath - Path to SQLite database file, or ':memory:' for in-memory
 */
export function initFactStore(dbPath: string): void {
  db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS facts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      fact_id TEXT NOT NULL UNIQUE,
      case_id TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      source TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_facts_case
    ON facts(case_id, id)
  `);

  db.pragma('journal_mode = WAL');
}

/**
 * Close the database connection.
 * Call this during graceful shutdown.
 */
export function closeFactStore(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Append one fact to a case's history.
 * Throws for a source outside FACT_SOURCES, which the HTTP schema already rejects.
 *
 * @returns The stored fact with its generated fact_id
 */
export function appendFact(caseId: string, fact: Fact): StoredFact {
  if (!FACT_SOURCES.includes(fact.source)) {
    throw new Error(`Fact source must be one of: ${FACT_SOURCES.join(', ')}`);
  }
  const stored: StoredFact = { fact_id: crypto.randomUUID(), case_id: caseId, ...fact };

  requireDb()
    .prepare<[string, string, string, string, string, string]>(`
      INSERT INTO facts (fact_id, case_id, key, value, source, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
    .run(
      stored.fact_id,
      stored.case_id,
      stored.key,
      JSON.stringify(stored.value),
      stored.source,
      stored.created_at
    );

  return stored;
}

/**
 * Full fact history for a case, in insertion order.
 */
export function getFactHistory(caseId: string): StoredFact[] {
  return requireDb()
    .prepare<[string], FactRow>(`
      SELECT fact_id, case_id, key, value, source, created_at
      FROM facts
      WHERE case_id = ?
      ORDER BY id ASC
    `)
    .all(caseId)
    .map(rowToFact);
}

/**
 * Clear all facts (for testing only).
 */
export function clearFactStore(): void {
  requireDb().exec('DELETE FROM facts');
}

/** FactProvider backed by the fact store */
export const storedFactProvider: FactProvider = {
  currentFacts: (caseId) => getFactHistory(caseId),
};

// =============================================================================
// Internal helpers
// =============================================================================

interface FactRow {
  fact_id: string;
  case_id: string;
  key: string;
  value: string;
  source: FactSource;
  created_at: string;
}

function rowToFact(row: FactRow): StoredFact {
  return {
    fact_id: row.fact_id,
    case_id: row.case_id,
    key: row.key,
    value: JSON.parse(row.value) as FactValue,
    source: row.source,
    created_at: row.created_at,
  };
}

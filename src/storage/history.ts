import Database from 'better-sqlite3';
import type { OracleReport, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One row per oracle run, aggregates only.
 */
const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  oracle_version TEXT NOT NULL,
  language TEXT NOT NULL,
  nonce TEXT NOT NULL DEFAULT '',
  fraction INTEGER NOT NULL,
  reference_total INTEGER NOT NULL,
  reference_sampled INTEGER NOT NULL,
  candidate_total INTEGER NOT NULL,
  candidate_sampled INTEGER NOT NULL,
  true_positives INTEGER NOT NULL,
  false_positives INTEGER NOT NULL,
  false_negatives INTEGER NOT NULL,
  recall_pct REAL NOT NULL,
  precision_pct REAL NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_language ON runs(language);
`;

/**
 * Run history wrapper around better-sqlite3.
 * Stores the serialized report of each recorded run.
 */
export class RunHistory {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Run history opened');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Run history migrated to v1');
        }
    }

    /**
     * Record one run. Returns the new run ID.
     */
    insertRun(report: OracleReport, oracleVersion: string, createdAt = new Date().toISOString()): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, oracle_version, language, nonce, fraction, reference_total, reference_sampled, candidate_total, candidate_sampled, true_positives, false_positives, false_negatives, recall_pct, precision_pct)
      VALUES (@created_at, @oracle_version, @language, @nonce, @fraction, @reference_total, @reference_sampled, @candidate_total, @candidate_sampled, @true_positives, @false_positives, @false_negatives, @recall_pct, @precision_pct)
    `);

        const result = stmt.run({ ...report, created_at: createdAt, oracle_version: oracleVersion });
        return Number(result.lastInsertRowid);
    }

    /**
     * List recorded runs, newest first.
     */
    listRuns(options: { limit?: number; language?: string } = {}): RunRecord[] {
        const limit = options.limit ?? 20;

        if (options.language) {
            return this.db
                .prepare<[string, number], RunRecord>('SELECT * FROM runs WHERE language = ? ORDER BY run_id DESC LIMIT ?')
                .all(options.language, limit);
        }

        return this.db
            .prepare<[number], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?')
            .all(limit);
    }

    /**
     * Get the raw better-sqlite3 database instance.
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    close(): void {
        this.db.close();
        getLogger().debug('Run history closed');
    }
}

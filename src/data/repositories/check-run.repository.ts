/**
 * Check Run Repository
 * Persisted check counters (health surface) plus a per-check history table.
 */

import { database, type Database } from '../database.js';
import type { CheckRecord, CheckRun, ICheckRunStore, CheckOutcome } from '../base/store.interface.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Schema (idempotent)
// ============================================================================

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS check_run_stats (
    id VARCHAR(20) PRIMARY KEY,
    total_checks BIGINT NOT NULL DEFAULT 0,
    successes BIGINT NOT NULL DEFAULT 0,
    partial_failures BIGINT NOT NULL DEFAULT 0,
    failures BIGINT NOT NULL DEFAULT 0,
    last_run_at TIMESTAMPTZ
  );

  INSERT INTO check_run_stats (id) VALUES ('global') ON CONFLICT (id) DO NOTHING;

  CREATE TABLE IF NOT EXISTS check_history (
    id SERIAL PRIMARY KEY,
    movie_id VARCHAR(200) NOT NULL,
    outcome VARCHAR(10) NOT NULL,
    theatres_checked INTEGER NOT NULL DEFAULT 0,
    alerts INTEGER NOT NULL DEFAULT 0,
    error TEXT,
    checked_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE INDEX IF NOT EXISTS idx_check_history_time
    ON check_history (checked_at DESC);
`;

export async function ensureTables(db: Database = database): Promise<void> {
  await db.query(CREATE_TABLES_SQL);
  logger.debug('[CheckRunRepo] Tables ensured');
}

// ============================================================================
// Store
// ============================================================================

interface StatsRow {
  total_checks: string;
  successes: string;
  partial_failures: string;
  failures: string;
  last_run_at: Date | null;
}

interface HistoryRow {
  movie_id: string;
  outcome: CheckOutcome;
  theatres_checked: number;
  alerts: number;
  error: string | null;
  checked_at: Date;
}

const OUTCOME_COLUMN: Record<CheckOutcome, string> = {
  success: 'successes',
  partial: 'partial_failures',
  failure: 'failures',
};

export class PgCheckRunStore implements ICheckRunStore {
  constructor(private readonly db: Database = database) {}

  async recordCheck(record: CheckRecord): Promise<void> {
    const column = OUTCOME_COLUMN[record.outcome];

    await this.db.transaction(async (tx) => {
      await tx(
        `INSERT INTO check_history (movie_id, outcome, theatres_checked, alerts, error, checked_at)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          record.movieId,
          record.outcome,
          record.theatresChecked,
          record.alerts,
          record.error || null,
          record.checkedAt,
        ],
      );

      await tx(
        `UPDATE check_run_stats
         SET total_checks = total_checks + 1,
             ${column} = ${column} + 1,
             last_run_at = GREATEST(COALESCE(last_run_at, $1), $1)
         WHERE id = 'global'`,
        [record.checkedAt],
      );
    });
  }

  async getCheckRun(): Promise<CheckRun> {
    // BIGINT comes back from pg as a string
    const result = await this.db.query<StatsRow>(
      `SELECT total_checks, successes, partial_failures, failures, last_run_at
       FROM check_run_stats WHERE id = 'global'`,
    );

    const row = result.rows[0];
    if (!row) {
      return { totalChecks: 0, successes: 0, partialFailures: 0, failures: 0, lastRunAt: null };
    }

    return {
      totalChecks: Number(row.total_checks),
      successes: Number(row.successes),
      partialFailures: Number(row.partial_failures),
      failures: Number(row.failures),
      lastRunAt: row.last_run_at,
    };
  }

  async getRecentChecks(limit: number = 10): Promise<CheckRecord[]> {
    const result = await this.db.query<HistoryRow>(
      `SELECT movie_id, outcome, theatres_checked, alerts, error, checked_at
       FROM check_history
       ORDER BY checked_at DESC
       LIMIT $1`,
      [limit],
    );

    return result.rows.map(row => ({
      movieId: row.movie_id,
      outcome: row.outcome,
      theatresChecked: row.theatres_checked,
      alerts: row.alerts,
      error: row.error ?? undefined,
      checkedAt: row.checked_at,
    }));
  }

  async pruneHistory(olderThanDays: number): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM check_history WHERE checked_at < NOW() - ($1::numeric * interval '1 day')`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }
}

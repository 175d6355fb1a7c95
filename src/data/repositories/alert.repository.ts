/**
 * Alert Repository
 * Persists every notification attempt for audit and diagnostics.
 * Duplicate suppression does not read from here; snapshots do that.
 */

import { database, type Database } from '../database.js';
import type { AlertRecord, IAlertLog } from '../base/store.interface.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Schema (idempotent)
// ============================================================================

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS alert_log (
    id SERIAL PRIMARY KEY,
    movie_id VARCHAR(200) NOT NULL,
    theatres TEXT[] NOT NULL DEFAULT '{}',
    slot_count INTEGER NOT NULL DEFAULT 0,
    channel VARCHAR(20) NOT NULL,
    message_id VARCHAR(100),
    success BOOLEAN NOT NULL,
    error_message TEXT,
    sent_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE INDEX IF NOT EXISTS idx_alert_log_movie
    ON alert_log (movie_id, sent_at DESC);
`;

export async function ensureTable(db: Database = database): Promise<void> {
  await db.query(CREATE_TABLE_SQL);
  logger.debug('[AlertRepo] Table ensured');
}

// ============================================================================
// Store
// ============================================================================

interface AlertRow {
  movie_id: string;
  theatres: string[] | null;
  slot_count: number;
  channel: string;
  message_id: string | null;
  success: boolean;
  error_message: string | null;
  sent_at: Date;
}

export class PgAlertLog implements IAlertLog {
  constructor(private readonly db: Database = database) {}

  async recordAlert(record: AlertRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO alert_log (movie_id, theatres, slot_count, channel, message_id, success, error_message, sent_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        record.movieId,
        record.theatres,
        record.slotCount,
        record.channel,
        record.messageId || null,
        record.success,
        record.errorMessage || null,
        record.sentAt,
      ],
    );
  }

  /**
   * Most recent alerts first.
   */
  async getRecentAlerts(limit: number = 10): Promise<AlertRecord[]> {
    const result = await this.db.query<AlertRow>(
      `SELECT movie_id, theatres, slot_count, channel, message_id, success, error_message, sent_at
       FROM alert_log
       ORDER BY sent_at DESC
       LIMIT $1`,
      [limit],
    );

    return result.rows.map(row => ({
      movieId: row.movie_id,
      theatres: row.theatres ?? [],
      slotCount: row.slot_count,
      channel: row.channel,
      messageId: row.message_id ?? undefined,
      success: row.success,
      errorMessage: row.error_message ?? undefined,
      sentAt: row.sent_at,
    }));
  }

  /**
   * Delivered alerts only.
   */
  async countAlerts(): Promise<number> {
    const result = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM alert_log WHERE success = true`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async pruneHistory(olderThanDays: number): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM alert_log WHERE sent_at < NOW() - ($1::numeric * interval '1 day')`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }
}

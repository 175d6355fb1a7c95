/**
 * Snapshot Repository
 * Last observed showtime set per (movie, theatre): the baseline the change
 * detector diffs against. Rows hang off the theatre's internal id and go away
 * with it, so a re-added theatre never inherits an old baseline.
 */

import { database, type Database, type Executor } from '../database.js';
import type { ISnapshotStore, Snapshot, TheatreRef } from '../base/store.interface.js';
import type { Slot } from '../../adapters/base/extractor.interface.js';
import { theatreKey } from '../../services/config/theatre-input.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Schema (idempotent; requires the theatres table)
// ============================================================================

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS showtime_snapshots (
    theatre_id INTEGER PRIMARY KEY REFERENCES theatres(id) ON DELETE CASCADE,
    movie_id VARCHAR(200) NOT NULL,
    slots TEXT[] NOT NULL DEFAULT '{}',
    checked_at TIMESTAMPTZ NOT NULL,
    alerted_at TIMESTAMPTZ
  );

  CREATE INDEX IF NOT EXISTS idx_showtime_snapshots_movie
    ON showtime_snapshots (movie_id);
`;

export async function ensureTable(db: Database = database): Promise<void> {
  await db.query(CREATE_TABLE_SQL);
  logger.debug('[SnapshotRepo] Table ensured');
}

// ============================================================================
// Statements shared with the config store's transactions
// ============================================================================

export async function deleteSnapshotsForMovie(exec: Executor, movieId: string): Promise<number> {
  const result = await exec(`DELETE FROM showtime_snapshots WHERE movie_id = $1`, [movieId]);
  return result.rowCount ?? 0;
}

export async function deleteSnapshotsForTheatre(
  exec: Executor,
  movieId: string,
  theatreName: string,
): Promise<number> {
  const result = await exec(
    `DELETE FROM showtime_snapshots s
     USING theatres t
     WHERE s.theatre_id = t.id AND t.movie_id = $1 AND t.name_key = $2`,
    [movieId, theatreKey(theatreName)],
  );
  return result.rowCount ?? 0;
}

// ============================================================================
// Store
// ============================================================================

interface SnapshotRow {
  movie_id: string;
  theatre_name: string;
  slots: string[] | null;
  checked_at: Date;
  alerted_at: Date | null;
}

export class PgSnapshotStore implements ISnapshotStore {
  constructor(private readonly db: Database = database) {}

  async getSnapshot(movieId: string, theatreName: string): Promise<Snapshot | null> {
    const result = await this.db.query<SnapshotRow>(
      `SELECT s.movie_id, t.name AS theatre_name, s.slots, s.checked_at, s.alerted_at
       FROM showtime_snapshots s
       JOIN theatres t ON t.id = s.theatre_id
       WHERE t.movie_id = $1 AND t.name_key = $2`,
      [movieId, theatreKey(theatreName)],
    );

    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async commitSnapshot(theatre: TheatreRef, slots: Slot[], checkedAt: Date): Promise<void> {
    // INSERT ... SELECT on the row id: nothing is written once that row is
    // gone, including when a same-named theatre was added in its place
    const result = await this.db.query(
      `INSERT INTO showtime_snapshots (theatre_id, movie_id, slots, checked_at)
       SELECT id, movie_id, $3::text[], $4::timestamptz FROM theatres
       WHERE id = $1 AND movie_id = $2
       ON CONFLICT (theatre_id)
       DO UPDATE SET slots = EXCLUDED.slots, checked_at = EXCLUDED.checked_at`,
      [theatre.id, theatre.movieId, slots, checkedAt],
    );

    if (result.rowCount === 0) {
      logger.debug('[SnapshotRepo] Commit skipped, theatre no longer exists', {
        movieId: theatre.movieId,
        theatre: theatre.name,
      });
    }
  }

  async markAlerted(theatre: TheatreRef, alertedAt: Date): Promise<void> {
    await this.db.query(
      `UPDATE showtime_snapshots SET alerted_at = $2 WHERE theatre_id = $1`,
      [theatre.id, alertedAt],
    );
  }

  async deleteForMovie(movieId: string): Promise<void> {
    await deleteSnapshotsForMovie(this.db.query, movieId);
  }

  async deleteForTheatre(movieId: string, theatreName: string): Promise<void> {
    await deleteSnapshotsForTheatre(this.db.query, movieId, theatreName);
  }
}

function mapRow(row: SnapshotRow): Snapshot {
  return {
    movieId: row.movie_id,
    theatreName: row.theatre_name,
    slots: row.slots ?? [],
    checkedAt: row.checked_at,
    alertedAt: row.alerted_at,
  };
}

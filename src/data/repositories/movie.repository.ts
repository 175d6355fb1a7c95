/**
 * Movie Repository
 * Postgres config store for watched movies and their theatres.
 *
 * Every mutation is a single transaction; removals delete dependent snapshot
 * rows inside that same transaction. Reads always go to the database.
 */

import { database, type Database, type Executor } from '../database.js';
import type { IConfigStore, Movie, Theatre, TheatreInput } from '../base/store.interface.js';
import { deleteSnapshotsForMovie, deleteSnapshotsForTheatre } from './snapshot.repository.js';
import { generateMovieId, movieIdBase } from '../../services/config/movie-id.js';
import { normalizeTheatre, normalizeTheatreList, theatreKey, type NormalizedTheatre } from '../../services/config/theatre-input.js';
import { NotFoundError, DuplicateError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Schema (idempotent)
// ============================================================================

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS movies (
    id VARCHAR(200) PRIMARY KEY,
    name VARCHAR(200) NOT NULL,
    url TEXT NOT NULL,
    city VARCHAR(100) NOT NULL,
    enabled BOOLEAN NOT NULL DEFAULT true,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS theatres (
    id SERIAL PRIMARY KEY,
    movie_id VARCHAR(200) NOT NULL REFERENCES movies(id) ON DELETE CASCADE,
    name VARCHAR(200) NOT NULL,
    name_key VARCHAR(200) NOT NULL,
    tier INTEGER NOT NULL DEFAULT 1,
    city VARCHAR(100) NOT NULL,
    keywords TEXT[] NOT NULL DEFAULT '{}',
    position INTEGER NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT unique_movie_theatre UNIQUE (movie_id, name_key)
  );

  CREATE INDEX IF NOT EXISTS idx_theatres_movie
    ON theatres (movie_id, position);
`;

export async function ensureTables(db: Database = database): Promise<void> {
  await db.query(CREATE_TABLES_SQL);
  logger.debug('[MovieRepo] Tables ensured');
}

// ============================================================================
// Rows
// ============================================================================

interface MovieRow {
  id: string;
  name: string;
  url: string;
  city: string;
  enabled: boolean;
  created_at: Date;
}

interface TheatreRow {
  id: number;
  movie_id: string;
  name: string;
  tier: number;
  city: string;
  keywords: string[] | null;
  position: number;
}

const MOVIE_COLUMNS = 'id, name, url, city, enabled, created_at';
const THEATRE_COLUMNS = 'id, movie_id, name, tier, city, keywords, position';

// ============================================================================
// Store
// ============================================================================

export class PgConfigStore implements IConfigStore {
  constructor(private readonly db: Database = database) {}

  async addMovie(name: string, url: string, city: string, theatres: TheatreInput[]): Promise<string> {
    const normalized = normalizeTheatreList(theatres, city);

    const movieId = await this.db.transaction(async (tx) => {
      const base = movieIdBase(name, city);
      const taken = await tx<{ id: string }>(
        `SELECT id FROM movies WHERE id = $1 OR id LIKE $2`,
        [base, `${base}\\_%`],
      );
      const takenIds = new Set(taken.rows.map(r => r.id));
      const id = generateMovieId(name, city, candidate => takenIds.has(candidate));

      await tx(
        `INSERT INTO movies (id, name, url, city, enabled) VALUES ($1, $2, $3, $4, true)`,
        [id, name, url, city],
      );

      for (const [position, theatre] of normalized.entries()) {
        await insertTheatre(tx, id, theatre, position);
      }

      return id;
    });

    logger.info('[MovieRepo] Movie added', { movieId, name, city, theatres: normalized.length });
    return movieId;
  }

  async removeMovie(movieId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await deleteSnapshotsForMovie(tx, movieId);
      const result = await tx(`DELETE FROM movies WHERE id = $1`, [movieId]);
      if (result.rowCount === 0) {
        throw new NotFoundError(`Movie "${movieId}" not found`);
      }
    });

    logger.info('[MovieRepo] Movie removed', { movieId });
  }

  async addTheatre(movieId: string, input: TheatreInput): Promise<Theatre> {
    const theatre = await this.db.transaction(async (tx) => {
      const movie = await tx<{ city: string }>(`SELECT city FROM movies WHERE id = $1 FOR UPDATE`, [movieId]);
      const movieRow = movie.rows[0];
      if (!movieRow) {
        throw new NotFoundError(`Movie "${movieId}" not found`);
      }

      const normalized = normalizeTheatre(input, movieRow.city);
      const existing = await tx(
        `SELECT 1 FROM theatres WHERE movie_id = $1 AND name_key = $2`,
        [movieId, normalized.nameKey],
      );
      if ((existing.rowCount ?? 0) > 0) {
        throw new DuplicateError(`Theatre "${normalized.name}" already exists for "${movieId}"`);
      }

      const next = await tx<{ position: number }>(
        `SELECT COALESCE(MAX(position) + 1, 0) AS position FROM theatres WHERE movie_id = $1`,
        [movieId],
      );
      return insertTheatre(tx, movieId, normalized, next.rows[0]?.position ?? 0);
    });

    logger.info('[MovieRepo] Theatre added', { movieId, theatre: theatre.name, tier: theatre.tier });
    return theatre;
  }

  async removeTheatre(movieId: string, theatreName: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const movie = await tx(`SELECT 1 FROM movies WHERE id = $1`, [movieId]);
      if ((movie.rowCount ?? 0) === 0) {
        throw new NotFoundError(`Movie "${movieId}" not found`);
      }

      await deleteSnapshotsForTheatre(tx, movieId, theatreName);
      const result = await tx(
        `DELETE FROM theatres WHERE movie_id = $1 AND name_key = $2`,
        [movieId, theatreKey(theatreName)],
      );
      if (result.rowCount === 0) {
        throw new NotFoundError(`Theatre "${theatreName}" not found for "${movieId}"`);
      }
    });

    logger.info('[MovieRepo] Theatre removed', { movieId, theatre: theatreName });
  }

  async setEnabled(movieId: string, enabled: boolean): Promise<void> {
    await this.db.transaction(async (tx) => {
      const result = await tx(
        `UPDATE movies SET enabled = $2, updated_at = NOW() WHERE id = $1`,
        [movieId, enabled],
      );
      if (result.rowCount === 0) {
        throw new NotFoundError(`Movie "${movieId}" not found`);
      }
    });

    logger.info(`[MovieRepo] Movie ${enabled ? 'enabled' : 'disabled'}`, { movieId });
  }

  async listMovies(onlyEnabled: boolean): Promise<Movie[]> {
    const movies = await this.db.query<MovieRow>(
      `SELECT ${MOVIE_COLUMNS} FROM movies
       ${onlyEnabled ? 'WHERE enabled = true' : ''}
       ORDER BY created_at, id`,
    );
    if (movies.rows.length === 0) return [];

    const theatres = await this.db.query<TheatreRow>(
      `SELECT ${THEATRE_COLUMNS} FROM theatres
       WHERE movie_id = ANY($1)
       ORDER BY movie_id, position`,
      [movies.rows.map(m => m.id)],
    );

    const byMovie = new Map<string, Theatre[]>();
    for (const row of theatres.rows) {
      const list = byMovie.get(row.movie_id) ?? [];
      list.push(mapTheatre(row));
      byMovie.set(row.movie_id, list);
    }

    return movies.rows.map(row => mapMovie(row, byMovie.get(row.id) ?? []));
  }

  async getMovie(movieId: string): Promise<Movie | null> {
    const movie = await this.db.query<MovieRow>(`SELECT ${MOVIE_COLUMNS} FROM movies WHERE id = $1`, [movieId]);
    const row = movie.rows[0];
    if (!row) return null;

    const theatres = await this.db.query<TheatreRow>(
      `SELECT ${THEATRE_COLUMNS} FROM theatres WHERE movie_id = $1 ORDER BY position`,
      [movieId],
    );
    return mapMovie(row, theatres.rows.map(mapTheatre));
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function insertTheatre(
  tx: Executor,
  movieId: string,
  theatre: NormalizedTheatre,
  position: number,
): Promise<Theatre> {
  const result = await tx<TheatreRow>(
    `INSERT INTO theatres (movie_id, name, name_key, tier, city, keywords, position)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING ${THEATRE_COLUMNS}`,
    [movieId, theatre.name, theatre.nameKey, theatre.tier, theatre.city, theatre.keywords, position],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error(`Insert of theatre "${theatre.name}" returned no row`);
  }
  return mapTheatre(row);
}

function mapTheatre(row: TheatreRow): Theatre {
  return {
    id: row.id,
    movieId: row.movie_id,
    name: row.name,
    tier: row.tier,
    city: row.city,
    keywords: row.keywords ?? [],
    position: row.position,
  };
}

function mapMovie(row: MovieRow, theatres: Theatre[]): Movie {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    city: row.city,
    enabled: row.enabled,
    theatres,
    createdAt: row.created_at,
  };
}

/**
 * Transaction helper and Postgres store statements, against a recording
 * stand-in for the pool.
 */

import { describe, it, expect, vi } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';
import { withTransaction, type Database, type Executor, type TransactionClient } from '../../../src/data/database.js';
import { PgConfigStore } from '../../../src/data/repositories/movie.repository.js';
import { PgSnapshotStore } from '../../../src/data/repositories/snapshot.repository.js';
import { PgCheckRunStore } from '../../../src/data/repositories/check-run.repository.js';
import { NotFoundError, StateStoreError } from '../../../src/utils/errors.js';
import { makeTheatre } from '../../mocks/fixtures.js';

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>();
  return {
    ...actual,
    logger: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), log: vi.fn() },
  };
});

interface RecordedQuery {
  text: string;
  params?: unknown[];
}

/**
 * Records statements and answers each with no rows and the next scripted
 * row count (1 once the script runs out).
 */
function createRecorder(rowCounts: number[] = [], failOn?: RegExp) {
  const queries: RecordedQuery[] = [];

  const exec: Executor = async <T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> => {
    queries.push({ text: text.replace(/\s+/g, ' ').trim(), params });
    if (failOn?.test(text)) {
      throw new Error('connection reset');
    }
    return { rows: [], rowCount: rowCounts.shift() ?? 1, command: '', oid: 0, fields: [] };
  };

  return { queries, exec };
}

function createFakeDatabase(rowCounts: number[] = []) {
  const recorder = createRecorder(rowCounts);
  const release = vi.fn();
  const db: Database = {
    query: recorder.exec,
    transaction: fn => withTransaction(fn, async () => ({ query: recorder.exec, release })),
  };
  return { db, queries: recorder.queries, release };
}

// ============================================================================
// withTransaction
// ============================================================================

describe('withTransaction', () => {
  function fakeClient(failOn?: RegExp) {
    const recorder = createRecorder([], failOn);
    const release = vi.fn<[Error?], void>();
    const client: TransactionClient = { query: recorder.exec, release };
    return { client, release, statements: () => recorder.queries.map(q => q.text) };
  }

  it('commits and releases on success', async () => {
    const { client, release, statements } = fakeClient();

    const result = await withTransaction(async (tx) => {
      await tx('SELECT 1');
      return 'done';
    }, async () => client);

    expect(result).toBe('done');
    expect(statements()).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(release).toHaveBeenCalledWith(undefined);
  });

  it('rolls back and keeps configuration errors as they are', async () => {
    const { client, statements } = fakeClient();

    await expect(withTransaction(async () => {
      throw new NotFoundError('Movie "ghost" not found');
    }, async () => client)).rejects.toThrow(NotFoundError);

    expect(statements()).toEqual(['BEGIN', 'ROLLBACK']);
  });

  it('wraps unexpected errors as state store errors', async () => {
    const { client } = fakeClient();

    await expect(withTransaction(async () => {
      throw new TypeError('boom');
    }, async () => client)).rejects.toThrow(new StateStoreError('Transaction failed: boom'));
  });

  it('does not return a client to the pool after a failed rollback', async () => {
    const { client, release } = fakeClient(/ROLLBACK/);

    await expect(withTransaction(async () => {
      throw new StateStoreError('write failed');
    }, async () => client)).rejects.toThrow('write failed');

    expect(release.mock.calls[0]?.[0]?.message).toBe('connection reset');
  });
});

// ============================================================================
// Stores
// ============================================================================

describe('PgConfigStore', () => {
  it('deletes snapshots before the movie in one transaction', async () => {
    const { db, queries, release } = createFakeDatabase();

    await new PgConfigStore(db).removeMovie('leo_chennai');

    expect(queries.map(q => q.text.split(' ').slice(0, 3).join(' '))).toEqual([
      'BEGIN',
      'DELETE FROM showtime_snapshots',
      'DELETE FROM movies',
      'COMMIT',
    ]);
    expect(queries[2]?.params).toEqual(['leo_chennai']);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('reports a missing movie and rolls back', async () => {
    // BEGIN, snapshot delete, movie delete (0 rows)
    const { db, queries } = createFakeDatabase([1, 0, 0]);

    await expect(new PgConfigStore(db).removeMovie('ghost')).rejects.toThrow('Movie "ghost" not found');
    expect(queries.at(-1)?.text).toBe('ROLLBACK');
  });

  it('matches theatres by lowercased name on removal', async () => {
    const { db, queries } = createFakeDatabase();

    await new PgConfigStore(db).removeTheatre('leo_chennai', ' PVR Grand Galada ');

    const deleteTheatre = queries.find(q => q.text.startsWith('DELETE FROM theatres'));
    expect(deleteTheatre?.params).toEqual(['leo_chennai', 'pvr grand galada']);
  });

  it('stops after the movie query when there are no movies', async () => {
    const { db, queries } = createFakeDatabase();

    expect(await new PgConfigStore(db).listMovies(true)).toEqual([]);
    expect(queries).toHaveLength(1);
    expect(queries[0]?.text).toContain('WHERE enabled = true');
  });
});

describe('PgSnapshotStore', () => {
  it('upserts through the exact theatre row read by the check', async () => {
    const { db, queries } = createFakeDatabase();
    const checkedAt = new Date('2024-01-01T10:00:00Z');

    await new PgSnapshotStore(db).commitSnapshot(makeTheatre({ id: 7 }), ['10:00 AM'], checkedAt);

    expect(queries[0]?.text).toContain('FROM theatres WHERE id = $1 AND movie_id = $2');
    expect(queries[0]?.text).toContain('ON CONFLICT (theatre_id)');
    expect(queries[0]?.params).toEqual([7, 'leo_chennai', ['10:00 AM'], checkedAt]);
  });

  it('marks alerted by theatre row id', async () => {
    const { db, queries } = createFakeDatabase();
    const alertedAt = new Date('2024-01-01T10:00:05Z');

    await new PgSnapshotStore(db).markAlerted(makeTheatre({ id: 7 }), alertedAt);

    expect(queries[0]?.text).toBe('UPDATE showtime_snapshots SET alerted_at = $2 WHERE theatre_id = $1');
    expect(queries[0]?.params).toEqual([7, alertedAt]);
  });

  it('returns null when no snapshot exists', async () => {
    const { db } = createFakeDatabase();

    expect(await new PgSnapshotStore(db).getSnapshot('leo_chennai', 'PVR Grand Galada')).toBeNull();
  });
});

describe('PgCheckRunStore', () => {
  it('writes history and counters in one transaction', async () => {
    const { db, queries } = createFakeDatabase();
    const checkedAt = new Date('2024-01-01T10:00:00Z');

    await new PgCheckRunStore(db).recordCheck({
      movieId: 'leo_chennai',
      outcome: 'partial',
      theatresChecked: 2,
      alerts: 1,
      error: '1 of 2 theatres failed',
      checkedAt,
    });

    expect(queries.map(q => q.text.split(' ')[0])).toEqual(['BEGIN', 'INSERT', 'UPDATE', 'COMMIT']);
    expect(queries[1]?.params).toEqual(['leo_chennai', 'partial', 2, 1, '1 of 2 theatres failed', checkedAt]);
    expect(queries[2]?.text).toContain('partial_failures = partial_failures + 1');
  });

  it('reports zeroed counters before the first check', async () => {
    const { db } = createFakeDatabase();

    expect(await new PgCheckRunStore(db).getCheckRun()).toEqual({
      totalChecks: 0,
      successes: 0,
      partialFailures: 0,
      failures: 0,
      lastRunAt: null,
    });
  });
});

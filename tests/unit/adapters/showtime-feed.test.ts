/**
 * Showtime Feed Mapper & Adapter Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import axios from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { ShowtimeFeedAdapter } from '../../../src/adapters/showtime-feed/showtime-feed.adapter.js';
import {
  mapVenuesToExtractions,
  matchesTheatre,
  parseVenues,
} from '../../../src/adapters/showtime-feed/showtime-feed.mapper.js';
import { ExtractionFailure } from '../../../src/utils/errors.js';
import { makeMovie, makeTheatre, MOVIE_URL } from '../../mocks/fixtures.js';

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>();
  return {
    ...actual,
    logger: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), log: vi.fn() },
  };
});

const GRAND = makeTheatre();
const ROHINI = makeTheatre({ id: 2, name: 'Rohini Silver Screens', tier: 2, keywords: ['rohini'], position: 1 });

// ============================================================================
// Mapper
// ============================================================================

describe('showtime feed mapper', () => {
  describe('parseVenues', () => {
    it('separates valid, named-but-malformed and unreadable entries', () => {
      const parsed = parseVenues({
        theatres: [
          { name: 'PVR Grand Galada', showtimes: [{ time: '10:00 AM', available: true }] },
          { name: 'Rohini Silver Screens', showtimes: 'soon' },
          { screens: 4 },
          'garbage',
        ],
      });

      expect(parsed.venues.map(v => v.name)).toEqual(['PVR Grand Galada']);
      expect(parsed.malformedNames).toEqual(['Rohini Silver Screens']);
      expect(parsed.unreadable).toBe(2);
    });

    it('treats a showtime without an availability flag as not bookable', () => {
      const parsed = parseVenues({ theatres: [{ name: 'Kasi', showtimes: [{ time: ' 9:00 PM ' }] }] });

      expect(parsed.venues[0]?.showtimes).toEqual([{ time: '9:00 PM', available: false }]);
    });
  });

  describe('matchesTheatre', () => {
    it('matches any keyword as a case-insensitive substring', () => {
      expect(matchesTheatre('PVR: Grand Galada, Pallavaram', GRAND)).toBe(true);
      expect(matchesTheatre('ROHINI SILVER SCREENS: Koyambedu', ROHINI)).toBe(true);
      expect(matchesTheatre('Kasi Talkies', GRAND)).toBe(false);
    });

    it('falls back to the theatre name without keywords', () => {
      expect(matchesTheatre('Kasi Talkies 4K', makeTheatre({ name: 'Kasi Talkies', keywords: [] }))).toBe(true);
    });
  });

  describe('mapVenuesToExtractions', () => {
    it('collects bookable times across matching venues in page order', () => {
      const parsed = parseVenues({
        theatres: [
          {
            name: 'PVR Grand Galada Screen 1',
            showtimes: [
              { time: '10:00 AM', available: true },
              { time: '1:30 PM', available: false },
            ],
          },
          {
            name: 'PVR Grand Galada Screen 2',
            location: 'Pallavaram',
            showtimes: [
              { time: '10:00 AM', available: true },
              { time: '6:00 PM', available: true },
            ],
          },
        ],
      });

      expect(mapVenuesToExtractions(parsed, [GRAND])).toEqual([
        { theatreName: 'PVR Grand Galada', success: true, slots: ['10:00 AM', '6:00 PM'], location: 'Pallavaram' },
      ]);
    });

    it('reports no slots for a theatre that is not listed yet', () => {
      const parsed = parseVenues({ theatres: [] });

      expect(mapVenuesToExtractions(parsed, [GRAND, ROHINI])).toEqual([
        { theatreName: 'PVR Grand Galada', success: true, slots: [] },
        { theatreName: 'Rohini Silver Screens', success: true, slots: [] },
      ]);
    });

    it('fails a theatre whose only entry is malformed', () => {
      const parsed = parseVenues({ theatres: [{ name: 'Rohini Silver Screens', showtimes: null }] });

      expect(mapVenuesToExtractions(parsed, [ROHINI])).toEqual([
        { theatreName: 'Rohini Silver Screens', success: false, error: 'Malformed venue entry in showtime feed' },
      ]);
    });
  });
});

// ============================================================================
// Adapter
// ============================================================================

function createAdapter(respond: (config: InternalAxiosRequestConfig) => unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push(config);
      return { data: respond(config), status: 200, statusText: 'OK', headers: {}, config };
    },
  });

  const adapter = new ShowtimeFeedAdapter({
    timeoutMs: 1_000,
    retryAttempts: 0,
    userAgent: 'showwatch-test',
    circuitBreakerThreshold: 2,
    circuitBreakerHalfOpenAfter: 60_000,
    client,
  });

  return { adapter, requests };
}

describe('ShowtimeFeedAdapter', () => {
  const movie = makeMovie({ theatres: [GRAND, ROHINI] });

  it('extracts every configured theatre from the feed', async () => {
    const { adapter, requests } = createAdapter(() => ({
      bookingUrl: 'https://tickets.example.test/book/leo',
      theatres: [
        {
          name: 'PVR Grand Galada',
          location: 'Pallavaram',
          showtimes: [
            { time: '10:00 AM', available: true },
            { time: '1:30 PM', available: false },
          ],
        },
      ],
    }));

    const result = await adapter.extract(movie);

    expect(requests[0]?.url).toBe(MOVIE_URL);
    expect(result.movieId).toBe('leo_chennai');
    expect(result.bookingUrl).toBe('https://tickets.example.test/book/leo');
    expect(result.theatres).toEqual([
      { theatreName: 'PVR Grand Galada', success: true, slots: ['10:00 AM'], location: 'Pallavaram' },
      { theatreName: 'Rohini Silver Screens', success: true, slots: [] },
    ]);
  });

  it('falls back to the movie url for booking', async () => {
    const { adapter } = createAdapter(() => ({ theatres: [] }));

    expect((await adapter.extract(movie)).bookingUrl).toBe(MOVIE_URL);
  });

  it('fails the whole extraction on an unreadable document', async () => {
    const { adapter } = createAdapter(() => '<html>maintenance</html>');

    await expect(adapter.extract(movie)).rejects.toThrow(
      new ExtractionFailure(movie.id, 'Showtime feed is not a readable document'),
    );
  });

  it('fails the whole extraction when the fetch fails', async () => {
    const { adapter } = createAdapter(() => {
      throw new Error('connection refused');
    });

    await expect(adapter.extract(movie)).rejects.toThrow('Failed to fetch showtime feed: connection refused');
  });

  it('stops fetching once the circuit opens', async () => {
    const { adapter, requests } = createAdapter(() => {
      throw new Error('connection refused');
    });

    await expect(adapter.extract(movie)).rejects.toThrow(ExtractionFailure);
    await expect(adapter.extract(movie)).rejects.toThrow(ExtractionFailure);
    await expect(adapter.extract(movie)).rejects.toThrow('Circuit open; skipping fetch');

    expect(requests).toHaveLength(2);
    expect(adapter.getHealthStatus()).toMatchObject({ healthy: false, circuitState: 'open' });
  });
});

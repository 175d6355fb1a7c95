/**
 * Test Fixtures
 * Shared fake data: movies, theatres, snapshots and alerts.
 */

import type { Movie, Snapshot, Theatre, TheatreInput } from '../../src/data/base/store.interface.js';
import type { BookingAlert } from '../../src/notifications/base/notifier.interface.js';

export const MOVIE_URL = 'https://tickets.example.test/movies/leo';

export const THEATRES: TheatreInput[] = [
  { name: 'PVR Grand Galada', tier: 1, keywords: ['grand galada'] },
  { name: 'Rohini Silver Screens', tier: 2, keywords: ['rohini'] },
];

export function makeTheatre(overrides: Partial<Theatre> = {}): Theatre {
  return {
    id: 1,
    movieId: 'leo_chennai',
    name: 'PVR Grand Galada',
    tier: 1,
    city: 'Chennai',
    keywords: ['grand galada'],
    position: 0,
    ...overrides,
  };
}

export function makeMovie(overrides: Partial<Movie> = {}): Movie {
  return {
    id: 'leo_chennai',
    name: 'Leo',
    url: MOVIE_URL,
    city: 'Chennai',
    enabled: true,
    theatres: [makeTheatre()],
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    movieId: 'leo_chennai',
    theatreName: 'PVR Grand Galada',
    slots: ['10:00 AM', '1:30 PM'],
    checkedAt: new Date('2024-01-01T10:00:00Z'),
    alertedAt: null,
    ...overrides,
  };
}

export function makeBookingAlert(overrides: Partial<BookingAlert> = {}): BookingAlert {
  return {
    movieId: 'leo_chennai',
    movieName: 'Leo',
    bookingUrl: MOVIE_URL,
    theatres: [
      { name: 'PVR Grand Galada', tier: 1, location: 'Chennai', newSlots: ['10:00 AM', '1:30 PM'] },
    ],
    detectedAt: new Date('2024-01-01T10:00:00Z'),
    ...overrides,
  };
}

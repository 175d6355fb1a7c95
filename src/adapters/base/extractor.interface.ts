/**
 * Extractor Interface
 * Contract for anything that turns a movie page into per-theatre showtimes.
 */

import type { Movie } from '../../data/base/store.interface.js';

// ============================================================================
// Extraction Types
// ============================================================================

/** One showtime value, e.g. "10:00 AM". Identity is exact string equality. */
export type Slot = string;

export type TheatreExtraction =
  | {
      theatreName: string;
      success: true;
      /** Currently bookable showtimes, page order, no duplicates */
      slots: Slot[];
      /** Location label reported by the page */
      location?: string;
    }
  | {
      theatreName: string;
      success: false;
      error: string;
    };

export interface ExtractionResult {
  movieId: string;
  bookingUrl: string;
  fetchedAt: Date;
  theatres: TheatreExtraction[];
}

// ============================================================================
// Health Check Types
// ============================================================================

export interface ExtractorHealth {
  healthy: boolean;
  circuitState: 'closed' | 'open' | 'half-open' | 'isolated';
  lastChecked: Date;
}

// ============================================================================
// Extractor Interface
// ============================================================================

export interface IExtractor {
  readonly name: string;

  /**
   * Run one full check of a movie page.
   * Every theatre of the movie should appear in the result; a theatre that is
   * missing is treated the same as a failed one.
   * @throws ExtractionFailure when nothing could be extracted at all
   */
  extract(movie: Movie, signal?: AbortSignal): Promise<ExtractionResult>;

  getHealthStatus(): ExtractorHealth;
}

/**
 * Case-insensitive lookup of one theatre's portion of a result.
 */
export function findTheatreExtraction(
  result: ExtractionResult,
  theatreName: string,
): TheatreExtraction | undefined {
  const key = theatreName.trim().toLowerCase();
  return result.theatres.find(t => t.theatreName.trim().toLowerCase() === key);
}

/**
 * Mock Extractor
 * Scripted showtime pages per movie, with hooks for failures and for holding
 * an extraction open.
 */

import type {
  ExtractionResult,
  ExtractorHealth,
  IExtractor,
  Slot,
  TheatreExtraction,
} from '../../src/adapters/base/extractor.interface.js';
import type { Movie } from '../../src/data/base/store.interface.js';
import { ExtractionFailure } from '../../src/utils/errors.js';

/** Slots for a theatre, or null for a theatre the page could not be read for */
export type ScriptedPage = Record<string, Slot[] | null>;

export class MockExtractor implements IExtractor {
  readonly name = 'MockExtractor';

  /** Every extract() call, in order */
  calls: { movieId: string; signal?: AbortSignal }[] = [];

  private pages = new Map<string, ScriptedPage>();
  private failures = new Map<string, Error>();
  private gates = new Map<string, Promise<void>>();

  /** Theatres missing from the page are left out of the result */
  setShowtimes(movieId: string, page: ScriptedPage): this {
    this.pages.set(movieId, page);
    return this;
  }

  /** Make the whole extraction for a movie throw */
  failMovie(movieId: string, error: Error = new ExtractionFailure(movieId, 'page unreachable')): this {
    this.failures.set(movieId, error);
    return this;
  }

  recover(movieId: string): this {
    this.failures.delete(movieId);
    return this;
  }

  /**
   * Keep extractions for a movie pending until the returned function is called.
   */
  hold(movieId: string): () => void {
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    this.gates.set(movieId, gate);
    return () => {
      this.gates.delete(movieId);
      release();
    };
  }

  callsFor(movieId: string): number {
    return this.calls.filter(c => c.movieId === movieId).length;
  }

  async extract(movie: Movie, signal?: AbortSignal): Promise<ExtractionResult> {
    this.calls.push({ movieId: movie.id, signal });

    const gate = this.gates.get(movie.id);
    if (gate) await gate;

    const failure = this.failures.get(movie.id);
    if (failure) throw failure;

    const page = this.pages.get(movie.id) ?? {};
    const theatres = Object.entries(page).map(([theatreName, slots]): TheatreExtraction =>
      slots === null
        ? { theatreName, success: false, error: 'unreadable theatre block' }
        : { theatreName, success: true, slots: [...slots] },
    );

    return {
      movieId: movie.id,
      bookingUrl: movie.url,
      fetchedAt: new Date(),
      theatres,
    };
  }

  getHealthStatus(): ExtractorHealth {
    return { healthy: true, circuitState: 'closed', lastChecked: new Date() };
  }
}

/**
 * Showtime Feed Adapter
 * Fetches a movie's booking page as a JSON showtime feed and turns it into
 * per-theatre extractions.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Movie } from '../../data/base/store.interface.js';
import type { ExtractionResult, ExtractorHealth, IExtractor } from '../base/extractor.interface.js';
import {
  createResiliencePolicies,
  isCircuitBreakerOpen,
  type ResiliencePolicies,
} from '../base/circuit-breaker.js';
import { feedDocumentSchema } from './showtime-feed.types.js';
import { mapVenuesToExtractions, parseVenues } from './showtime-feed.mapper.js';
import { ExtractionFailure } from '../../utils/errors.js';
import { errorMessage, logExtractorOperation, logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';

export interface ShowtimeFeedOptions {
  timeoutMs: number;
  retryAttempts: number;
  userAgent: string;
  circuitBreakerThreshold: number;
  circuitBreakerHalfOpenAfter: number;
  /** Injected for tests */
  client?: AxiosInstance;
}

// ============================================================================
// Showtime Feed Adapter Implementation
// ============================================================================

export class ShowtimeFeedAdapter implements IExtractor {
  readonly name = 'ShowtimeFeed';

  private resilience: ResiliencePolicies;
  private client: AxiosInstance;
  private lastChecked: Date = new Date();

  constructor(options: ShowtimeFeedOptions = {
    timeoutMs: config.extractor.timeout,
    retryAttempts: config.extractor.retryAttempts,
    userAgent: config.extractor.userAgent,
    circuitBreakerThreshold: config.extractor.circuitBreaker.threshold,
    circuitBreakerHalfOpenAfter: config.extractor.circuitBreaker.halfOpenAfterMs,
  }) {
    this.resilience = createResiliencePolicies({
      extractorName: this.name,
      circuitBreakerThreshold: options.circuitBreakerThreshold,
      circuitBreakerHalfOpenAfter: options.circuitBreakerHalfOpenAfter,
      maxRetryAttempts: options.retryAttempts,
      timeoutMs: options.timeoutMs,
    });

    this.client = options.client ?? axios.create({
      headers: {
        Accept: 'application/json',
        'User-Agent': options.userAgent,
      },
    });
  }

  // ==========================================================================
  // Extraction
  // ==========================================================================

  async extract(movie: Movie, signal?: AbortSignal): Promise<ExtractionResult> {
    const startTime = Date.now();
    this.lastChecked = new Date();

    let body: unknown;
    try {
      body = await this.resilience.execute(async (attemptSignal) => {
        const response = await this.client.get<unknown>(movie.url, { signal: attemptSignal });
        return response.data;
      }, signal);
    } catch (error) {
      logExtractorOperation(this.name, movie.id, startTime, false, { error: errorMessage(error) });
      const reason = isCircuitBreakerOpen(error)
        ? 'Circuit open; skipping fetch'
        : `Failed to fetch showtime feed: ${errorMessage(error)}`;
      throw new ExtractionFailure(movie.id, reason, { cause: error });
    }

    const doc = feedDocumentSchema.safeParse(body);
    if (!doc.success) {
      logExtractorOperation(this.name, movie.id, startTime, false, { error: 'unreadable document' });
      throw new ExtractionFailure(movie.id, 'Showtime feed is not a readable document');
    }

    const parsed = parseVenues(doc.data);
    if (parsed.malformedNames.length > 0 || parsed.unreadable > 0) {
      logger.warn(`[${this.name}] Skipped malformed venue entries`, {
        movieId: movie.id,
        named: parsed.malformedNames.length,
        unreadable: parsed.unreadable,
      });
    }

    const theatres = mapVenuesToExtractions(parsed, movie.theatres);

    logExtractorOperation(this.name, movie.id, startTime, true, {
      venues: parsed.venues.length,
      theatres: theatres.length,
    });

    return {
      movieId: movie.id,
      bookingUrl: doc.data.bookingUrl ?? movie.url,
      fetchedAt: new Date(),
      theatres,
    };
  }

  // ==========================================================================
  // Health Check
  // ==========================================================================

  getHealthStatus(): ExtractorHealth {
    return {
      healthy: this.resilience.isHealthy(),
      circuitState: this.resilience.getCircuitState(),
      lastChecked: this.lastChecked,
    };
  }
}

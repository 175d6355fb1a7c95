/**
 * Mutation Gateway
 * Single entry point for configuration changes. Mutations and the monitor's
 * per-tick read share one FIFO queue of concurrency 1, so a tick never sees a
 * half-applied change and mutations apply in arrival order.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import type { IConfigStore, Movie, Theatre, TheatreInput } from '../../data/base/store.interface.js';
import { ConfigurationError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Request Schema
// ============================================================================

const movieId = z.string().trim().min(1);

const theatreSchema = z.object({
  name: z.string().trim().min(1),
  tier: z.number().int().min(1).optional(),
  city: z.string().trim().min(1).optional(),
  keywords: z.array(z.string()).optional(),
});

export const mutationRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('add_movie'),
    url: z.string().url(),
    name: z.string().trim().min(1),
    city: z.string().trim().min(1).optional(),
    /** Omitted: the configured default theatres are used */
    theatres: z.array(theatreSchema).optional(),
  }),
  z.object({ type: z.literal('remove_movie'), movieId }),
  z.object({ type: z.literal('list_movies'), onlyEnabled: z.boolean().optional() }),
  z.object({ type: z.literal('set_enabled'), movieId, enabled: z.boolean() }),
  z.object({ type: z.literal('list_theatres'), movieId }),
  z.object({ type: z.literal('add_theatre'), movieId, theatre: theatreSchema }),
  z.object({ type: z.literal('remove_theatre'), movieId, name: z.string().trim().min(1) }),
]);

export type MutationRequest = z.infer<typeof mutationRequestSchema>;

export type MutationResult =
  | { ok: true; type: 'add_movie'; movieId: string }
  | { ok: true; type: 'list_movies'; movies: Movie[] }
  | { ok: true; type: 'list_theatres'; theatres: Theatre[] }
  | { ok: true; type: 'add_theatre'; theatre: Theatre }
  | { ok: true; type: 'remove_movie' | 'set_enabled' | 'remove_theatre' }
  | { ok: false; error: { code: ConfigurationError['code']; message: string } };

export interface GatewayDefaults {
  city: string;
  theatres: TheatreInput[];
}

export interface AddMovieInput {
  url: string;
  name: string;
  city?: string;
  theatres?: TheatreInput[];
}

// ============================================================================
// Gateway
// ============================================================================

export class MutationGateway {
  private readonly queue = pLimit(1);

  constructor(
    private readonly store: IConfigStore,
    private readonly defaults: GatewayDefaults,
  ) {}

  /** Requests waiting behind the one being applied */
  get pendingCount(): number {
    return this.queue.pendingCount;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  addMovie(input: AddMovieInput): Promise<string> {
    const city = input.city ?? this.defaults.city;
    const theatres = input.theatres ?? this.defaults.theatres.map(t => ({ ...t, keywords: t.keywords ? [...t.keywords] : undefined }));
    return this.serialize(() => this.store.addMovie(input.name, input.url, city, theatres));
  }

  removeMovie(movieId: string): Promise<void> {
    return this.serialize(() => this.store.removeMovie(movieId));
  }

  listMovies(onlyEnabled: boolean = false): Promise<Movie[]> {
    return this.serialize(() => this.store.listMovies(onlyEnabled));
  }

  setEnabled(movieId: string, enabled: boolean): Promise<void> {
    return this.serialize(() => this.store.setEnabled(movieId, enabled));
  }

  listTheatres(movieId: string): Promise<Theatre[]> {
    return this.serialize(async () => {
      const movie = await this.store.getMovie(movieId);
      if (!movie) {
        throw new NotFoundError(`Movie "${movieId}" not found`);
      }
      return movie.theatres;
    });
  }

  addTheatre(movieId: string, theatre: TheatreInput): Promise<Theatre> {
    return this.serialize(() => this.store.addTheatre(movieId, theatre));
  }

  removeTheatre(movieId: string, theatreName: string): Promise<void> {
    return this.serialize(() => this.store.removeTheatre(movieId, theatreName));
  }

  /**
   * The monitor's once-per-tick read of what to check.
   */
  readEnabledMovies(): Promise<Movie[]> {
    return this.serialize(() => this.store.listMovies(true));
  }

  // ==========================================================================
  // Request dispatch
  // ==========================================================================

  /**
   * Apply one already-parsed request from the command surface.
   * Configuration errors come back as `{ ok: false }`; store failures throw.
   */
  async handle(request: unknown): Promise<MutationResult> {
    try {
      const parsed = mutationRequestSchema.safeParse(request);
      if (!parsed.success) {
        throw new ValidationError(
          parsed.error.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`).join('; '),
        );
      }
      return await this.dispatch(parsed.data);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.info('[Gateway] Request rejected', { code: error.code, error: error.message });
        return { ok: false, error: { code: error.code, message: error.message } };
      }
      throw error;
    }
  }

  private async dispatch(request: MutationRequest): Promise<MutationResult> {
    switch (request.type) {
      case 'add_movie': {
        const id = await this.addMovie(request);
        return { ok: true, type: 'add_movie', movieId: id };
      }
      case 'remove_movie':
        await this.removeMovie(request.movieId);
        return { ok: true, type: 'remove_movie' };
      case 'list_movies':
        return { ok: true, type: 'list_movies', movies: await this.listMovies(request.onlyEnabled ?? false) };
      case 'set_enabled':
        await this.setEnabled(request.movieId, request.enabled);
        return { ok: true, type: 'set_enabled' };
      case 'list_theatres':
        return { ok: true, type: 'list_theatres', theatres: await this.listTheatres(request.movieId) };
      case 'add_theatre':
        return { ok: true, type: 'add_theatre', theatre: await this.addTheatre(request.movieId, request.theatre) };
      case 'remove_theatre':
        await this.removeTheatre(request.movieId, request.name);
        return { ok: true, type: 'remove_theatre' };
    }
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue(fn);
  }
}

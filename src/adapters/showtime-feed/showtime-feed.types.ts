/**
 * Showtime Feed Document Types
 * JSON document served at a movie's booking URL
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

export const feedShowtimeSchema = z.object({
  time: z.string().trim().min(1),
  /** Absent means not bookable */
  available: z.boolean().default(false),
});

export const feedVenueSchema = z.object({
  name: z.string().trim().min(1),
  location: z.string().optional(),
  showtimes: z.array(feedShowtimeSchema),
});

/**
 * Venues are validated one at a time by the mapper so a single bad entry
 * does not discard the rest of the page.
 */
export const feedDocumentSchema = z.object({
  bookingUrl: z.string().optional(),
  theatres: z.array(z.unknown()),
});

export type FeedVenue = z.infer<typeof feedVenueSchema>;
export type FeedDocument = z.infer<typeof feedDocumentSchema>;

/**
 * Loose read of a venue's name, used to tie a malformed entry to a theatre.
 */
export const venueNameSchema = z.object({ name: z.string() });

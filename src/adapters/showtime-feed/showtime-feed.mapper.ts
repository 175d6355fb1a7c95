/**
 * Showtime Feed Mapper
 * Matches feed venues to a movie's configured theatres and pulls out the
 * bookable showtimes.
 */

import type { Theatre } from '../../data/base/store.interface.js';
import type { Slot, TheatreExtraction } from '../base/extractor.interface.js';
import {
  feedVenueSchema,
  venueNameSchema,
  type FeedDocument,
  type FeedVenue,
} from './showtime-feed.types.js';

export interface ParsedVenues {
  venues: FeedVenue[];
  /** Names of entries that failed validation, where a name could be read */
  malformedNames: string[];
  /** Entries with no readable name at all */
  unreadable: number;
}

export function parseVenues(doc: FeedDocument): ParsedVenues {
  const parsed: ParsedVenues = { venues: [], malformedNames: [], unreadable: 0 };

  for (const entry of doc.theatres) {
    const venue = feedVenueSchema.safeParse(entry);
    if (venue.success) {
      parsed.venues.push(venue.data);
      continue;
    }

    const named = venueNameSchema.safeParse(entry);
    if (named.success) {
      parsed.malformedNames.push(named.data.name);
    } else {
      parsed.unreadable++;
    }
  }

  return parsed;
}

/**
 * Case-insensitive substring match against any of the theatre's keywords.
 */
export function matchesTheatre(venueName: string, theatre: Theatre): boolean {
  const haystack = venueName.toLowerCase();
  const keywords = theatre.keywords.length > 0 ? theatre.keywords : [theatre.name.toLowerCase()];
  return keywords.some(keyword => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

/**
 * One extraction per configured theatre, in the theatre list's order.
 *
 * - No venue matches: success with no slots (nothing bookable yet)
 * - Only malformed entries match: failure, so the baseline is left alone
 */
export function mapVenuesToExtractions(
  parsed: ParsedVenues,
  theatres: Theatre[],
): TheatreExtraction[] {
  return theatres.map((theatre): TheatreExtraction => {
    const matched = parsed.venues.filter(venue => matchesTheatre(venue.name, theatre));

    if (matched.length === 0) {
      if (parsed.malformedNames.some(name => matchesTheatre(name, theatre))) {
        return {
          theatreName: theatre.name,
          success: false,
          error: 'Malformed venue entry in showtime feed',
        };
      }
      return { theatreName: theatre.name, success: true, slots: [] };
    }

    const slots: Slot[] = [];
    for (const venue of matched) {
      for (const showtime of venue.showtimes) {
        if (showtime.available && !slots.includes(showtime.time)) {
          slots.push(showtime.time);
        }
      }
    }

    return {
      theatreName: theatre.name,
      success: true,
      slots,
      location: matched.find(venue => venue.location)?.location,
    };
  });
}

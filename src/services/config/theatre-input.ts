/**
 * Normalisation of theatre input before it reaches a store.
 */

import type { TheatreInput } from '../../data/base/store.interface.js';
import { DuplicateError, ValidationError } from '../../utils/errors.js';

export interface NormalizedTheatre {
  name: string;
  nameKey: string;
  tier: number;
  city: string;
  keywords: string[];
}

export function normalizeTheatre(input: TheatreInput, movieCity: string): NormalizedTheatre {
  const name = input.name.trim();
  if (!name) {
    throw new ValidationError('Theatre name must not be empty');
  }

  const tier = input.tier ?? 1;
  if (!Number.isInteger(tier) || tier < 1) {
    throw new ValidationError(`Theatre "${name}" has invalid tier ${tier}`);
  }

  const keywords = (input.keywords ?? [])
    .map(k => k.trim().toLowerCase())
    .filter(k => k.length > 0);

  return {
    name,
    nameKey: theatreKey(name),
    tier,
    city: input.city?.trim() || movieCity,
    keywords: keywords.length > 0 ? keywords : [name.toLowerCase()],
  };
}

/**
 * Normalise a whole list, rejecting case-insensitive duplicates.
 */
export function normalizeTheatreList(inputs: TheatreInput[], movieCity: string): NormalizedTheatre[] {
  const seen = new Set<string>();
  return inputs.map(input => {
    const theatre = normalizeTheatre(input, movieCity);
    if (seen.has(theatre.nameKey)) {
      throw new DuplicateError(`Theatre "${theatre.name}" is listed twice`);
    }
    seen.add(theatre.nameKey);
    return theatre;
  });
}

/** Case-insensitive identity of a theatre within its movie */
export function theatreKey(name: string): string {
  return name.trim().toLowerCase();
}

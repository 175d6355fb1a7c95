/**
 * Theatre list parsing for `DEFAULT_THEATRES`.
 *
 * Format: `NAME:TIER:slug1,slug2;NAME:TIER;NAME`
 * - TIER defaults to 1 (highest display priority)
 * - slugs default to the lowercased name
 */

import type { TheatreInput } from '../data/base/store.interface.js';

export function parseTheatreEntry(entry: string): TheatreInput {
  const [rawName = '', rawTier, rawKeywords] = entry.split(':');
  const name = rawName.trim();
  if (!name) {
    throw new Error(`Theatre entry "${entry}" has no name`);
  }

  let tier = 1;
  if (rawTier !== undefined && rawTier.trim() !== '') {
    tier = Number(rawTier.trim());
    if (!Number.isInteger(tier) || tier < 1) {
      throw new Error(`Theatre "${name}" has invalid tier "${rawTier.trim()}"`);
    }
  }

  const keywords = (rawKeywords ?? '')
    .split(',')
    .map(k => k.trim().toLowerCase())
    .filter(k => k.length > 0);

  return {
    name,
    tier,
    keywords: keywords.length > 0 ? keywords : [name.toLowerCase()],
  };
}

export function parseTheatreList(value: string): TheatreInput[] {
  return value
    .split(';')
    .filter(entry => entry.trim().length > 0)
    .map(parseTheatreEntry);
}

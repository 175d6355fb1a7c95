/**
 * Change Detector
 * Pure comparison of one theatre's fresh extraction against its stored
 * snapshot. Decides whether to alert and what the new baseline is.
 */

import type { Slot, TheatreExtraction } from '../../adapters/base/extractor.interface.js';
import type { Snapshot } from '../../data/base/store.interface.js';

// ============================================================================
// Types
// ============================================================================

export type Decision =
  | {
      kind: 'no_action';
      reason: 'extraction_failed' | 'no_new_slots';
      /** Baseline to commit; null when the extraction failed */
      commitSlots: Slot[] | null;
    }
  | {
      kind: 'alert';
      /** Slots not present in the previous baseline, extraction order */
      newSlots: Slot[];
      commitSlots: Slot[];
    };

// ============================================================================
// Detection
// ============================================================================

/**
 * Trim, drop empties and collapse duplicates, keeping first-seen order.
 */
export function normalizeSlots(slots: readonly Slot[]): Slot[] {
  const seen = new Set<Slot>();
  const result: Slot[] = [];
  for (const raw of slots) {
    const slot = raw.trim();
    if (slot && !seen.has(slot)) {
      seen.add(slot);
      result.push(slot);
    }
  }
  return result;
}

export function detect(
  previous: Snapshot | null,
  extraction: TheatreExtraction | undefined,
): Decision {
  // Missing or failed data is never read as "no showtimes"
  if (!extraction || !extraction.success) {
    return { kind: 'no_action', reason: 'extraction_failed', commitSlots: null };
  }

  const current = normalizeSlots(extraction.slots);

  if (!previous) {
    return current.length > 0
      ? { kind: 'alert', newSlots: current, commitSlots: current }
      : { kind: 'no_action', reason: 'no_new_slots', commitSlots: current };
  }

  const known = new Set(previous.slots);
  const added = current.filter(slot => !known.has(slot));

  // Removed slots only move the baseline
  return added.length > 0
    ? { kind: 'alert', newSlots: added, commitSlots: current }
    : { kind: 'no_action', reason: 'no_new_slots', commitSlots: current };
}

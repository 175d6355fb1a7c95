/**
 * Change Detector Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { detect, normalizeSlots } from '../../../src/services/monitoring/change-detector.js';
import { findTheatreExtraction, type TheatreExtraction } from '../../../src/adapters/base/extractor.interface.js';
import { makeSnapshot } from '../../mocks/fixtures.js';

function ok(slots: string[]): TheatreExtraction {
  return { theatreName: 'PVR Grand Galada', success: true, slots };
}

describe('normalizeSlots', () => {
  it('trims, drops empties and keeps the first occurrence', () => {
    expect(normalizeSlots([' 10:00 AM', '', '1:30 PM', '10:00 AM ', '   '])).toEqual(['10:00 AM', '1:30 PM']);
  });

  it('keeps slots that differ only in case as distinct', () => {
    expect(normalizeSlots(['10:00 am', '10:00 AM'])).toEqual(['10:00 am', '10:00 AM']);
  });
});

describe('detect', () => {
  describe('first observation', () => {
    it('alerts with every slot when the theatre has no snapshot', () => {
      expect(detect(null, ok(['10:00 AM', '1:30 PM']))).toEqual({
        kind: 'alert',
        newSlots: ['10:00 AM', '1:30 PM'],
        commitSlots: ['10:00 AM', '1:30 PM'],
      });
    });

    it('commits an empty baseline without alerting', () => {
      expect(detect(null, ok([]))).toEqual({
        kind: 'no_action',
        reason: 'no_new_slots',
        commitSlots: [],
      });
    });
  });

  describe('against a stored snapshot', () => {
    const previous = makeSnapshot({ slots: ['10:00 AM', '1:30 PM'] });

    it('does nothing new when the slots are unchanged', () => {
      expect(detect(previous, ok(['10:00 AM', '1:30 PM']))).toEqual({
        kind: 'no_action',
        reason: 'no_new_slots',
        commitSlots: ['10:00 AM', '1:30 PM'],
      });
    });

    it('ignores a change of order', () => {
      expect(detect(previous, ok(['1:30 PM', '10:00 AM'])).kind).toBe('no_action');
    });

    it('alerts with only the added slots, in page order', () => {
      const decision = detect(previous, ok(['9:00 PM', '10:00 AM', '1:30 PM', '6:00 PM']));

      expect(decision).toEqual({
        kind: 'alert',
        newSlots: ['9:00 PM', '6:00 PM'],
        commitSlots: ['9:00 PM', '10:00 AM', '1:30 PM', '6:00 PM'],
      });
    });

    it('moves the baseline when slots are only removed', () => {
      expect(detect(previous, ok(['10:00 AM']))).toEqual({
        kind: 'no_action',
        reason: 'no_new_slots',
        commitSlots: ['10:00 AM'],
      });
    });

    it('moves the baseline to empty when every slot is gone', () => {
      expect(detect(previous, ok([])).commitSlots).toEqual([]);
    });

    it('alerts on new slots even when others were removed', () => {
      const decision = detect(previous, ok(['10:00 AM', '7:45 PM']));

      expect(decision.kind).toBe('alert');
      expect(decision.kind === 'alert' && decision.newSlots).toEqual(['7:45 PM']);
    });

    it('reports a duplicated new slot once', () => {
      const decision = detect(previous, ok(['7:45 PM', '7:45 PM']));

      expect(decision).toEqual({ kind: 'alert', newSlots: ['7:45 PM'], commitSlots: ['7:45 PM'] });
    });
  });

  describe('failed data', () => {
    it('leaves the baseline alone when the theatre failed', () => {
      const failed: TheatreExtraction = { theatreName: 'PVR Grand Galada', success: false, error: 'timeout' };

      expect(detect(makeSnapshot(), failed)).toEqual({
        kind: 'no_action',
        reason: 'extraction_failed',
        commitSlots: null,
      });
    });

    it('leaves the baseline alone when the theatre is missing', () => {
      expect(detect(null, undefined)).toEqual({
        kind: 'no_action',
        reason: 'extraction_failed',
        commitSlots: null,
      });
    });
  });
});

describe('findTheatreExtraction', () => {
  it('matches theatre names case-insensitively', () => {
    const result = {
      movieId: 'leo_chennai',
      bookingUrl: 'https://tickets.example.test/movies/leo',
      fetchedAt: new Date(),
      theatres: [ok(['10:00 AM'])],
    };

    expect(findTheatreExtraction(result, ' pvr grand galada ')?.success).toBe(true);
    expect(findTheatreExtraction(result, 'Rohini Silver Screens')).toBeUndefined();
  });
});

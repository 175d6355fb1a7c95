/**
 * Store Interfaces
 * Entities and the persistence contracts the monitor and the mutation
 * gateway depend on. Postgres implementations live in ../repositories.
 */

import type { Slot } from '../../adapters/base/extractor.interface.js';

// ============================================================================
// Entities
// ============================================================================

export interface Theatre {
  /** Internal row id; snapshots hang off it */
  id: number;
  movieId: string;
  name: string;
  /** Display priority, 1 = highest. Never affects detection. */
  tier: number;
  city: string;
  /** Lowercased match terms for the extractor */
  keywords: string[];
  /** Insertion order within the movie */
  position: number;
}

export interface Movie {
  id: string;
  name: string;
  url: string;
  city: string;
  enabled: boolean;
  theatres: Theatre[];
  createdAt: Date;
}

/** The theatre row a check read at the start of its tick */
export type TheatreRef = Pick<Theatre, 'id' | 'movieId' | 'name'>;

export interface TheatreInput {
  name: string;
  tier?: number;
  city?: string;
  keywords?: string[];
}

export interface Snapshot {
  movieId: string;
  theatreName: string;
  slots: Slot[];
  checkedAt: Date;
  alertedAt: Date | null;
}

export type CheckOutcome = 'success' | 'partial' | 'failure';

export interface CheckRecord {
  movieId: string;
  outcome: CheckOutcome;
  theatresChecked: number;
  alerts: number;
  error?: string;
  checkedAt: Date;
}

/** Diagnostic counters; never consulted by the detector */
export interface CheckRun {
  totalChecks: number;
  successes: number;
  partialFailures: number;
  failures: number;
  lastRunAt: Date | null;
}

export interface AlertRecord {
  movieId: string;
  theatres: string[];
  slotCount: number;
  channel: string;
  messageId?: string;
  success: boolean;
  errorMessage?: string;
  sentAt: Date;
}

// ============================================================================
// Store Contracts
// ============================================================================

export interface IConfigStore {
  /** @returns the generated movie id */
  addMovie(name: string, url: string, city: string, theatres: TheatreInput[]): Promise<string>;

  /** Removes the movie, its theatres and their snapshots in one transaction */
  removeMovie(movieId: string): Promise<void>;

  addTheatre(movieId: string, theatre: TheatreInput): Promise<Theatre>;

  /** Removes the theatre and its snapshot in one transaction */
  removeTheatre(movieId: string, theatreName: string): Promise<void>;

  setEnabled(movieId: string, enabled: boolean): Promise<void>;

  listMovies(onlyEnabled: boolean): Promise<Movie[]>;

  getMovie(movieId: string): Promise<Movie | null>;
}

export interface ISnapshotStore {
  getSnapshot(movieId: string, theatreName: string): Promise<Snapshot | null>;

  /**
   * Upsert the slot set for that exact theatre row. A no-op when the row is
   * gone, even if a theatre of the same name has been added since.
   */
  commitSnapshot(theatre: TheatreRef, slots: Slot[], checkedAt: Date): Promise<void>;

  markAlerted(theatre: TheatreRef, alertedAt: Date): Promise<void>;

  deleteForMovie(movieId: string): Promise<void>;

  deleteForTheatre(movieId: string, theatreName: string): Promise<void>;
}

export interface ICheckRunStore {
  recordCheck(record: CheckRecord): Promise<void>;
  getCheckRun(): Promise<CheckRun>;
  getRecentChecks(limit?: number): Promise<CheckRecord[]>;
  pruneHistory(olderThanDays: number): Promise<number>;
}

export interface IAlertLog {
  recordAlert(record: AlertRecord): Promise<void>;
  getRecentAlerts(limit?: number): Promise<AlertRecord[]>;
  countAlerts(): Promise<number>;
  pruneHistory(olderThanDays: number): Promise<number>;
}

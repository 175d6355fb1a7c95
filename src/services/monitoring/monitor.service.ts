/**
 * Monitoring Service
 * Periodic loop that checks every enabled movie, moves each theatre's
 * baseline forward, and sends one alert per movie when new showtimes open.
 */

import pLimit from 'p-limit';
import { TaskCancelledError, timeout, TimeoutStrategy, type TimeoutPolicy } from 'cockatiel';
import type { ExtractionResult, IExtractor } from '../../adapters/base/extractor.interface.js';
import { findTheatreExtraction } from '../../adapters/base/extractor.interface.js';
import { isTimeoutError } from '../../adapters/base/circuit-breaker.js';
import type {
  CheckOutcome,
  IAlertLog,
  ICheckRunStore,
  ISnapshotStore,
  Movie,
  Theatre,
} from '../../data/base/store.interface.js';
import type { AlertTheatre, BookingAlert, INotifier, NotificationResult } from '../../notifications/base/notifier.interface.js';
import type { MutationGateway } from '../config/mutation-gateway.js';
import { detect } from './change-detector.js';
import { isStateStoreError, type StateStoreError } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';

// ============================================================================
// Types
// ============================================================================

export interface MonitorStores {
  snapshots: ISnapshotStore;
  checkRuns: ICheckRunStore;
  alerts: IAlertLog;
}

export interface MonitorConfig {
  checkIntervalMs: number;
  /** Upper bound for one movie's whole check */
  checkTimeoutMs: number;
  workerPoolSize: number;
  failureWarnThreshold: number;
  historyRetentionDays: number;
  pruneIntervalMs: number;
  /** Called once when a store failure stops the monitor */
  onFatal?: (error: StateStoreError) => void;
}

export interface CheckSummary {
  outcome: CheckOutcome;
  theatresChecked: number;
  alerts: number;
  error?: string;
}

export interface TickReport {
  dispatched: string[];
  /** Still being checked from an earlier tick */
  skipped: string[];
}

export interface MonitorStatus {
  running: boolean;
  healthy: boolean;
  ticks: number;
  lastTickAt: Date | null;
  inFlight: string[];
  consecutiveFailures: Record<string, number>;
  fatalError: string | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  checkIntervalMs: config.monitoring.checkIntervalMs,
  checkTimeoutMs: config.monitoring.checkTimeoutMs,
  workerPoolSize: config.monitoring.workerPoolSize,
  failureWarnThreshold: config.monitoring.failureWarnThreshold,
  historyRetentionDays: config.monitoring.historyRetentionDays,
  pruneIntervalMs: 60 * 60 * 1000, // 1 hour
};

// ============================================================================
// Monitor Service
// ============================================================================

export class MonitorService {
  private monitorConfig: MonitorConfig;
  private pool: ReturnType<typeof pLimit>;
  private checkTimeout: TimeoutPolicy;

  // State
  private isRunning = false;
  private timers: NodeJS.Timeout[] = [];
  private inFlight: Set<string> = new Set();
  private consecutiveFailures: Map<string, number> = new Map();
  private ticks = 0;
  private lastTickAt: Date | null = null;
  private fatalError: StateStoreError | null = null;

  constructor(
    private readonly gateway: MutationGateway,
    private readonly extractor: IExtractor,
    private readonly notifier: INotifier,
    private readonly stores: MonitorStores,
    monitorConfig: Partial<MonitorConfig> = {},
  ) {
    this.monitorConfig = { ...DEFAULT_MONITOR_CONFIG, ...monitorConfig };
    this.pool = pLimit(this.monitorConfig.workerPoolSize);
    this.checkTimeout = timeout(this.monitorConfig.checkTimeoutMs, TimeoutStrategy.Aggressive);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Run a tick now, then every check interval
   */
  start(): void {
    if (this.isRunning) {
      logger.warn('[Monitor] Already running');
      return;
    }
    if (this.fatalError) {
      logger.error('[Monitor] Refusing to start after a fatal store error');
      return;
    }

    this.isRunning = true;
    logger.info('[Monitor] Starting monitoring loop', {
      intervalMs: this.monitorConfig.checkIntervalMs,
      timeoutMs: this.monitorConfig.checkTimeoutMs,
      workers: this.monitorConfig.workerPoolSize,
      extractor: this.extractor.name,
      notifier: this.notifier.channel,
    });

    void this.runTick();

    const tickTimer = setInterval(
      () => void this.runTick(),
      this.monitorConfig.checkIntervalMs,
    );
    this.timers.push(tickTimer);

    const pruneTimer = setInterval(
      () => void this.pruneHistory(),
      this.monitorConfig.pruneIntervalMs,
    );
    this.timers.push(pruneTimer);
  }

  /**
   * Stop scheduling new ticks. Checks already running finish on their own.
   */
  stop(): void {
    if (!this.isRunning) return;

    this.isRunning = false;

    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];

    logger.info('[Monitor] Stopped', {
      ticks: this.ticks,
      inFlight: this.inFlight.size,
    });
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  /**
   * One pass over the enabled movies. Resolves when every check it
   * dispatched has finished; never rejects.
   */
  async runTick(): Promise<TickReport> {
    const report: TickReport = { dispatched: [], skipped: [] };
    if (this.fatalError) return report;

    try {
      // Consistent read: mutations queued behind it apply to the next tick
      const movies = await this.gateway.readEnabledMovies();
      this.ticks++;
      this.lastTickAt = new Date();

      const due: Movie[] = [];
      for (const movie of movies) {
        if (this.inFlight.has(movie.id)) {
          report.skipped.push(movie.id);
        } else {
          this.inFlight.add(movie.id);
          due.push(movie);
          report.dispatched.push(movie.id);
        }
      }

      if (report.skipped.length > 0) {
        logger.info('[Monitor] Skipping movies still in flight', { movies: report.skipped });
      }
      logger.debug('[Monitor] Tick', { tick: this.ticks, enabled: movies.length, dispatched: due.length });

      const results = await Promise.allSettled(
        due.map(movie => this.pool(async () => {
          try {
            await this.runCheck(movie);
          } finally {
            this.inFlight.delete(movie.id);
          }
        })),
      );

      for (const result of results) {
        if (result.status === 'rejected') {
          this.handleError(result.reason, 'check');
        }
      }
    } catch (error) {
      this.handleError(error, 'tick');
    }

    return report;
  }

  // ==========================================================================
  // Per-movie check
  // ==========================================================================

  /**
   * Check one movie under the timeout and record the outcome.
   * Only store failures escape.
   */
  private async runCheck(movie: Movie): Promise<void> {
    if (this.fatalError) return;

    const checkedAt = new Date();
    let summary: CheckSummary;

    try {
      summary = await this.checkTimeout.execute(({ signal }) => this.checkMovie(movie, signal, checkedAt));
    } catch (error) {
      if (isStateStoreError(error)) throw error;

      const message = isTimeoutError(error)
        ? `Check timed out after ${this.monitorConfig.checkTimeoutMs}ms`
        : errorMessage(error);
      logger.error(`[Monitor] Check failed for ${movie.id}`, { movieId: movie.id, error: message });

      summary = {
        outcome: 'failure',
        theatresChecked: movie.theatres.length,
        alerts: 0,
        error: message,
      };
    }

    this.trackFailures(movie.id, summary.outcome);

    await this.stores.checkRuns.recordCheck({
      movieId: movie.id,
      outcome: summary.outcome,
      theatresChecked: summary.theatresChecked,
      alerts: summary.alerts,
      error: summary.error,
      checkedAt,
    });
  }

  private async checkMovie(movie: Movie, signal: AbortSignal, checkedAt: Date): Promise<CheckSummary> {
    let extraction: ExtractionResult | null = null;
    let extractionError: string | undefined;

    try {
      extraction = await this.extractor.extract(movie, signal);
    } catch (error) {
      if (isStateStoreError(error)) throw error;
      extractionError = errorMessage(error);
      logger.warn(`[Monitor] Extraction failed for ${movie.id}`, { movieId: movie.id, error: extractionError });
    }

    const alerting: AlertTheatre[] = [];
    const alertingTheatres: Theatre[] = [];
    let failed = 0;

    for (const theatre of movie.theatres) {
      const portion = extraction ? findTheatreExtraction(extraction, theatre.name) : undefined;
      if (!portion || !portion.success) failed++;

      const previous = portion?.success
        ? await this.stores.snapshots.getSnapshot(movie.id, theatre.name)
        : null;
      const decision = detect(previous, portion);

      if (decision.commitSlots !== null) {
        this.throwIfAbandoned(signal);
        await this.stores.snapshots.commitSnapshot(theatre, decision.commitSlots, checkedAt);
      }

      if (decision.kind === 'alert') {
        const location = portion && portion.success ? portion.location : undefined;
        alertingTheatres.push(theatre);
        alerting.push({
          name: theatre.name,
          tier: theatre.tier,
          location: location || theatre.city,
          newSlots: decision.newSlots,
        });
      }
    }

    if (alerting.length > 0) {
      this.throwIfAbandoned(signal);
      await this.notify(movie, extraction?.bookingUrl ?? movie.url, alerting, alertingTheatres);
    }

    return {
      outcome: this.outcomeOf(movie.theatres.length, failed, extraction !== null),
      theatresChecked: movie.theatres.length,
      alerts: alerting.length,
      error: extractionError ?? (failed > 0 ? `${failed} of ${movie.theatres.length} theatres failed` : undefined),
    };
  }

  private outcomeOf(theatres: number, failed: number, extracted: boolean): CheckOutcome {
    if (!extracted) return 'failure';
    if (failed === 0) return 'success';
    return failed === theatres ? 'failure' : 'partial';
  }

  // ==========================================================================
  // Alerting
  // ==========================================================================

  /**
   * One notification per movie. A failed delivery is recorded, not retried;
   * the baseline has already moved.
   */
  private async notify(
    movie: Movie,
    bookingUrl: string,
    theatres: AlertTheatre[],
    sources: Theatre[],
  ): Promise<void> {
    const order = new Map(sources.map(t => [t.name, t.position]));
    const sorted = [...theatres].sort(
      (a, b) => a.tier - b.tier || (order.get(a.name) ?? 0) - (order.get(b.name) ?? 0),
    );

    const alert: BookingAlert = {
      movieId: movie.id,
      movieName: movie.name,
      bookingUrl,
      theatres: sorted,
      detectedAt: new Date(),
    };

    const result = await this.deliver(alert);

    if (result.success) {
      for (const theatre of sources) {
        await this.stores.snapshots.markAlerted(theatre, result.timestamp);
      }
    } else {
      logger.error(`[Monitor] Alert for ${movie.id} was not delivered`, {
        movieId: movie.id,
        channel: result.channel,
        error: result.error,
      });
    }

    await this.stores.alerts.recordAlert({
      movieId: movie.id,
      theatres: sorted.map(t => t.name),
      slotCount: sorted.reduce((sum, t) => sum + t.newSlots.length, 0),
      channel: result.channel,
      messageId: result.messageId,
      success: result.success,
      errorMessage: result.error,
      sentAt: result.timestamp,
    });
  }

  private async deliver(alert: BookingAlert): Promise<NotificationResult> {
    try {
      return await this.notifier.sendAlert(alert);
    } catch (error) {
      return {
        success: false,
        channel: this.notifier.channel,
        error: errorMessage(error),
        timestamp: new Date(),
      };
    }
  }

  // ==========================================================================
  // Failure handling
  // ==========================================================================

  private throwIfAbandoned(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new TaskCancelledError('Check abandoned after timeout');
    }
  }

  private trackFailures(movieId: string, outcome: CheckOutcome): void {
    if (outcome !== 'failure') {
      this.consecutiveFailures.delete(movieId);
      return;
    }

    const count = (this.consecutiveFailures.get(movieId) ?? 0) + 1;
    this.consecutiveFailures.set(movieId, count);

    if (count >= this.monitorConfig.failureWarnThreshold) {
      logger.warn(`[Monitor] ${movieId} has failed ${count} checks in a row`, {
        movieId,
        consecutiveFailures: count,
      });
    }
  }

  private handleError(error: unknown, where: string): void {
    if (isStateStoreError(error)) {
      this.fail(error);
      return;
    }
    logger.error(`[Monitor] Unexpected error in ${where}`, { error: errorMessage(error) });
  }

  private fail(error: StateStoreError): void {
    if (this.fatalError) return;

    this.fatalError = error;
    logger.error('[Monitor] State store failure; stopping', { error: error.message });
    this.stop();
    this.monitorConfig.onFatal?.(error);
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  async pruneHistory(): Promise<void> {
    const days = this.monitorConfig.historyRetentionDays;
    try {
      const checks = await this.stores.checkRuns.pruneHistory(days);
      const alerts = await this.stores.alerts.pruneHistory(days);
      logger.debug('[Monitor] Pruned history', { checks, alerts, olderThanDays: days });
    } catch (error) {
      this.handleError(error, 'prune');
    }
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  getStatus(): MonitorStatus {
    return {
      running: this.isRunning,
      healthy: this.fatalError === null,
      ticks: this.ticks,
      lastTickAt: this.lastTickAt,
      inFlight: [...this.inFlight],
      consecutiveFailures: Object.fromEntries(this.consecutiveFailures),
      fatalError: this.fatalError?.message ?? null,
    };
  }
}

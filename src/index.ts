/**
 * ShowWatch - Movie Showtime Monitor
 * Main Entry Point
 */

import { config } from './config/index.js';
import { errorMessage, logger } from './utils/logger.js';
import type { StateStoreError } from './utils/errors.js';

// Extractor
import { ShowtimeFeedAdapter } from './adapters/showtime-feed/showtime-feed.adapter.js';
import type { ExtractorHealth, IExtractor } from './adapters/base/extractor.interface.js';

// Services
import { MutationGateway } from './services/config/mutation-gateway.js';
import { MonitorService, type MonitorStatus } from './services/monitoring/monitor.service.js';

// Notifications
import { TelegramNotifier } from './notifications/telegram/telegram.notifier.js';
import { LogNotifier } from './notifications/log/log.notifier.js';
import type { INotifier } from './notifications/base/notifier.interface.js';

// Database
import { testConnection, closePool } from './data/database.js';
import type { AlertRecord, CheckRecord, CheckRun } from './data/base/store.interface.js';
import * as MovieRepo from './data/repositories/movie.repository.js';
import * as SnapshotRepo from './data/repositories/snapshot.repository.js';
import * as CheckRunRepo from './data/repositories/check-run.repository.js';
import * as AlertRepo from './data/repositories/alert.repository.js';

export interface HealthReport {
  healthy: boolean;
  database: boolean;
  monitor: MonitorStatus | null;
  checks: CheckRun | null;
  alertsSent: number | null;
  lastCheck: CheckRecord | null;
  lastAlert: AlertRecord | null;
  extractor: ExtractorHealth;
}

// ============================================================================
// Application Class
// ============================================================================

export class ShowWatchApp {
  private configStore = new MovieRepo.PgConfigStore();
  private snapshots = new SnapshotRepo.PgSnapshotStore();
  private checkRuns = new CheckRunRepo.PgCheckRunStore();
  private alerts = new AlertRepo.PgAlertLog();

  private extractor: IExtractor = new ShowtimeFeedAdapter();
  private notifier: INotifier | null = null;
  private gateway: MutationGateway;
  private monitor: MonitorService | null = null;
  private isRunning: boolean = false;

  constructor(private readonly onFatal: (error: StateStoreError) => void = () => {}) {
    this.gateway = new MutationGateway(this.configStore, {
      city: config.movies.defaultCity,
      theatres: config.movies.defaultTheatres,
    });
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  async initialize(): Promise<void> {
    logger.info('🎬 ShowWatch initializing...');

    await this.initializeDatabase();
    await this.seedMovie();
    this.notifier = await this.initializeNotifier();

    logger.info('✅ ShowWatch initialized successfully');
  }

  private async initializeDatabase(): Promise<void> {
    const ok = await testConnection();
    if (!ok) {
      throw new Error('PostgreSQL unavailable');
    }

    // Snapshots reference theatres, so order matters
    await MovieRepo.ensureTables();
    await SnapshotRepo.ensureTable();
    await CheckRunRepo.ensureTables();
    await AlertRepo.ensureTable();

    logger.info('  ✓ PostgreSQL connected');
  }

  /**
   * Add MOVIE_URL on first start so a fresh deployment has something to watch
   */
  private async seedMovie(): Promise<void> {
    const seed = config.movies.seed;
    if (!seed) return;

    const existing = await this.gateway.listMovies();
    if (existing.length > 0) return;

    const movieId = await this.gateway.addMovie({ url: seed.url, name: seed.name });
    logger.info(`  ✓ Seeded movie ${movieId}`, { url: seed.url });
  }

  private async initializeNotifier(): Promise<INotifier> {
    if (config.telegram.botToken && config.telegram.chatId) {
      try {
        const telegram = new TelegramNotifier();
        await telegram.initialize();
        logger.info('  ✓ Telegram notifier ready');
        return telegram;
      } catch (error) {
        logger.warn('  ✗ Telegram notifier failed to initialize', {
          error: errorMessage(error),
        });
      }
    } else {
      logger.info('  - Telegram notifier skipped (no bot token or chat id)');
    }

    const fallback = new LogNotifier();
    await fallback.initialize();
    return fallback;
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Entry point for configuration changes from the command surface
   */
  getGateway(): MutationGateway {
    return this.gateway;
  }

  getMonitor(): MonitorService | null {
    return this.monitor;
  }

  async healthCheck(): Promise<HealthReport> {
    const database = await testConnection();
    const monitor = this.monitor?.getStatus() ?? null;

    let checks: CheckRun | null = null;
    let alertsSent: number | null = null;
    let lastCheck: CheckRecord | null = null;
    let lastAlert: AlertRecord | null = null;
    if (database) {
      try {
        checks = await this.checkRuns.getCheckRun();
        alertsSent = await this.alerts.countAlerts();
        lastCheck = (await this.checkRuns.getRecentChecks(1))[0] ?? null;
        lastAlert = (await this.alerts.getRecentAlerts(1))[0] ?? null;
      } catch (error) {
        logger.warn('Health check could not read counters', { error: errorMessage(error) });
      }
    }

    return {
      healthy: database && (monitor?.healthy ?? true) && checks !== null && checks.totalChecks >= 0,
      database,
      monitor,
      checks,
      alertsSent,
      lastCheck,
      lastAlert,
      extractor: this.extractor.getHealthStatus(),
    };
  }

  /**
   * Start the monitoring loop
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('ShowWatch is already running');
      return;
    }
    if (!this.notifier) {
      throw new Error('ShowWatch not initialized. Call initialize() first.');
    }

    this.monitor = new MonitorService(
      this.gateway,
      this.extractor,
      this.notifier,
      { snapshots: this.snapshots, checkRuns: this.checkRuns, alerts: this.alerts },
      { onFatal: this.onFatal },
    );

    this.monitor.start();

    this.isRunning = true;
    logger.info('🚀 ShowWatch monitoring started');
  }

  /**
   * Stop the monitoring loop and clean up all resources
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    logger.info('🛑 ShowWatch stopping...');

    if (this.monitor) {
      this.monitor.stop();
    }

    if (this.notifier?.stop) {
      try {
        await this.notifier.stop();
      } catch (error) {
        logger.warn(`Failed to stop notifier ${this.notifier.channel}: ${errorMessage(error)}`);
      }
    }

    await closePool();

    logger.info('🛑 ShowWatch stopped');
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  logger.info('═══════════════════════════════════════════');
  logger.info('  🎬 SHOWWATCH - Showtime Monitor');
  logger.info('═══════════════════════════════════════════');

  const exitWith = (code: number) => {
    void app.stop().finally(() => process.exit(code));
  };

  const app = new ShowWatchApp((error) => {
    logger.error('State store failure, exiting', { error: error.message });
    exitWith(1);
  });

  // --- Unhandled rejection / exception handlers ---
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception, shutting down', {
      error: error.message,
      stack: error.stack,
    });
    exitWith(1);
  });

  // --- Graceful shutdown on SIGINT / SIGTERM ---
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    exitWith(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await app.initialize();

    const movies = await app.getGateway().listMovies(true);
    logger.info('🎫 ShowWatch ready!');
    logger.info(`   Watching: ${movies.map(m => m.id).join(', ') || 'nothing yet'}`);
    logger.info(`   Interval: ${config.monitoring.checkIntervalMs / 1000}s`);

    await app.start();

    const health = await app.healthCheck();
    logger.info('Health check:', health);

    logger.info('🔄 Monitoring loop active. Press Ctrl+C to stop.');
  } catch (error) {
    logger.error('Failed to start ShowWatch', {
      error: errorMessage(error),
    });
    await closePool();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error in main', { error: errorMessage(error) });
  process.exit(1);
});

/**
 * Circuit Breaker and Resilience Utilities
 * Fault tolerance for extractor page fetches
 */

import {
  ExponentialBackoff,
  retry,
  circuitBreaker,
  timeout,
  wrap,
  handleAll,
  ConsecutiveBreaker,
  CircuitState,
  TimeoutStrategy,
  BrokenCircuitError,
  TaskCancelledError,
} from 'cockatiel';
import type { ExtractorHealth } from './extractor.interface.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ResilienceConfig {
  /** Extractor name for logging */
  extractorName: string;

  /** Consecutive failures before the circuit opens */
  circuitBreakerThreshold?: number;

  /** Time in ms before a half-open trial call is allowed */
  circuitBreakerHalfOpenAfter?: number;

  /** Retries after the first attempt */
  maxRetryAttempts?: number;

  initialRetryDelay?: number;
  maxRetryDelay?: number;

  /** Budget for a single fetch attempt, in ms */
  timeoutMs?: number;
}

export interface ResiliencePolicies {
  /**
   * Run an operation through timeout, retry and the breaker.
   * The operation receives a signal that fires on per-attempt timeout or
   * when the caller's signal aborts.
   */
  execute<T>(fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T>;

  getCircuitState: () => ExtractorHealth['circuitState'];

  /** Check if circuit is allowing requests */
  isHealthy: () => boolean;
}

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_CONFIG: Required<Omit<ResilienceConfig, 'extractorName'>> = {
  circuitBreakerThreshold: 5,
  circuitBreakerHalfOpenAfter: 300_000, // 5 minutes
  maxRetryAttempts: 2,
  initialRetryDelay: 1_000,
  maxRetryDelay: 10_000,
  timeoutMs: 60_000,
};

const STATE_NAMES: Record<CircuitState, ExtractorHealth['circuitState']> = {
  [CircuitState.Closed]: 'closed',
  [CircuitState.Open]: 'open',
  [CircuitState.HalfOpen]: 'half-open',
  [CircuitState.Isolated]: 'isolated',
};

// ============================================================================
// Create Resilience Policies
// ============================================================================

/**
 * Policy composition (outer to inner):
 * retry → circuitBreaker → timeout → actual call
 *
 * Each attempt gets its own timeout, every failed attempt counts toward
 * the breaker, and an open breaker fails fast without further retries
 * hitting the site.
 */
export function createResiliencePolicies(
  config: ResilienceConfig
): ResiliencePolicies {
  const {
    extractorName,
    circuitBreakerThreshold = DEFAULT_CONFIG.circuitBreakerThreshold,
    circuitBreakerHalfOpenAfter = DEFAULT_CONFIG.circuitBreakerHalfOpenAfter,
    maxRetryAttempts = DEFAULT_CONFIG.maxRetryAttempts,
    initialRetryDelay = DEFAULT_CONFIG.initialRetryDelay,
    maxRetryDelay = DEFAULT_CONFIG.maxRetryDelay,
    timeoutMs = DEFAULT_CONFIG.timeoutMs,
  } = config;

  // -------------------------------------------------------------------------
  // Circuit Breaker
  // -------------------------------------------------------------------------
  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: circuitBreakerHalfOpenAfter,
    breaker: new ConsecutiveBreaker(circuitBreakerThreshold),
  });

  breaker.onBreak(() => {
    logger.error(`[${extractorName}] Circuit breaker OPENED - pausing fetches`, {
      extractor: extractorName,
      halfOpenAfterMs: circuitBreakerHalfOpenAfter,
    });
  });

  breaker.onHalfOpen(() => {
    logger.info(`[${extractorName}] Circuit breaker HALF-OPEN - probing`, {
      extractor: extractorName,
    });
  });

  breaker.onReset(() => {
    logger.info(`[${extractorName}] Circuit breaker CLOSED - resuming fetches`, {
      extractor: extractorName,
    });
  });

  // -------------------------------------------------------------------------
  // Retry with Exponential Backoff
  // -------------------------------------------------------------------------
  const retryPolicy = retry(handleAll, {
    maxAttempts: maxRetryAttempts,
    backoff: new ExponentialBackoff({
      initialDelay: initialRetryDelay,
      maxDelay: maxRetryDelay,
      exponent: 2,
    }),
  });

  retryPolicy.onRetry((event) => {
    logger.warn(`[${extractorName}] Retrying fetch (attempt ${event.attempt})`, {
      extractor: extractorName,
      attempt: event.attempt,
      delay: event.delay,
      error: 'error' in event ? event.error.message : undefined,
    });
  });

  retryPolicy.onGiveUp((event) => {
    logger.error(`[${extractorName}] Giving up on fetch`, {
      extractor: extractorName,
      error: 'error' in event ? event.error.message : undefined,
    });
  });

  // -------------------------------------------------------------------------
  // Timeout
  // -------------------------------------------------------------------------
  const timeoutPolicy = timeout(timeoutMs, TimeoutStrategy.Aggressive);

  timeoutPolicy.onTimeout(() => {
    logger.warn(`[${extractorName}] Fetch timed out after ${timeoutMs}ms`, {
      extractor: extractorName,
      timeoutMs,
    });
  });

  const combined = wrap(retryPolicy, breaker, timeoutPolicy);

  return {
    execute: (fn, signal) => combined.execute(({ signal: attemptSignal }) => fn(attemptSignal), signal),
    getCircuitState: () => STATE_NAMES[breaker.state],
    isHealthy: () => breaker.state === CircuitState.Closed,
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Check if an error is a circuit breaker rejection
 */
export function isCircuitBreakerOpen(error: unknown): boolean {
  return error instanceof BrokenCircuitError;
}

/**
 * Check if an error is a timeout or cancellation
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof TaskCancelledError;
}

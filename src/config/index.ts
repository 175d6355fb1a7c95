/**
 * Configuration Module
 * Centralized configuration management with validation
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { parseTheatreList } from './theatre-list.js';

// Load environment variables
dotenv.config();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/120.0.0.0 Safari/537.36';

const intString = (fallback: string, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(min).max(max));

// ============================================================================
// Environment Schema
// ============================================================================

const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // Database
    DATABASE_URL: z.string().url().optional(),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: intString('5432', 1),
    DB_NAME: z.string().default('showwatch'),
    DB_USER: z.string().default('showwatch'),
    DB_PASSWORD: z.string().optional(),

    // Scheduling (seconds)
    CHECK_INTERVAL: intString('120', 1),
    MIN_INTERVAL: intString('30', 1),
    MAX_INTERVAL: intString('300', 1),
    CHECK_TIMEOUT: z.string().transform(Number).pipe(z.number().int().min(1)).optional(),
    WORKER_POOL_SIZE: intString('2', 1, 8),
    FAILURE_WARN_THRESHOLD: intString('5', 1),
    HISTORY_RETENTION_DAYS: intString('30', 1),

    // Movies
    DEFAULT_CITY: z.string().min(1).default('Chennai'),
    DEFAULT_THEATRES: z
      .string()
      .default('')
      .transform((value, ctx) => {
        try {
          return parseTheatreList(value);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : String(error),
          });
          return z.NEVER;
        }
      }),
    MOVIE_URL: z.string().url().optional(),
    MOVIE_NAME: z.string().min(1).default('Movie'),

    // Extractor
    EXTRACTOR_TIMEOUT_MS: intString('60000', 1000),
    EXTRACTOR_MAX_RETRIES: intString('2', 0),
    CIRCUIT_BREAKER_THRESHOLD: intString('5', 1),
    CIRCUIT_BREAKER_TIMEOUT: intString('300', 1),
    USER_AGENT: z.string().default(DEFAULT_USER_AGENT),

    // Telegram
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    TELEGRAM_CHAT_ID: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.CHECK_INTERVAL < env.MIN_INTERVAL || env.CHECK_INTERVAL > env.MAX_INTERVAL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHECK_INTERVAL'],
        message: `CHECK_INTERVAL must be between ${env.MIN_INTERVAL} and ${env.MAX_INTERVAL} seconds`,
      });
    }
    if (env.CHECK_TIMEOUT !== undefined && env.CHECK_TIMEOUT <= env.CHECK_INTERVAL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHECK_TIMEOUT'],
        message: 'CHECK_TIMEOUT must be longer than CHECK_INTERVAL',
      });
    }
  });

// ============================================================================
// Configuration Object
// ============================================================================

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = envSchema.parse(source);
  const checkTimeout = env.CHECK_TIMEOUT ?? env.CHECK_INTERVAL * 2;

  return {
    // Application settings
    app: {
      env: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },

    // Database configuration
    database: {
      url: env.DATABASE_URL,
      host: env.DB_HOST,
      port: env.DB_PORT,
      name: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
    },

    // Scheduler
    monitoring: {
      checkIntervalMs: env.CHECK_INTERVAL * 1000,
      checkTimeoutMs: checkTimeout * 1000,
      workerPoolSize: env.WORKER_POOL_SIZE,
      failureWarnThreshold: env.FAILURE_WARN_THRESHOLD,
      historyRetentionDays: env.HISTORY_RETENTION_DAYS,
    },

    // Movie defaults
    movies: {
      defaultCity: env.DEFAULT_CITY,
      defaultTheatres: env.DEFAULT_THEATRES,
      seed: env.MOVIE_URL ? { url: env.MOVIE_URL, name: env.MOVIE_NAME } : null,
    },

    // Showtime feed extractor
    extractor: {
      timeout: env.EXTRACTOR_TIMEOUT_MS,
      retryAttempts: env.EXTRACTOR_MAX_RETRIES,
      userAgent: env.USER_AGENT,
      circuitBreaker: {
        threshold: env.CIRCUIT_BREAKER_THRESHOLD,
        halfOpenAfterMs: env.CIRCUIT_BREAKER_TIMEOUT * 1000,
      },
    },

    // Telegram configuration
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN || '',
      chatId: env.TELEGRAM_CHAT_ID || '',
    },
  } as const;
}

export const config = loadConfig();

// Export type for use in other modules
export type Config = ReturnType<typeof loadConfig>;

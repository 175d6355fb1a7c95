/**
 * Notifier Interface
 * Defines the contract for all notification channels (Telegram, log)
 */

import type { Slot } from '../../adapters/base/extractor.interface.js';

// ============================================================================
// Notification Channel Types
// ============================================================================

export type NotificationChannel = 'telegram' | 'log';

// ============================================================================
// Alert Payload Types
// ============================================================================

export interface AlertTheatre {
  name: string;
  tier: number;
  /** Location label from the page, or the theatre's city */
  location: string;
  /** Only the slots that are new since the last baseline */
  newSlots: Slot[];
}

export interface BookingAlert {
  movieId: string;
  movieName: string;
  bookingUrl: string;
  /** Ordered by tier, then insertion order */
  theatres: AlertTheatre[];
  detectedAt: Date;
}

// ============================================================================
// Notification Result Types
// ============================================================================

export interface NotificationResult {
  success: boolean;
  channel: NotificationChannel;
  messageId?: string;
  error?: string;
  timestamp: Date;
}

// ============================================================================
// Notifier Interface
// ============================================================================

export interface INotifier {
  /** The notification channel this notifier handles */
  readonly channel: NotificationChannel;

  /**
   * Initialize the notifier (connect to service, validate credentials)
   * @throws Error if initialization fails
   */
  initialize(): Promise<void>;

  /**
   * Deliver one alert. Failures are reported in the result, not thrown.
   */
  sendAlert(alert: BookingAlert): Promise<NotificationResult>;

  /** Release connections; optional */
  stop?(): Promise<void>;
}

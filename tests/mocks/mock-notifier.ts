/**
 * Mock Notifier
 * In-memory notification channel that captures all sent alerts for assertion.
 */

import type {
  INotifier,
  NotificationChannel,
  BookingAlert,
  NotificationResult,
} from '../../src/notifications/base/notifier.interface.js';

export class MockNotifier implements INotifier {
  readonly channel: NotificationChannel;

  /** Every alert handed to sendAlert, delivered or not */
  sentAlerts: BookingAlert[] = [];

  private shouldSucceed = true;
  private shouldThrow = false;
  private errorMessage = '';
  private sequence = 0;

  calls = {
    initialize: 0,
    sendAlert: 0,
  };

  constructor(channel: NotificationChannel = 'telegram') {
    this.channel = channel;
  }

  // ==========================================================================
  // Configuration Helpers
  // ==========================================================================

  /** Make sendAlert succeed or report a failure */
  setSuccess(succeed: boolean, errorMessage: string = ''): this {
    this.shouldSucceed = succeed;
    this.errorMessage = errorMessage;
    return this;
  }

  /** Make sendAlert throw instead of returning a result */
  setThrow(shouldThrow: boolean, message: string = 'Notifier error'): this {
    this.shouldThrow = shouldThrow;
    this.errorMessage = message;
    return this;
  }

  reset(): void {
    this.sentAlerts = [];
    this.shouldSucceed = true;
    this.shouldThrow = false;
    this.errorMessage = '';
    this.calls = { initialize: 0, sendAlert: 0 };
  }

  // ==========================================================================
  // INotifier
  // ==========================================================================

  async initialize(): Promise<void> {
    this.calls.initialize++;
  }

  async sendAlert(alert: BookingAlert): Promise<NotificationResult> {
    this.calls.sendAlert++;
    this.sentAlerts.push(alert);

    if (this.shouldThrow) {
      throw new Error(this.errorMessage);
    }

    if (!this.shouldSucceed) {
      return {
        success: false,
        channel: this.channel,
        error: this.errorMessage,
        timestamp: new Date(),
      };
    }

    return {
      success: true,
      channel: this.channel,
      messageId: `msg-${++this.sequence}`,
      timestamp: new Date(),
    };
  }
}

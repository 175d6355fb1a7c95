/**
 * Log Notifier
 * Writes alerts to the application log. Used when no Telegram bot is
 * configured, e.g. local development.
 */

import type {
  INotifier,
  BookingAlert,
  NotificationResult,
  NotificationChannel,
} from '../base/notifier.interface.js';
import { TelegramFormatter } from '../telegram/telegram.formatter.js';
import { logger, logAlertDelivery } from '../../utils/logger.js';

export class LogNotifier implements INotifier {
  readonly channel: NotificationChannel = 'log';

  private formatter = new TelegramFormatter();
  private sequence = 0;

  async initialize(): Promise<void> {
    logger.info('[LogNotifier] Alerts will be written to the log only');
  }

  async sendAlert(alert: BookingAlert): Promise<NotificationResult> {
    const messageId = `log-${++this.sequence}`;

    logger.info(`[LogNotifier] New showtimes for ${alert.movieName}`, {
      movieId: alert.movieId,
      bookingUrl: alert.bookingUrl,
      theatres: alert.theatres.map(t => `${t.name}: ${this.formatter.formatSlots(t.newSlots)}`),
    });
    logAlertDelivery('log', alert.movieId, true, messageId);

    return {
      success: true,
      channel: 'log',
      messageId,
      timestamp: new Date(),
    };
  }
}

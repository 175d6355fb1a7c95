/**
 * Telegram Notifier
 * Sends booking alerts to a single chat via the Telegram Bot API
 */

import { Telegraf } from 'telegraf';
import type {
  INotifier,
  BookingAlert,
  NotificationResult,
  NotificationChannel,
} from '../base/notifier.interface.js';
import { TelegramFormatter } from './telegram.formatter.js';
import { errorMessage, logger, logAlertDelivery } from '../../utils/logger.js';
import { config } from '../../config/index.js';

// ============================================================================
// Telegram Notifier Implementation
// ============================================================================

export class TelegramNotifier implements INotifier {
  readonly channel: NotificationChannel = 'telegram';

  private bot: Telegraf;
  private formatter: TelegramFormatter;
  private isInitialized: boolean = false;

  constructor(
    private readonly botToken: string = config.telegram.botToken,
    private readonly chatId: string = config.telegram.chatId,
  ) {
    this.bot = new Telegraf(botToken);
    this.formatter = new TelegramFormatter();
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  async initialize(): Promise<void> {
    if (this.isInitialized) return;

    if (!this.botToken) {
      throw new Error('Telegram bot token not configured');
    }
    if (!this.chatId) {
      throw new Error('Telegram chat id not configured');
    }

    try {
      // Verify bot token by getting bot info
      const botInfo = await this.bot.telegram.getMe();
      logger.info(`[Telegram] Bot initialized: @${botInfo.username}`, {
        botId: botInfo.id,
        username: botInfo.username,
      });

      this.isInitialized = true;
    } catch (error) {
      throw new Error(`Failed to initialize Telegram bot: ${errorMessage(error)}`, { cause: error });
    }
  }

  // ==========================================================================
  // Send Alert
  // ==========================================================================

  async sendAlert(alert: BookingAlert): Promise<NotificationResult> {
    const startTime = Date.now();

    try {
      await this.ensureInitialized();

      const message = this.formatter.formatAlert(alert);
      const result = await this.bot.telegram.sendMessage(this.chatId, message, {
        parse_mode: 'MarkdownV2',
      });

      const messageId = result.message_id.toString();
      logAlertDelivery('telegram', alert.movieId, true, messageId);

      logger.info(`[Telegram] Alert sent`, {
        movieId: alert.movieId,
        messageId,
        latency: Date.now() - startTime,
        theatres: alert.theatres.length,
      });

      return {
        success: true,
        channel: 'telegram',
        messageId,
        timestamp: new Date(),
      };
    } catch (error) {
      const message = this.describeTelegramError(error);
      logAlertDelivery('telegram', alert.movieId, false, undefined, message);

      return {
        success: false,
        channel: 'telegram',
        error: message,
        timestamp: new Date(),
      };
    }
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async ensureInitialized(): Promise<void> {
    if (!this.isInitialized) {
      await this.initialize();
    }
  }

  /**
   * Map Telegram API failures to something readable in the alert log
   */
  private describeTelegramError(error: unknown): string {
    if (!(error instanceof Error)) {
      return 'Unknown error';
    }

    const message = error.message.toLowerCase();

    if (message.includes('forbidden') || message.includes('blocked')) {
      return 'Bot was blocked or removed from the chat';
    }
    if (message.includes('chat not found')) {
      return 'Chat not found';
    }
    if (message.includes('too many requests') || message.includes('429')) {
      return 'Rate limited by Telegram';
    }
    if (message.includes("can't parse entities")) {
      return 'Invalid message format';
    }

    return error.message;
  }
}

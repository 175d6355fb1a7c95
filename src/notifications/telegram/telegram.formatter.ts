/**
 * Telegram Message Formatter
 * Formats booking alerts for Telegram using MarkdownV2
 */

import type { AlertTheatre, BookingAlert } from '../base/notifier.interface.js';

/** Showtimes listed per theatre before collapsing into "+N more" */
const MAX_LISTED_SLOTS = 6;

// ============================================================================
// Telegram Formatter
// ============================================================================

export class TelegramFormatter {
  /**
   * Format a full alert message for Telegram
   */
  formatAlert(alert: BookingAlert): string {
    const header =
      `🚨 *${this.escapeMarkdown('BOOKING ALERT')}* 🚨\n\n` +
      `✨ *${this.escapeMarkdown('New showtimes detected!')}* ✨\n\n` +
      `🎬 *${this.escapeMarkdown(alert.movieName)}*`;

    const theatres = alert.theatres
      .map((theatre, idx) => this.formatTheatre(theatre, idx + 1))
      .join('\n\n');

    const footer =
      `🔗 [Book Now](${this.escapeUrl(alert.bookingUrl)})\n\n` +
      `⏰ ${this.escapeMarkdown(this.formatDate(alert.detectedAt))}`;

    return `${header}\n\n${theatres}\n\n${footer}`;
  }

  /**
   * Format one theatre block
   */
  formatTheatre(theatre: AlertTheatre, rank: number): string {
    const stars = '⭐'.repeat(Math.max(1, Math.min(theatre.tier, 5)));
    const lines = [`${rank}\\. ${stars} *${this.escapeMarkdown(theatre.name)}*`];

    if (theatre.location) {
      lines.push(`   📍 _${this.escapeMarkdown(theatre.location)}_`);
    }

    lines.push(`   🎬 ${this.escapeMarkdown(this.formatSlots(theatre.newSlots))}`);
    return lines.join('\n');
  }

  /**
   * "10:00 AM, 1:30 PM +2 more"
   */
  formatSlots(slots: readonly string[]): string {
    const listed = slots.slice(0, MAX_LISTED_SLOTS).join(', ');
    const rest = slots.length - MAX_LISTED_SLOTS;
    return rest > 0 ? `${listed} +${rest} more` : listed;
  }

  private formatDate(date: Date): string {
    return date.toLocaleString('en-US', {
      hour: 'numeric',
      minute: '2-digit',
      day: 'numeric',
      month: 'short',
    });
  }

  /**
   * Escape special characters for MarkdownV2
   * Characters: _ * [ ] ( ) ~ ` > # + - = | { } . !
   *
   * Only call this once on raw text, or it will be double-escaped.
   */
  escapeMarkdown(text: string): string {
    return text.replace(/[_*[\]()~`>#+=|{}.!\\-]/g, '\\$&');
  }

  /**
   * Inside the (...) part of a link only ")" and "\" need escaping
   */
  escapeUrl(url: string): string {
    return url.replace(/[)\\]/g, '\\$&');
  }
}

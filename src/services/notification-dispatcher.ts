import TelegramBot from 'node-telegram-bot-api';
import type { AnnotatedListing } from '../types/listing';
import type { Logger } from '../utils/logger';

/**
 * Receives the listings a run found for the first time
 */
export interface Notifier {
  readonly channel: string;
  notify(listings: readonly AnnotatedListing[]): Promise<void>;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Fans one announcement out to several channels
 * Every channel is tried; the call fails if any of them failed
 */
export class NotifierGroup implements Notifier {
  readonly channel: string;

  constructor(
    private notifiers: Notifier[],
    private logger: Logger
  ) {
    this.channel = notifiers.map(notifier => notifier.channel).join('+');
  }

  async notify(listings: readonly AnnotatedListing[]): Promise<void> {
    const failed: string[] = [];

    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(listings);
      } catch (error) {
        this.logger.error(`Notification channel ${notifier.channel} failed`, error);
        failed.push(`${notifier.channel}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (failed.length > 0) {
      throw new Error(`Notification failed on ${failed.join('; ')}`);
    }
  }
}

export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    options?: { parse_mode?: 'HTML'; disable_web_page_preview?: boolean }
  ): Promise<unknown>;
}

export function createTelegramSender(botToken: string): MessageSender {
  return new TelegramBot(botToken, { polling: false });
}

export interface TelegramNotifierOptions {
  chatId: string;
  maxMessages: number;
  logger: Logger;
}

/**
 * Sends new listings to a Telegram chat
 * One summary message, then one message per listing up to the limit
 */
export class TelegramNotifier implements Notifier {
  readonly channel = 'telegram';

  constructor(
    private sender: MessageSender,
    private options: TelegramNotifierOptions
  ) {}

  async notify(listings: readonly AnnotatedListing[]): Promise<void> {
    if (listings.length === 0) {
      return;
    }

    const { chatId, maxMessages, logger } = this.options;
    const limited = listings.slice(0, maxMessages);

    await this.sender.sendMessage(chatId, this.formatSummary(listings.length, limited.length), {
      parse_mode: 'HTML',
    });

    let sentCount = 0;
    for (const item of limited) {
      try {
        await this.sender.sendMessage(chatId, this.formatListingMessage(item), {
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        });
        sentCount++;
      } catch (error) {
        logger.error(`Failed to send notification`, error, {
          company: item.listing.company,
          role: item.listing.role,
        });
        // Continue with other listings - partial failures are acceptable
      }
    }

    logger.info(`Sent ${sentCount} listing notifications`, { found: listings.length });
  }

  formatSummary(total: number, shown: number): string {
    const lines = [`🎯 <b>${total} new internship${total === 1 ? '' : 's'} found</b>`];
    if (shown < total) {
      lines.push(`Showing the first ${shown}.`);
    }
    return lines.join('\n');
  }

  /**
   * Formats a listing as a Telegram message
   */
  formatListingMessage({ listing, annotation }: AnnotatedListing): string {
    const lines = [`🔍 <b>${escapeHtml(listing.role || 'Internship')}</b>`];

    if (listing.company) {
      lines.push(`🏢 ${escapeHtml(listing.company)}`);
    }

    if (listing.location) {
      lines.push(`📍 ${escapeHtml(listing.location)}`);
    }

    lines.push(`🌐 ${escapeHtml(listing.source)}`);

    if (annotation) {
      const rationale = annotation.rationale ? `: ${escapeHtml(annotation.rationale)}` : '';
      lines.push(`⭐ Match ${annotation.score}/100${rationale}`);
    }

    if (listing.link) {
      lines.push(`\n🔗 <a href="${escapeHtml(listing.link)}">View Internship</a>`);
    }

    return lines.join('\n');
  }
}

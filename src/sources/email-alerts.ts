import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import { parse } from 'node-html-parser';
import type { RawListing } from '../types/listing';
import type { Logger } from '../utils/logger';
import type { ListingProducer } from './base';

export interface AlertMessage {
  uid: number;
  subject: string;
  body: string;
}

/**
 * Mailbox holding job alert emails
 */
export interface AlertMailbox {
  fetchUnseen(fromFilter: string): Promise<AlertMessage[]>;
  markSeen(uids: number[]): Promise<void>;
  close(): Promise<void>;
}

export interface ImapCredentials {
  host: string;
  port: number;
  user: string;
  password: string;
}

/**
 * IMAP inbox reader built on imapflow
 */
export class ImapAlertMailbox implements AlertMailbox {
  private client: ImapFlow | null = null;

  constructor(
    private readonly credentials: ImapCredentials,
    private readonly logger: Logger
  ) {}

  private async connect(): Promise<ImapFlow> {
    if (!this.client) {
      const client = new ImapFlow({
        host: this.credentials.host,
        port: this.credentials.port,
        secure: true,
        auth: { user: this.credentials.user, pass: this.credentials.password },
        logger: false,
      });
      await client.connect();
      await client.mailboxOpen('INBOX');
      this.client = client;
    }
    return this.client;
  }

  async fetchUnseen(fromFilter: string): Promise<AlertMessage[]> {
    const client = await this.connect();
    const uids = (await client.search({ seen: false, from: fromFilter }, { uid: true })) || [];
    if (uids.length === 0) return [];

    const messages: AlertMessage[] = [];
    for await (const message of client.fetch(uids, { source: true }, { uid: true })) {
      if (!message.source) continue;
      try {
        const parsed = await simpleParser(message.source);
        const body = parsed.text ?? (parsed.html ? parse(parsed.html).text : '');
        messages.push({ uid: message.uid, subject: parsed.subject ?? '', body });
      } catch (error) {
        this.logger.warn('Skipping unreadable alert email', {
          uid: message.uid,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return messages;
  }

  async markSeen(uids: number[]): Promise<void> {
    if (uids.length === 0) return;
    const client = await this.connect();
    await client.messageFlagsAdd(uids, ['\\Seen'], { uid: true });
  }

  async close(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.logout();
    }
  }
}

export interface EmailAlertsOptions {
  logger: Logger;
  openMailbox: (() => AlertMailbox) | null;
  fromFilter?: string;
}

const URL_PATTERN = /https?:\/\/\S+/;

/**
 * Turns unread LinkedIn job alert emails into listings
 * Mails are only flagged read through acknowledge(), after the store commit
 */
export class EmailAlertsSource implements ListingProducer {
  readonly name = 'email-alerts';
  private pendingUids: number[] = [];

  constructor(private readonly options: EmailAlertsOptions) {}

  async fetch(_skillsQuery: string): Promise<RawListing[]> {
    const { logger, openMailbox } = this.options;

    if (!openMailbox) {
      logger.warn('Email credentials not found. Skipping email alerts.');
      return [];
    }

    logger.info('Reading job alert emails...');
    this.pendingUids = [];
    const mailbox = openMailbox();

    try {
      const messages = await mailbox.fetchUnseen(this.options.fromFilter ?? 'linkedin');
      if (messages.length === 0) {
        logger.info('No unread LinkedIn job alert emails found.');
        return [];
      }

      const listings = messages
        .map(message => this.toListing(message))
        .filter((listing): listing is RawListing => listing !== null);

      this.pendingUids = messages.map(message => message.uid);

      logger.info(`Extracted ${listings.length} job alerts from email`, { messages: messages.length });
      return listings;
    } finally {
      await mailbox.close();
    }
  }

  async acknowledge(): Promise<void> {
    const { logger, openMailbox } = this.options;
    if (!openMailbox || this.pendingUids.length === 0) return;

    const uids = this.pendingUids;
    const mailbox = openMailbox();
    try {
      await mailbox.markSeen(uids);
      this.pendingUids = [];
      logger.info(`Marked ${uids.length} alert emails as read`);
    } finally {
      await mailbox.close();
    }
  }

  toListing(message: AlertMessage): RawListing | null {
    const body = message.body.toLowerCase();
    if (!body.includes('job') && !body.includes('opportunity')) {
      return null;
    }

    const url = message.body.match(URL_PATTERN);
    return {
      company: 'LinkedIn Alert',
      role: message.subject ? message.subject.slice(0, 50) : 'Job Opportunity',
      location: 'Check Email',
      link: url ? url[0] : '',
    };
  }
}

import nodemailer from 'nodemailer';
import type { AnnotatedListing } from '../types/listing';
import type { Logger } from '../utils/logger';
import type { Notifier } from './notification-dispatcher';
import { escapeHtml } from './notification-dispatcher';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface SmtpOptions {
  host: string;
  port: number;
  user: string;
  password: string;
}

export function createSmtpTransport(options: SmtpOptions): MailTransport {
  return nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.port === 465,
    auth: { user: options.user, pass: options.password },
  });
}

export interface EmailNotifierOptions {
  address: string;
  logger: Logger;
}

/**
 * Mails the whole set of new listings to the configured address
 * Plain-text body plus an HTML table of the same rows
 */
export class EmailNotifier implements Notifier {
  readonly channel = 'email';

  constructor(
    private transport: MailTransport,
    private options: EmailNotifierOptions
  ) {}

  async notify(listings: readonly AnnotatedListing[]): Promise<void> {
    if (listings.length === 0) {
      return;
    }

    const { address, logger } = this.options;
    logger.info(`Sending email notification with ${listings.length} internships...`);

    await this.transport.sendMail({
      from: address,
      to: address,
      subject: `[Internship Bot] Found ${listings.length} New Internships`,
      text: this.formatText(listings),
      html: this.formatHtml(listings),
    });

    logger.info('Email notification sent', { to: address });
  }

  formatText(listings: readonly AnnotatedListing[]): string {
    const lines = [`Found ${listings.length} new internships!`, ''];

    for (const { listing, annotation } of listings) {
      lines.push(
        `Company: ${listing.company}`,
        `Role: ${listing.role}`,
        `Location: ${listing.location}`,
        `Source: ${listing.source}`,
        `Link: ${listing.link || 'N/A'}`
      );
      if (annotation) {
        lines.push(`Match: ${annotation.score}/100${annotation.rationale ? ` (${annotation.rationale})` : ''}`);
      }
      lines.push('---');
    }

    return lines.join('\n');
  }

  formatHtml(listings: readonly AnnotatedListing[]): string {
    const rows = listings.map(({ listing }) => {
      const link = listing.link ? `<a href="${escapeHtml(listing.link)}">View</a>` : 'N/A';
      return [
        '<tr>',
        `<td>${escapeHtml(listing.company)}</td>`,
        `<td>${escapeHtml(listing.role)}</td>`,
        `<td>${escapeHtml(listing.location)}</td>`,
        `<td>${escapeHtml(listing.source)}</td>`,
        `<td>${link}</td>`,
        '</tr>',
      ].join('');
    });

    return [
      '<html><body>',
      `<h2>🎯 New Internships Found! (${listings.length})</h2>`,
      '<table border="1" cellpadding="10" cellspacing="0" style="border-collapse: collapse; width: 100%;">',
      '<tr style="background-color: #4472C4; color: white;"><th>Company</th><th>Role</th><th>Location</th><th>Source</th><th>Link</th></tr>',
      ...rows,
      '</table>',
      '<p><small>This email was generated automatically by the Internship Finder Bot.</small></p>',
      '</body></html>',
    ].join('\n');
  }
}

/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { LogLevel, parseLogLevel } from '../utils/logger';
import { isProductionEnvironment } from '../db/client';

export type StoreBackendKind = 'csv' | 'postgres';

export interface Config {
  // Search
  skillsQuery: string;

  // Store
  storeBackend: StoreBackendKind;
  listingsFile: string;
  databaseUrl?: string;
  databaseSsl: boolean;

  // Source Toggles
  enableInternshala: boolean;
  enableWellfound: boolean;
  enableGlassdoor: boolean;
  enableCareerPages: boolean;
  enableLinkedIn: boolean;
  enableEmailAlerts: boolean;

  // Notification Channels
  enableEmailNotifications: boolean;

  // Credentials
  linkedin: {
    email?: string;
    password?: string;
    chromeExecutablePath?: string;
  };
  email: {
    address?: string;
    password?: string;
    imapHost: string;
    imapPort: number;
    smtpHost: string;
    smtpPort: number;
  };
  telegram: {
    botToken?: string;
    chatId?: string;
  };
  gemini: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };

  // Filtering
  excludedKeywords: string[];
  maxPostingAgeHours: number;

  // Safety Limits
  maxListingsPerSource: number;
  maxNotificationsPerRun: number;
  maxEnrichedListings: number;
  producerTimeoutMs: number;
  requestTimeoutMs: number;

  serverless: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_SKILLS_QUERY = 'Python, Data Science, Machine Learning, Backend Development, Full Stack';

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStoreBackend(value: string | undefined): StoreBackendKind {
  const backend = (value || 'csv').toLowerCase();
  if (backend !== 'csv' && backend !== 'postgres') {
    throw new Error(`Invalid STORE_BACKEND "${value}": expected "csv" or "postgres"`);
  }
  return backend;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const storeBackend = parseStoreBackend(env.STORE_BACKEND);
  const databaseUrl = optional(env.DATABASE_URL);

  if (storeBackend === 'postgres' && !databaseUrl) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }

  const serverless = !!(env.VERCEL || env.AWS_LAMBDA_FUNCTION_NAME);

  return {
    skillsQuery: optional(env.INTERNSHIP_SEARCH_QUERY) ?? DEFAULT_SKILLS_QUERY,
    storeBackend,
    listingsFile: optional(env.LISTINGS_FILE) ?? 'data/internships.csv',
    databaseUrl,
    databaseSsl: isProductionEnvironment(env) || env.DATABASE_SSL !== 'false',
    enableInternshala: parseBoolean(env.ENABLE_INTERNSHALA, true),
    enableWellfound: parseBoolean(env.ENABLE_WELLFOUND, true),
    enableGlassdoor: parseBoolean(env.ENABLE_GLASSDOOR, true),
    enableCareerPages: parseBoolean(env.ENABLE_CAREER_PAGES, true),
    enableLinkedIn: parseBoolean(env.ENABLE_LINKEDIN, true),
    enableEmailAlerts: parseBoolean(env.ENABLE_EMAIL_ALERTS, true),
    enableEmailNotifications: parseBoolean(env.ENABLE_EMAIL_NOTIFICATIONS, true),
    linkedin: {
      email: optional(env.LINKEDIN_EMAIL),
      password: optional(env.LINKEDIN_PASSWORD),
      chromeExecutablePath: optional(env.CHROME_EXECUTABLE_PATH),
    },
    email: {
      address: optional(env.EMAIL_ADDRESS),
      password: optional(env.EMAIL_PASSWORD),
      imapHost: optional(env.IMAP_HOST) ?? 'imap.gmail.com',
      imapPort: parseNumber(env.IMAP_PORT, 993),
      smtpHost: optional(env.SMTP_HOST) ?? 'smtp.gmail.com',
      smtpPort: parseNumber(env.SMTP_PORT, 465),
    },
    telegram: {
      botToken: optional(env.TELEGRAM_BOT_TOKEN),
      chatId: optional(env.TELEGRAM_CHAT_ID),
    },
    gemini: {
      apiKey: optional(env.GEMINI_API_KEY),
      model: optional(env.GEMINI_MODEL) ?? 'gemini-1.5-flash',
      timeoutMs: parseNumber(env.GEMINI_TIMEOUT_MS, 30000),
    },
    excludedKeywords: parseStringArray(env.EXCLUDED_KEYWORDS),
    maxPostingAgeHours: parseNumber(env.MAX_POSTING_AGE_HOURS, 24),
    maxListingsPerSource: parseNumber(env.MAX_LISTINGS_PER_SOURCE, 10),
    maxNotificationsPerRun: parseNumber(env.MAX_NOTIFICATIONS_PER_RUN, 25),
    maxEnrichedListings: parseNumber(env.MAX_ENRICHED_LISTINGS, 5),
    producerTimeoutMs: parseNumber(env.PRODUCER_TIMEOUT_MS, 60000),
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 10000),
    serverless,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

import { config as dotenvConfig } from 'dotenv';
import type { ConfigValidationError } from './errors';
import type { AppConfig, FacilityProfile, LogLevel, MailTransport } from './types';

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_HEADLESS = true;
const DEFAULT_OUTPUT_DIR = './output';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_INTERVAL_MINUTES = 5;
const DEFAULT_MAX_ATTEMPTS = 0;
const DEFAULT_WAIT_TIMEOUT_SECONDS = 15;
const DEFAULT_SETTLE_MS = 2000;
const DEFAULT_ERROR_BACKOFF_SECONDS = 60;
const DEFAULT_SMTP_HOST = 'smtp.gmail.com';
const DEFAULT_SMTP_PORT = 587;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];
const MAIL_TRANSPORTS: MailTransport[] = ['smtp', 'resend'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isMailTransport(value: string): value is MailTransport {
  return MAIL_TRANSPORTS.some((transport) => transport === value);
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function parseMailTransport(value: string | undefined): MailTransport {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isMailTransport(normalized) ? normalized : 'smtp';
}

export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

export function normalizePhoneNumber(value: string): string {
  return value.replace(/\D/g, '');
}

/**
 * Reads `{PREFIX}_{KEY}` first and falls back to the bare `KEY`, so one
 * `.env` can hold shared notification settings for several facilities.
 */
function facilityReader(env: NodeJS.ProcessEnv, prefix: string) {
  return (key: string): string | undefined => {
    const scoped = env[`${prefix}_${key}`]?.trim();
    if (scoped) {
      return scoped;
    }
    const shared = env[key]?.trim();
    return shared || undefined;
  };
}

export function loadConfig(profile: FacilityProfile, options: LoadConfigOptions = {}): AppConfig {
  if (!options.env) {
    dotenvConfig({ path: options.path });
  }

  const env = options.env ?? process.env;
  const read = facilityReader(env, profile.envPrefix);

  const notificationEmail = read('NOTIFICATION_EMAIL') ?? '';

  return {
    facilityId: profile.id,
    bookingUrl: read('BOOKING_URL') ?? profile.bookingUrl,
    credentials: {
      username: read('USERNAME') ?? '',
      password: read('PASSWORD') ?? '',
    },
    notification: {
      email: notificationEmail,
      phoneNumber: normalizePhoneNumber(read('PHONE_NUMBER') ?? ''),
    },
    mail: {
      transport: parseMailTransport(env.MAIL_TRANSPORT),
      smtpHost: env.SMTP_HOST?.trim() || DEFAULT_SMTP_HOST,
      smtpPort: parseNumber(env.SMTP_PORT, DEFAULT_SMTP_PORT),
      senderEmail: read('GMAIL_APP_EMAIL') ?? notificationEmail,
      senderPassword: read('GMAIL_APP_PASSWORD') ?? '',
      resendApiKey: env.RESEND_API_KEY?.trim() || '',
    },
    preferences: {
      preferredTimes: parseList(read('PREFERRED_TIMES')),
      preferredCourts: parseList(read('PREFERRED_COURTS')),
    },
    headless: parseBoolean(read('HEADLESS'), DEFAULT_HEADLESS),
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_LOG_LEVEL),
    logFile: env.LOG_FILE?.trim() || '',
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    pageLoadTimeout: parseNumber(read('WAIT_TIMEOUT'), DEFAULT_WAIT_TIMEOUT_SECONDS) * 1000,
    settleMs: parseNumber(env.SETTLE_MS, DEFAULT_SETTLE_MS),
    monitoringIntervalMinutes: parseNumber(read('MONITORING_INTERVAL'), DEFAULT_INTERVAL_MINUTES),
    maxAttempts: parseNumber(read('MAX_ATTEMPTS'), DEFAULT_MAX_ATTEMPTS),
    errorBackoffSeconds: parseNumber(env.ERROR_BACKOFF_SECONDS, DEFAULT_ERROR_BACKOFF_SECONDS),
  };
}

export function validateConfig(config: AppConfig, profile: FacilityProfile): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  const prefix = profile.envPrefix;

  if (!config.notification.email && !config.notification.phoneNumber) {
    errors.push({
      field: `${prefix}_NOTIFICATION_EMAIL`,
      message: `Set a notification email (${prefix}_NOTIFICATION_EMAIL) or phone number (${prefix}_PHONE_NUMBER).`,
    });
  }

  const hasRecipient = Boolean(config.notification.email || config.notification.phoneNumber);
  if (hasRecipient && config.mail.transport === 'smtp') {
    if (!config.mail.senderEmail) {
      errors.push({
        field: `${prefix}_GMAIL_APP_EMAIL`,
        message: `Missing sender address (${prefix}_GMAIL_APP_EMAIL).`,
      });
    }
    if (!config.mail.senderPassword) {
      errors.push({
        field: `${prefix}_GMAIL_APP_PASSWORD`,
        message: `Missing app password (${prefix}_GMAIL_APP_PASSWORD).`,
      });
    }
  }

  if (hasRecipient && config.mail.transport === 'resend' && !config.mail.resendApiKey) {
    errors.push({
      field: 'RESEND_API_KEY',
      message: 'MAIL_TRANSPORT=resend requires RESEND_API_KEY.',
    });
  }

  if (!config.bookingUrl) {
    errors.push({
      field: `${prefix}_BOOKING_URL`,
      message: `Missing booking URL (${prefix}_BOOKING_URL).`,
    });
  }

  if (!Number.isFinite(config.monitoringIntervalMinutes) || config.monitoringIntervalMinutes <= 0) {
    errors.push({
      field: `${prefix}_MONITORING_INTERVAL`,
      message: 'MONITORING_INTERVAL must be a positive number of minutes.',
    });
  }

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 0) {
    errors.push({
      field: `${prefix}_MAX_ATTEMPTS`,
      message: 'MAX_ATTEMPTS must be a non-negative integer (0 = unlimited).',
    });
  }

  if (!Number.isFinite(config.pageLoadTimeout) || config.pageLoadTimeout <= 0) {
    errors.push({
      field: `${prefix}_WAIT_TIMEOUT`,
      message: 'WAIT_TIMEOUT must be a positive number of seconds.',
    });
  }

  if (!Number.isFinite(config.settleMs) || config.settleMs < 0) {
    errors.push({
      field: 'SETTLE_MS',
      message: 'SETTLE_MS must be a non-negative number.',
    });
  }

  if (!Number.isFinite(config.errorBackoffSeconds) || config.errorBackoffSeconds < 0) {
    errors.push({
      field: 'ERROR_BACKOFF_SECONDS',
      message: 'ERROR_BACKOFF_SECONDS must be a non-negative number.',
    });
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push({
      field: 'LOG_LEVEL',
      message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}.`,
    });
  }

  return errors;
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    credentials: {
      username: config.credentials.username,
      password: config.credentials.password ? '***' : '',
    },
    mail: {
      ...config.mail,
      senderPassword: config.mail.senderPassword ? '***' : '',
      resendApiKey: config.mail.resendApiKey ? '***' : '',
    },
  };
}

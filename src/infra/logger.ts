import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with redaction of secrets and account numbers
 * Statement headers, descriptions and error text can carry card or account
 * numbers, so those free-text fields are masked down to their last four digits.
 * Identifiers and timestamps are left readable.
 * Logs to console in development, file + console in production
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

// 8-19 contiguous digits, or card-style groups of four
const ACCOUNT_NUMBER_PATTERN = /\b\d{8,19}\b|\b\d{4}(?:[ -]\d{4}){2,3}\b/g;

const SENSITIVE_KEYS = new Set(['password', 'apiKey', 'token', 'secret', 'accountNumber', 'cardNumber', 'iban']);

// Fields holding text read from statements or derived from it
const FREE_TEXT_KEYS = new Set(['message', 'error', 'cause', 'description', 'headers', 'warnings', 'details']);

/**
 * "Card 4111 1111 1111 1234" → "Card ****1234"
 */
export function maskAccountNumbers(text: string): string {
  return text.replace(ACCOUNT_NUMBER_PATTERN, (match) => `****${match.replace(/\D/g, '').slice(-4)}`);
}

/**
 * Redacts secrets anywhere in the value; digit runs are masked only inside free-text fields
 */
export function redactLogValue(value: unknown, freeText = false): unknown {
  if (typeof value === 'string') {
    let redacted = value;
    for (const pattern of SECRET_PATTERNS) {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    }
    return freeText ? maskAccountNumbers(redacted) : redacted;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactLogValue(item, freeText));
  }

  if (value && typeof value === 'object' && !(value instanceof Error) && !(value instanceof Date)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      redacted[key] = redactField(key, nested, freeText);
    }
    return redacted;
  }

  return value;
}

function redactField(key: string, value: unknown, freeText: boolean): unknown {
  if (SENSITIVE_KEYS.has(key)) {
    return '***REDACTED***';
  }
  return redactLogValue(value, freeText || FREE_TEXT_KEYS.has(key));
}

// Metadata is spread onto the info object, so every own key is redacted, not only `message`
const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = redactField(key, info[key], false);
  }
  return info;
})();

export type LoggerOptions = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>;

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  // Add file transport in production
  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    silent: env.NODE_ENV === 'test',
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (initialized in server.ts)
 */
export let logger: winston.Logger;

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}

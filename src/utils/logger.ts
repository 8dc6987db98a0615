/**
 * Logger Utility
 * Provides structured logging with pino
 */

import pino from 'pino';

/**
 * Log level type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment variable
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

/**
 * Check if running in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Create pino transport options for pretty printing in development
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }
  return undefined;
}

/**
 * Fields that may carry the root token
 */
export const REDACTED_PATHS = [
  'token',
  'rootToken',
  'config.token',
  'headers["X-Vault-Token"]',
];

export const REDACTION_CENSOR = '<redacted>';

/**
 * Replace every occurrence of each secret in free text, which `redact`
 * paths cannot reach
 */
export function maskSecrets(text: string, secrets: readonly string[]): string {
  return secrets.reduce(
    (masked, secret) => (secret === '' ? masked : masked.split(secret).join(REDACTION_CENSOR)),
    text
  );
}

/**
 * Default logger instance
 * Uses pino-pretty in development, JSON in production
 */
export const logger = pino({
  level: getLogLevel(),
  transport: getTransport(),
  redact: { paths: REDACTED_PATHS, censor: REDACTION_CENSOR },
});

/**
 * Create a child logger with a specific component name
 * @param component - Component name for log context
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export type Logger = pino.Logger;

/**
 * Pre-configured loggers for common components
 */
export const fixtureLogger = createLogger('fixture');
export const processLogger = createLogger('process');
export const portsLogger = createLogger('ports');
export const clientLogger = createLogger('client');

/**
 * Seigniorage Logger
 * Structured logging with Pino
 */

import pino, { type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

const baseOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "seigniorage",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    paths: [
      "*.privateKey",
      "*.password",
      "*.secret",
      "*.apiKey",
    ],
    censor: "[REDACTED]",
  },
};

// Pretty printing for development
const devOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(baseOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

// Pre-configured service loggers
export const chainLogger = createServiceLogger("chain");
export const treasuryLogger = createServiceLogger("treasury");
export const rewardPoolLogger = createServiceLogger("reward-pool");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

interface TransactionLogContext {
  contract: string;
  method: string;
  sender: string;
  blockNumber: string;
  timestamp: string;
}

/**
 * Logs a ledger call outcome with structured context
 */
export function logTransaction(
  level: "debug" | "info" | "warn" | "error",
  event: string,
  context: TransactionLogContext,
  message?: string
): void {
  chainLogger[level](
    {
      event,
      tx: context,
    },
    message || event
  );
}

// ============================================
// AUDIT LOGGING
// ============================================

interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * Creates an audit log entry for a governance change
 */
export function audit(entry: AuditLogEntry): void {
  logger.info(
    {
      audit: true,
      ...entry,
      timestamp: new Date().toISOString(),
    },
    `AUDIT: ${entry.action} on ${entry.entityType}${entry.entityId ? ` (${entry.entityId})` : ""} by ${entry.actor}`
  );
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs an error with stack trace and context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  message?: string
): void {
  logger.error(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || error.message
  );
}

/**
 * Normalizes an unknown thrown value for logging
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

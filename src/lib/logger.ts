/**
 * Logging utility
 *
 * - Outside production: all levels are visible
 * - In production (NODE_ENV=production): only warnings and errors
 *
 * Usage:
 *   import { decoderLog } from './logger';
 *   decoderLog.debug('Detailed info', data);  // Silent in production
 *   decoderLog.warn('Warning');               // Always visible
 */

const isDev = process.env.NODE_ENV !== "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogOptions {
  /** Force log even in production */
  force?: boolean;
  /** Add timestamp prefix */
  timestamp?: boolean;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  log(
    level: LogLevel,
    message: string,
    data?: unknown,
    options?: LogOptions,
  ): void;
  child(subPrefix: string): Logger;
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (isDev) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (isDev) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },

    /**
     * Conditional log based on options
     */
    log(
      level: LogLevel,
      message: string,
      data?: unknown,
      options?: LogOptions,
    ) {
      const shouldLog =
        options?.force || isDev || level === "warn" || level === "error";
      if (!shouldLog) return;

      const formatted = formatMessage(
        prefix,
        message,
        options?.timestamp ?? false,
      );

      switch (level) {
        case "debug":
          console.debug(formatted, data ?? "");
          break;
        case "info":
          console.info(formatted, data ?? "");
          break;
        case "warn":
          console.warn(formatted, data ?? "");
          break;
        case "error":
          console.error(formatted, data ?? "");
          break;
      }
    },

    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

/**
 * Wraps a logger call so it fires at most once per interval.
 * Returns true when the message was emitted.
 */
export function createRateLimiter(
  intervalMs: number,
  now: () => number = Date.now,
): () => boolean {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    const t = now();
    if (t - last < intervalMs) return false;
    last = t;
    return true;
  };
}

// Pre-configured loggers for the pipeline stages
export const decoderLog = createLogger("Decoder");
export const filterLog = createLogger("Filter");
export const offsetLog = createLogger("Offset");
export const channelLog = createLogger("Channel");
export const pipelineLog = createLogger("Pipeline");

export { createLogger };

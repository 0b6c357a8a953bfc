import pino from "pino";
import { createFormatterStream, type LogFormat } from "./formatter";
import { getSanitizeOptionsFromEnv, sanitizeForLogging } from "./sanitizer";

/**
 * Structured logging with Pino.
 *
 * - Compact single-line output while developing (LOG_FORMAT selects the layout)
 * - JSON output in production or with LOG_FORMAT=json
 * - Stream items reported by peek taps are sanitized before they reach a sink,
 *   so a numeric array of a few thousand elements logs as a short summary
 */

const isDev = process.env.NODE_ENV !== "production";
const sanitizeEnabled = process.env.LOG_SANITIZE !== "false";
const sanitizeOptions = getSanitizeOptionsFromEnv();
const logFormat = process.env.LOG_FORMAT || "compact";

const baseConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  base: isDev
    ? null
    : {
        service: "stepstream",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },

  formatters: {
    log(obj: Record<string, unknown>) {
      if (!sanitizeEnabled) return obj;
      const sanitized = sanitizeForLogging(obj, sanitizeOptions);
      return isRecord(sanitized) ? sanitized : obj;
    },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLineFormat(format: string): format is LogFormat {
  return format === "compact" || format === "hybrid" || format === "minimal";
}

function createBaseLogger(): pino.Logger {
  if (!isDev || logFormat === "json") {
    return pino(baseConfig);
  }

  if (logFormat === "pretty") {
    return pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseConfig, createFormatterStream(isLineFormat(logFormat) ? logFormat : "compact"));
}

const baseLogger = createBaseLogger();

export interface LogContext {
  runId?: string;
  [key: string]: unknown;
}

export type Logger = pino.Logger;

export function createLogger(component: string, context?: LogContext): Logger {
  return baseLogger.child({
    component,
    ...context,
  });
}

export { baseLogger as logger };

// Child logger scoped to a single pipeline run
export function withRunContext(logger: Logger, runId: string): Logger {
  return logger.child({ runId });
}

/**
 * Line formatters for the development log stream.
 *
 * - compact: single line, `TIME LEVEL [component] event key=value ...`
 * - hybrid: event on the first line, key=value pairs indented on the second
 * - minimal: seconds and event only, for watching long pipeline runs
 *
 * Logs go to stderr so that pipeline results printed by the CLI on stdout
 * stay machine-readable.
 */

export type LogFormat = "compact" | "hybrid" | "minimal";

export interface LogObject {
  level: number;
  time: number | string;
  msg?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

const colors = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
};

const levelNames: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

const pinoLevels: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

function formatTime(time: number | string, start: number, end: number): string {
  return new Date(time).toISOString().substring(start, end);
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function splitLog(log: LogObject): { event: string; pairs: string[] } {
  const { level: _level, time: _time, msg, component: _component, event, ...data } = log;
  const pairs = Object.entries(data).map(
    ([key, value]) => `${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`,
  );
  return { event: event || msg || "", pairs };
}

function levelLabel(level: number): string {
  const name = levelNames[level] || "UNKNOWN";
  const color = level >= 50 ? colors.red : level >= 40 ? colors.yellow : "";
  return `${color}${name.padEnd(5)}${colors.reset}`;
}

export function formatCompact(log: LogObject): string {
  const { event, pairs } = splitLog(log);
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
  return `${colors.dim}${formatTime(log.time, 11, 23)}${colors.reset} ${levelLabel(log.level)} ${colors.dim}[${log.component || "app"}]${colors.reset} ${colors.cyan}${event}${colors.reset}${details}`;
}

export function formatHybrid(log: LogObject): string {
  const { event, pairs } = splitLog(log);
  const firstLine = `${colors.dim}${formatTime(log.time, 11, 23)}${colors.reset} ${levelLabel(log.level)} ${colors.dim}[${log.component || "app"}]${colors.reset} ${colors.cyan}${event}${colors.reset}`;
  return pairs.length === 0 ? firstLine : `${firstLine}\n  ${pairs.join(" ")}`;
}

export function formatMinimal(log: LogObject): string {
  const { event, pairs } = splitLog(log);
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
  return `${colors.dim}${formatTime(log.time, 17, 23)}${colors.reset} ${colors.cyan}${event}${colors.reset}${details}`;
}

export function getFormatter(format: LogFormat): (log: LogObject) => string {
  switch (format) {
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
    default:
      return formatCompact;
  }
}

function isLogObject(value: unknown): value is LogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "time" in value &&
    (typeof value.time === "number" || typeof value.time === "string")
  );
}

/**
 * Pino destination that renders each JSON line with the chosen formatter.
 * LOG_LEVEL is re-read on every write so tests can silence loggers created
 * before the preload ran.
 */
export function createFormatterStream(format: LogFormat) {
  const formatter = getFormatter(format);

  return {
    write(chunk: string) {
      const configuredLevel = process.env.LOG_LEVEL || "info";
      const threshold = pinoLevels[configuredLevel] ?? 30;

      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        process.stderr.write(chunk);
        return;
      }

      if (!isLogObject(parsed)) {
        process.stderr.write(chunk);
        return;
      }
      if (parsed.level < threshold) {
        return;
      }

      process.stderr.write(`${formatter(parsed)}\n`);
    },
  };
}

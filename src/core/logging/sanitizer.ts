/**
 * Truncation of large values before they are logged.
 *
 * Pipeline items are frequently numeric arrays (frames, vectors, samples) and a
 * single peek event would otherwise dump thousands of numbers into the log.
 *
 * - numeric arrays and typed arrays become `[Numeric: len=N, sample=[...]]`
 * - other arrays keep their first `maxArrayLength` items
 * - strings are cut at `maxStringLength`
 * - objects deeper than `maxDepth` are reduced to their keys
 */

export interface SanitizeOptions {
  maxArrayLength: number;
  maxStringLength: number;
  maxDepth: number;
  /** Recursion depth (internal) */
  currentDepth: number;
  /** Keys logged verbatim */
  preserveKeys: string[];
}

export const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = {
  maxArrayLength: 3,
  maxStringLength: 500,
  maxDepth: 3,
  currentDepth: 0,
  preserveKeys: ["event", "component", "runId", "step", "stepIndex", "role", "state", "code"],
};

const NUMERIC_ARRAY_THRESHOLD = 16;

type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

function isTypedArray(value: unknown): value is TypedArray {
  return (
    ArrayBuffer.isView(value) &&
    !(value instanceof DataView) &&
    !(value instanceof BigInt64Array) &&
    !(value instanceof BigUint64Array)
  );
}

export function isNumericArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > NUMERIC_ARRAY_THRESHOLD && value.every((v) => typeof v === "number");
}

export function summarizeNumbers(values: ArrayLike<number>): string {
  const sample = Array.from({ length: Math.min(3, values.length) }, (_, i) => Number(values[i]).toFixed(3));
  return `[Numeric: len=${values.length}, sample=[${sample.join(", ")}, ...]]`;
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return `${str.slice(0, maxLength)}... [truncated: ${str.length} chars total]`;
}

export function truncateArray(arr: unknown[], options: SanitizeOptions): unknown {
  if (isNumericArray(arr)) {
    return summarizeNumbers(arr);
  }

  const next = { ...options, currentDepth: options.currentDepth + 1 };
  if (arr.length <= options.maxArrayLength) {
    return arr.map((item) => sanitizeForLogging(item, next));
  }

  return {
    __arrayInfo__: {
      length: arr.length,
      showing: options.maxArrayLength,
      items: arr.slice(0, options.maxArrayLength).map((item) => sanitizeForLogging(item, next)),
    },
  };
}

export function truncateObject(obj: object, options: SanitizeOptions): Record<string, unknown> {
  if (options.currentDepth >= options.maxDepth) {
    return { __keys__: Object.keys(obj) };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = options.preserveKeys.includes(key)
      ? value
      : sanitizeForLogging(value, { ...options, currentDepth: options.currentDepth + 1 });
  }
  return result;
}

export function sanitizeForLogging(value: unknown, options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "boolean" || typeof value === "number") return value;
  if (typeof value === "string") return truncateString(value, options.maxStringLength);
  if (typeof value === "bigint") return value.toString();

  if (Array.isArray(value)) return truncateArray(value, options);
  if (isTypedArray(value)) return summarizeNumbers(value);

  if (typeof value === "object") {
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack ? truncateString(value.stack, options.maxStringLength) : undefined,
      };
    }
    return truncateObject(value, options);
  }

  return String(value);
}

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getSanitizeOptionsFromEnv(): SanitizeOptions {
  return {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: readIntEnv("LOG_MAX_ARRAY_LENGTH", DEFAULT_SANITIZE_OPTIONS.maxArrayLength),
    maxStringLength: readIntEnv("LOG_MAX_STRING_LENGTH", DEFAULT_SANITIZE_OPTIONS.maxStringLength),
    maxDepth: readIntEnv("LOG_MAX_DEPTH", DEFAULT_SANITIZE_OPTIONS.maxDepth),
  };
}

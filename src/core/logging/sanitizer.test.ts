import { describe, expect, test } from "vitest";
import {
  DEFAULT_SANITIZE_OPTIONS,
  isNumericArray,
  sanitizeForLogging,
  summarizeNumbers,
  truncateString,
} from "./sanitizer";

const numbers = (n: number) => Array.from({ length: n }, (_, i) => i);

describe("isNumericArray", () => {
  test("only flags long arrays of numbers", () => {
    expect(isNumericArray(numbers(17))).toBe(true);
    expect(isNumericArray(numbers(16))).toBe(false);
    expect(isNumericArray([...numbers(20), "x"])).toBe(false);
  });
});

describe("summarizeNumbers", () => {
  test("shows the length and a three item sample", () => {
    expect(summarizeNumbers([1, 2.5, 3, 4])).toBe("[Numeric: len=4, sample=[1.000, 2.500, 3.000, ...]]");
  });
});

describe("truncateString", () => {
  test("keeps short strings", () => {
    expect(truncateString("abc", 3)).toBe("abc");
  });

  test("cuts long strings and reports the original length", () => {
    expect(truncateString("abcdef", 3)).toBe("abc... [truncated: 6 chars total]");
  });
});

describe("sanitizeForLogging", () => {
  test("summarizes numeric arrays and typed arrays", () => {
    expect(sanitizeForLogging(numbers(20))).toBe("[Numeric: len=20, sample=[0.000, 1.000, 2.000, ...]]");
    expect(sanitizeForLogging(new Float32Array([0.5, 1.5]))).toBe("[Numeric: len=2, sample=[0.500, 1.500, ...]]");
  });

  test("truncates other long arrays", () => {
    expect(sanitizeForLogging(["a", "b", "c", "d"])).toEqual({
      __arrayInfo__: { length: 4, showing: 3, items: ["a", "b", "c"] },
    });
  });

  test("reduces objects past the depth limit to their keys", () => {
    expect(sanitizeForLogging({ a: { b: { c: { d: 1, e: 2 } } } })).toEqual({
      a: { b: { c: { __keys__: ["d", "e"] } } },
    });
  });

  test("leaves preserved keys untouched", () => {
    const long = "x".repeat(600);
    const sanitized = sanitizeForLogging({ event: long, detail: long });
    expect(sanitized).toEqual({ event: long, detail: `${"x".repeat(500)}... [truncated: 600 chars total]` });
  });

  test("converts values JSON cannot carry", () => {
    expect(sanitizeForLogging(10n)).toBe("10");
    expect(sanitizeForLogging(new Date("2026-01-02T03:04:05.000Z"))).toBe("2026-01-02T03:04:05.000Z");
  });

  test("keeps the message of errors", () => {
    const sanitized = sanitizeForLogging(new RangeError("too big"), { ...DEFAULT_SANITIZE_OPTIONS, maxStringLength: 10 });
    expect(sanitized).toMatchObject({ name: "RangeError", message: "too big" });
  });
});

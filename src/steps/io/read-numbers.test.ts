import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger } from "../../core/logging/logger";
import { fromIterable, take, toArray } from "../../core/pipeline/streaming/generators";
import type { StepCall } from "../../core/pipeline/types";
import { parseNumberLine, readNumbers } from "./read-numbers";

const call: StepCall = { preview: false, stepName: "readNumbers", stepIndex: 0, logger: createLogger("test") };

let testDir: string;
let samplesPath: string;
let brokenPath: string;

beforeAll(async () => {
  testDir = await mkdtemp(join(tmpdir(), "read-numbers-test-"));

  samplesPath = join(testDir, "samples.txt");
  await writeFile(samplesPath, "1\n2.5\n\n  -3  \r\n1e3\n");

  brokenPath = join(testDir, "broken.txt");
  await writeFile(brokenPath, "4\nfive\n6\n");
});

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true });
});

describe("parseNumberLine", () => {
  test("parses trimmed numbers and skips blank lines", () => {
    expect(parseNumberLine(" 42 ", 1, "f.txt")).toBe(42);
    expect(parseNumberLine("   ", 2, "f.txt")).toBeUndefined();
  });

  test("reports the file and line of a bad value", () => {
    expect(() => parseNumberLine("abc", 7, "f.txt")).toThrow('f.txt:7: not a number: "abc"');
  });
});

describe("readNumbers", () => {
  test("yields one number per non-blank line", async () => {
    const values = await toArray(fromIterable(readNumbers.run({ path: samplesPath }, call)));
    expect(values).toEqual([1, 2.5, -3, 1000]);
  });

  test("can stop after a prefix", async () => {
    const values = await toArray(take(fromIterable(readNumbers.run({ path: samplesPath }, call)), 2));
    expect(values).toEqual([1, 2.5]);
  });

  test("fails on the first non-numeric line", async () => {
    const stream = fromIterable(readNumbers.run({ path: brokenPath }, call));
    await expect(toArray(stream)).rejects.toThrow(`${brokenPath}:2: not a number: "five"`);
  });

  test("fails for a missing file", async () => {
    const stream = fromIterable(readNumbers.run({ path: join(testDir, "missing.txt") }, call));
    await expect(toArray(stream)).rejects.toThrow(/ENOENT/);
  });
});

import { describe, expect, test } from "vitest";
import { defaultConfig } from "../config/schema";
import { createDefaultRegistry } from "../steps";
import { UsageError, parseCommand, parseParamValue, parseStepSpec, runCLI } from "./cli";

async function cli(...argv: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const code = await runCLI({
    registry: createDefaultRegistry(),
    config: defaultConfig,
    argv,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  });
  return { code, out, err };
}

describe("parseParamValue", () => {
  test("parses JSON and keeps anything else as a string", () => {
    expect(parseParamValue("2.5")).toBe(2.5);
    expect(parseParamValue("true")).toBe(true);
    expect(parseParamValue('"quoted"')).toBe("quoted");
    expect(parseParamValue("data.txt")).toBe("data.txt");
    expect(parseParamValue("[1,2")).toBe("[1,2");
  });
});

describe("parseStepSpec", () => {
  test("reads name, parameters and workers", () => {
    expect(parseStepSpec("range:count=3,start=-1", 4)).toEqual({
      name: "range",
      params: { count: 3, start: -1 },
      parallelism: 0,
    });
    expect(parseStepSpec("scale:factor=2@3", 4)).toEqual({ name: "scale", params: { factor: 2 }, parallelism: 3 });
  });

  test("uses the default worker count for a bare @", () => {
    expect(parseStepSpec("scale@", 4).parallelism).toBe(4);
  });

  test("keeps an @ that is part of a value", () => {
    expect(parseStepSpec("readNumbers:path=data@home.txt", 4)).toEqual({
      name: "readNumbers",
      params: { path: "data@home.txt" },
      parallelism: 0,
    });
  });

  test("rejects malformed tokens", () => {
    expect(() => parseStepSpec("scale:factor", 4)).toThrow('Expected key=value in "scale:factor", got "factor"');
    expect(() => parseStepSpec(":factor=1", 4)).toThrow(UsageError);
  });
});

describe("parseCommand", () => {
  test("parses run options around the steps", () => {
    expect(parseCommand(["run", "range", "--preview", "sum", "--chunk-size", "5"], 4)).toEqual({
      command: "run",
      steps: [
        { name: "range", params: {}, parallelism: 0 },
        { name: "sum", params: {}, parallelism: 0 },
      ],
      preview: true,
      previewLimit: undefined,
      chunkSize: 5,
      verbose: false,
    });
  });

  test("recognizes list and help", () => {
    expect(parseCommand(["list"], 4)).toEqual({ command: "list" });
    expect(parseCommand([], 4)).toEqual({ command: "help" });
    expect(parseCommand(["run", "-h"], 4)).toEqual({ command: "help" });
  });

  test("rejects bad counts and commands", () => {
    expect(() => parseCommand(["run", "range", "--preview-limit", "0"], 4)).toThrow(
      '--preview-limit expects a positive integer, got "0"',
    );
    expect(() => parseCommand(["walk"], 4)).toThrow('Unknown command "walk"');
    expect(() => parseCommand(["run"], 4)).toThrow("run needs at least one step");
  });
});

describe("runCLI", () => {
  test("prints the sink result as JSON", async () => {
    expect(await cli("run", "range:count=4", "scale:factor=2@2", "sum")).toEqual({ code: 0, out: ["12"], err: [] });
  });

  test("prints the drained stream when there is no sink", async () => {
    const { code, out } = await cli("run", "range:start=1,count=3", "threshold:level=2");
    expect(code).toBe(0);
    expect(out).toEqual(["[0,2,3]"]);
  });

  test("runs a preview", async () => {
    expect((await cli("run", "range:count=1000", "collect", "--preview")).out).toEqual(["[0,1]"]);
    expect((await cli("run", "range:count=1000", "--preview", "--preview-limit", "1")).out).toEqual(["[0]"]);
  });

  test("reports pipeline errors with their code", async () => {
    expect(await cli("run", "sum")).toEqual({
      code: 1,
      out: [],
      err: ["PIPELINE_STRUCTURE_ERROR: sink requires an input stream"],
    });
  });

  test("reports unknown steps", async () => {
    const { code, err } = await cli("run", "nope");
    expect(code).toBe(1);
    expect(err).toEqual([
      'Unknown step "nope". Registered steps: collect, mean, offset, pairDiff, range, readNumbers, scale, sum, threshold',
    ]);
  });

  test("prints usage after a usage error", async () => {
    const { code, err } = await cli("run");
    expect(code).toBe(1);
    expect(err[0]).toMatch(/^run needs at least one step\n\nUsage:/);
  });

  test("lists the registered steps", async () => {
    const { code, out } = await cli("list");
    expect(code).toBe(0);
    expect(out).toHaveLength(9);
    expect(out[0]).toBe(
      `range${" ".repeat(8)}source${" ".repeat(5)}Yield count numbers from start, step apart (start, count, step)`,
    );
    expect(out[2]).toBe(`pairDiff${" ".repeat(5)}transform${" ".repeat(2)}Consume items in pairs and yield a - b`);
  });
});

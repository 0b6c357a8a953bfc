import { describe, expect, test } from "vitest";
import { createLogger } from "../../core/logging/logger";
import { fromIterable, toArray } from "../../core/pipeline/streaming/generators";
import type { StepCall } from "../../core/pipeline/types";
import { RangeParamsSchema, range } from "./range";

const call: StepCall = { preview: false, stepName: "range", stepIndex: 0, logger: createLogger("test") };

describe("range", () => {
  test("defaults to ten numbers from zero", async () => {
    const params = RangeParamsSchema.parse({});
    expect(await toArray(fromIterable(range.run(params, call)))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  test("honours start and step", async () => {
    const params = RangeParamsSchema.parse({ start: 5, count: 3, step: -2 });
    expect(await toArray(fromIterable(range.run(params, call)))).toEqual([5, 3, 1]);
  });

  test("produces items lazily", async () => {
    const params = RangeParamsSchema.parse({ count: 1_000_000_000 });
    const stream = fromIterable(range.run(params, call));
    expect(await stream.next()).toEqual({ value: 0, done: false });
    await stream.return(undefined);
  });

  test("rejects unknown and negative parameters", () => {
    expect(RangeParamsSchema.safeParse({ count: -1 }).success).toBe(false);
    expect(RangeParamsSchema.safeParse({ stop: 3 }).success).toBe(false);
  });
});

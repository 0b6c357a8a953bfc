import { describe, expect, test } from "vitest";
import { z } from "zod";
import { classify, classifyStep, describeStep, isPipelineStep } from "./classifier";
import { ClassificationError } from "./errors";
import { defineGeneric, defineSink, defineSource, defineTransform } from "./steps";

const source = defineSource({ name: "numbers", run: () => [1, 2, 3] });
const transform = defineTransform({
  name: "passThrough",
  run: (input: AsyncGenerator<number>) => input,
});
const sink = defineSink({
  name: "count",
  async run(input: AsyncGenerator<number>) {
    let n = 0;
    for await (const _ of input) n++;
    return n;
  },
});
const generic = defineGeneric({ name: "negate", run: (x: number) => -x });

describe("classify", () => {
  test("derives the role from the declared calling convention", () => {
    expect(classify(source).role).toBe("source");
    expect(classify(transform).role).toBe("transform");
    expect(classify(sink).role).toBe("sink");
    expect(classify(generic).role).toBe("generic");
  });

  test("keeps the step on the classified value", () => {
    expect(classify(sink).step).toBe(sink);
  });
});

describe("classifyStep", () => {
  test("accepts plain objects with a calling convention", () => {
    const handMade = { name: "handMade", consumesStream: true, producesStream: true, run: () => [] };
    expect(classifyStep(handMade).role).toBe("transform");
  });

  test("rejects bare functions", () => {
    function double(x: number) {
      return x * 2;
    }
    expect(() => classifyStep(double)).toThrow(ClassificationError);
    expect(() => classifyStep(double)).toThrow(
      'Cannot classify step "function double": expected an object with name, run, consumesStream and producesStream',
    );
  });

  test("rejects objects with a partial convention", () => {
    expect(() => classifyStep({ name: "half", run: () => 1, consumesStream: true })).toThrow(ClassificationError);
    expect(() => classifyStep(null)).toThrow('Cannot classify step "null"');
    expect(() => classifyStep(42)).toThrow('Cannot classify step "number"');
  });

  test("names the step from its location when known", () => {
    try {
      classifyStep(undefined, { stepName: "third", stepIndex: 2 });
      expect.unreachable("expected a ClassificationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ClassificationError);
      if (error instanceof ClassificationError) {
        expect(error.message).toMatch(/^Cannot classify step "third"/);
        expect(error.stepIndex).toBe(2);
      }
    }
  });
});

describe("isPipelineStep", () => {
  test("requires boolean flags and a run function", () => {
    expect(isPipelineStep(generic)).toBe(true);
    expect(isPipelineStep({ name: "x", run: "no", consumesStream: false, producesStream: false })).toBe(false);
    expect(isPipelineStep({ name: "x", run: () => 1, consumesStream: 0, producesStream: false })).toBe(false);
  });
});

describe("describeStep", () => {
  test("lists role, description and parameter names", () => {
    const step = defineGeneric({
      name: "clamp",
      description: "Clamp into a range",
      params: z.object({ min: z.number().default(0), max: z.number().default(1) }),
      run: (x: number, { min, max }) => Math.min(max, Math.max(min, x)),
    });

    expect(describeStep(step)).toEqual({
      name: "clamp",
      role: "generic",
      description: "Clamp into a range",
      parameters: ["min", "max"],
    });
  });

  test("omits the description when there is none", () => {
    expect(describeStep(source)).toEqual({ name: "numbers", role: "source", parameters: [] });
  });
});

import { describe, expect, test } from "vitest";
import {
  ClassificationError,
  PipelineError,
  PipelineErrorCode,
  PipelineStructureError,
  StepExecutionError,
  StepParameterError,
  isPipelineError,
} from "./errors";

describe("pipeline errors", () => {
  test("carry a code and are PipelineErrors", () => {
    const errors = [
      new ClassificationError("no convention"),
      new PipelineStructureError("source cannot follow a stream"),
      new StepParameterError("bad params", []),
      new StepExecutionError({ stepName: "s", stepIndex: 0 }, new Error("x")),
    ];

    expect(errors.map((error) => error.code)).toEqual([
      PipelineErrorCode.CLASSIFICATION_ERROR,
      PipelineErrorCode.PIPELINE_STRUCTURE_ERROR,
      PipelineErrorCode.STEP_PARAMETER_ERROR,
      PipelineErrorCode.STEP_EXECUTION_ERROR,
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(isPipelineError(error)).toBe(true);
    }
    expect(isPipelineError(new Error("plain"))).toBe(false);
  });

  test("StepExecutionError keeps the cause and the step identity", () => {
    const cause = new TypeError("not a number");
    const error = new StepExecutionError({ stepName: "parse", stepIndex: 3 }, cause);

    expect(error.name).toBe("StepExecutionError");
    expect(error.message).toBe('Step "parse" (#3) failed: not a number');
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: "StepExecutionError",
      code: "STEP_EXECUTION_ERROR",
      message: 'Step "parse" (#3) failed: not a number',
      stepName: "parse",
      stepIndex: 3,
      cause: { name: "TypeError", message: "not a number" },
    });
  });

  test("StepExecutionError describes non-Error causes", () => {
    expect(new StepExecutionError({ stepName: "s", stepIndex: 0 }, "plain string").message).toBe(
      'Step "s" (#0) failed: plain string',
    );
  });

  test("structure errors record where they happened", () => {
    const error = new PipelineStructureError("sink requires an input stream", { stepName: "sum", stepIndex: 0 });
    expect(error.stepName).toBe("sum");
    expect(error.stepIndex).toBe(0);
    expect(error.cause).toBeUndefined();
  });
});

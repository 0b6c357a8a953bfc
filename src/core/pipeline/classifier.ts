/**
 * Role classification of pipeline steps.
 *
 * The role is derived from the step's declared calling convention every time
 * the step is scheduled:
 * - produces a stream, consumes none -> source
 * - consumes and produces a stream -> transform
 * - consumes a stream, produces one value -> sink
 * - neither -> generic (plain item mapper, promoted by the generator adapter)
 *
 * Values without a declared convention (bare functions, malformed objects
 * assembled outside the `define*` helpers) fail with ClassificationError.
 */

import { z } from "zod";
import { ClassificationError, type StepLocation } from "./errors";
import type { ClassifiedStep, PipelineStep, StepRole } from "./types";

export interface StepDescription {
  name: string;
  role: StepRole;
  description?: string;
  /** Parameter names declared by the step's schema */
  parameters: string[];
}

function describeValue(value: unknown): string {
  if (typeof value === "function") {
    return `function ${value.name || "<anonymous>"}`;
  }
  if (value === null) return "null";
  return typeof value;
}

/**
 * Check that a value carries a usable calling convention.
 */
export function isPipelineStep(value: unknown): value is PipelineStep {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "run" in value &&
    typeof value.run === "function" &&
    "consumesStream" in value &&
    typeof value.consumesStream === "boolean" &&
    "producesStream" in value &&
    typeof value.producesStream === "boolean"
  );
}

/**
 * Narrow a step by its derived role.
 *
 * @example
 * ```typescript
 * const classified = classify(step);
 * if (classified.role === "sink") {
 *   const total = await classified.step.run(stream, params, call);
 * }
 * ```
 */
export function classify(step: PipelineStep): ClassifiedStep {
  if (step.producesStream) {
    return step.consumesStream ? { role: "transform", step } : { role: "source", step };
  }
  return step.consumesStream ? { role: "sink", step } : { role: "generic", step };
}

/**
 * Classify an arbitrary value, failing when its calling convention cannot be
 * determined.
 *
 * @throws ClassificationError for values without a declared convention
 */
export function classifyStep(candidate: unknown, location: StepLocation = {}): ClassifiedStep {
  if (!isPipelineStep(candidate)) {
    const label = location.stepName ?? describeValue(candidate);
    throw new ClassificationError(
      `Cannot classify step "${label}": expected an object with name, run, consumesStream and producesStream`,
      location,
    );
  }
  return classify(candidate);
}

/**
 * Summarize a step for listings.
 */
export function describeStep(step: PipelineStep): StepDescription {
  const { role } = classifyStep(step, { stepName: step.name });
  const description: StepDescription = {
    name: step.name,
    role,
    parameters: step.params instanceof z.ZodObject ? Object.keys(step.params.shape) : [],
  };
  if (step.description) {
    description.description = step.description;
  }
  return description;
}

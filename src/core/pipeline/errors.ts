/**
 * Error taxonomy of the pipeline engine.
 *
 * Every failure reaching the runner's caller is a PipelineError carrying a
 * well-known code and, where it applies, the label and index of the step
 * involved. The engine never retries; callers re-run the whole pipeline.
 */

import type { z } from "zod";

export const PipelineErrorCode = {
  CLASSIFICATION_ERROR: "CLASSIFICATION_ERROR",
  PIPELINE_STRUCTURE_ERROR: "PIPELINE_STRUCTURE_ERROR",
  STEP_PARAMETER_ERROR: "STEP_PARAMETER_ERROR",
  STEP_EXECUTION_ERROR: "STEP_EXECUTION_ERROR",
} as const;

export type PipelineErrorCodeType = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export interface StepLocation {
  stepName?: string;
  stepIndex?: number;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCodeType;
  readonly stepName?: string;
  readonly stepIndex?: number;

  constructor(message: string, code: PipelineErrorCodeType, location: StepLocation = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PipelineError";
    this.code = code;
    this.stepName = location.stepName;
    this.stepIndex = location.stepIndex;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stepName: this.stepName,
      stepIndex: this.stepIndex,
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : this.cause,
    };
  }
}

/** The calling convention of a step cannot be determined */
export class ClassificationError extends PipelineError {
  constructor(message: string, location: StepLocation = {}) {
    super(message, PipelineErrorCode.CLASSIFICATION_ERROR, location);
    this.name = "ClassificationError";
  }
}

/** Role adjacency violation, raised when the offending step is reached */
export class PipelineStructureError extends PipelineError {
  constructor(message: string, location: StepLocation = {}) {
    super(message, PipelineErrorCode.PIPELINE_STRUCTURE_ERROR, location);
    this.name = "PipelineStructureError";
  }
}

/** The parameter mapping of a step was rejected by its schema */
export class StepParameterError extends PipelineError {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[], location: StepLocation = {}, cause?: unknown) {
    super(message, PipelineErrorCode.STEP_PARAMETER_ERROR, location, cause);
    this.name = "StepParameterError";
    this.issues = issues;
  }
}

/** A step's own logic failed; the original error is kept as `cause` */
export class StepExecutionError extends PipelineError {
  constructor(location: Required<StepLocation>, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Step "${location.stepName}" (#${location.stepIndex}) failed: ${reason}`, PipelineErrorCode.STEP_EXECUTION_ERROR, location, cause);
    this.name = "StepExecutionError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

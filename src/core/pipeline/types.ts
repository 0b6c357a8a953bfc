/**
 * Core types for role-classified streaming pipelines.
 *
 * A pipeline is an ordered list of step descriptors. Each step declares its
 * calling convention through two flags instead of relying on runtime
 * signature inspection:
 *
 * | producesStream | consumesStream | role      |
 * | -------------- | -------------- | --------- |
 * | true           | false          | source    |
 * | true           | true           | transform |
 * | false          | true           | sink      |
 * | false          | false          | generic   |
 *
 * The role itself is never stored on a step; the classifier derives it each
 * time the step is scheduled.
 */

import type { z } from "zod";
import type { Logger } from "../logging/logger";

export type StepRole = "source" | "transform" | "sink" | "generic";

/** Keyword parameters supplied to a step */
export type StepParams = Record<string, unknown>;

/** Anything a source or transform may hand back as its output stream */
export type StreamSource<T> = AsyncIterable<T> | Iterable<T>;

/**
 * Per-invocation information injected by the runner.
 *
 * `preview` is the privileged preview flag: it tells the step that the
 * pipeline runs in truncated preview mode. It is never part of the step's
 * parameter schema.
 */
export interface StepCall {
  preview: boolean;
  stepName: string;
  stepIndex: number;
  logger: Logger;
}

/**
 * Parameter schema of a step. Input is left open so schemas with defaults
 * (whose input type differs from their output type) are accepted.
 */
export type ParamsSchema<P> = z.ZodType<P, z.ZodTypeDef, unknown>;

interface StepInfo<P> {
  /** Display and diagnostic name */
  readonly name: string;
  /** One-line description shown by `stepstream list` */
  readonly description?: string;
  /** Schema validating and defaulting the parameter mapping */
  readonly params?: ParamsSchema<P>;
}

export interface SourceStep<TOut = unknown, P = StepParams> extends StepInfo<P> {
  readonly consumesStream: false;
  readonly producesStream: true;
  run(params: P, call: StepCall): StreamSource<TOut>;
}

export interface TransformStep<TIn = unknown, TOut = unknown, P = StepParams> extends StepInfo<P> {
  readonly consumesStream: true;
  readonly producesStream: true;
  run(input: AsyncGenerator<TIn>, params: P, call: StepCall): StreamSource<TOut>;
}

export interface SinkStep<TIn = unknown, TResult = unknown, P = StepParams> extends StepInfo<P> {
  readonly consumesStream: true;
  readonly producesStream: false;
  run(input: AsyncGenerator<TIn>, params: P, call: StepCall): TResult | Promise<TResult>;
}

export interface GenericStep<TIn = unknown, TOut = unknown, P = StepParams> extends StepInfo<P> {
  readonly consumesStream: false;
  readonly producesStream: false;
  run(item: TIn, params: P, call: StepCall): TOut | Promise<TOut>;
}

/** Type-erased step as stored in descriptors and registries */
export type PipelineStep = SourceStep | TransformStep | SinkStep | GenericStep;

/** A step narrowed by its derived role */
export type ClassifiedStep =
  | { role: "source"; step: SourceStep }
  | { role: "transform"; step: TransformStep }
  | { role: "sink"; step: SinkStep }
  | { role: "generic"; step: GenericStep };

/**
 * One entry of a pipeline.
 *
 * Created when the pipeline is assembled; the runner freezes a copy when a
 * run starts and owns it until the run ends.
 */
export interface StepDescriptor {
  step: PipelineStep;
  /** Keyword parameters, validated against `step.params` before the step runs */
  params?: StepParams;
  /** Worker count for per-item parallelism (0 = disabled) */
  parallelism?: number;
  /** Items grouped per worker dispatch when parallelism is enabled */
  chunkSize?: number;
  /** Identifies the step in callbacks, logs and errors (defaults to step.name) */
  label?: string;
}

export type RunState = "idle" | "validating" | "running" | "completed" | "failed" | "cancelled";

/** First item (or final value, for sinks) observed at a step */
export interface PeekEvent {
  step: string;
  stepIndex: number;
  role: StepRole;
  /** `undefined` for sources and for streams that ended before their first item */
  value: unknown;
}

/** Running count of items that passed a step */
export interface ProgressEvent {
  step: string;
  stepIndex: number;
  count: number;
}

/** Anything the runner can poll for cooperative cancellation */
export interface CancellationToken {
  isCancelled(): boolean;
}

export type CancellationInput = CancellationToken | (() => boolean) | AbortSignal;

/**
 * Per-run options (the run context).
 * All callbacks are synchronous and run on the runner's own call stack.
 */
export interface RunOptions {
  /** Truncate sources and transforms to a short prefix */
  preview?: boolean;
  /** Items kept per stage in preview mode (defaults to config engine.previewLimit) */
  previewLimit?: number;
  onPeek?: (event: PeekEvent) => void;
  onProgress?: (event: ProgressEvent) => void;
  cancellation?: CancellationInput;
  onStateChange?: (state: RunState) => void;
  /** Chunks in flight per worker for parallel steps (defaults to config engine.inFlightFactor) */
  inFlightFactor?: number;
  /** Pass items across worker boundaries through structuredClone */
  cloneAcrossWorkers?: boolean;
  logger?: Logger;
}

export interface PipelineResult<T = unknown> {
  status: "completed" | "cancelled";
  /** Sink output, or the drained final stream when the pipeline has no sink */
  value: T;
  /** True when no sink existed and the final stream was materialized */
  drained: boolean;
  /** Number of steps that were started */
  stepsRun: number;
}

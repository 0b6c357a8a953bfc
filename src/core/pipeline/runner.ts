/**
 * Pipeline runner: threads one lazy stream through an ordered list of steps.
 *
 * For each descriptor, in order:
 * 1. classify the step and check role adjacency (a source cannot follow a
 *    stream; transforms, sinks and generic steps need one), then validate its
 *    parameters. This happens immediately before the step runs, so a late
 *    structural error can surface after earlier steps already produced output.
 * 2. open the step's output stream (generic steps go through the generator
 *    adapter, or the worker pool when `parallelism > 0`) behind an error guard
 *    that attributes failures to the step.
 * 3. attach taps: preview, peek, cancellation, progress.
 *
 * A sink ends the run with its return value. Without a sink the final stream
 * is drained into an array.
 *
 * Nothing is pulled ahead of demand except the peek lookahead (one item per
 * stage) and the worker pool's bounded window.
 */

import { randomUUID } from "node:crypto";
import { defaultConfig, type EngineConfig } from "../../config/schema";
import { createLogger, type Logger, withRunContext } from "../logging/logger";
import { toCancellationCheck } from "./cancellation";
import { classifyStep } from "./classifier";
import {
  PipelineStructureError,
  StepExecutionError,
  StepParameterError,
  isPipelineError,
  type StepLocation,
} from "./errors";
import { liftWith } from "./streaming/compose";
import { fromIterable, isAsyncIterable, isIterable, toArray } from "./streaming/generators";
import { parallelize } from "./streaming/parallel";
import { cancellationTap, peekTap, previewTap, progressTap } from "./streaming/taps";
import type {
  ClassifiedStep,
  PeekEvent,
  PipelineResult,
  PipelineStep,
  ProgressEvent,
  RunOptions,
  RunState,
  StepCall,
  StepDescriptor,
  StepParams,
  StepRole,
  StreamSource,
} from "./types";

const logger = createLogger("pipeline-runner");

type Located = Required<StepLocation>;

interface PoolSettings {
  workers: number;
  chunkSize: number;
  inFlightFactor: number;
  clone: boolean;
}

/**
 * Per-step parallelism and chunking, as carried by the list-based surface.
 */
export interface StepFlags {
  parallelism?: number;
  chunkSize?: number;
}

function wrapStepError(error: unknown, location: Located): unknown {
  return isPipelineError(error) ? error : new StepExecutionError(location, error);
}

/**
 * Caller callbacks invoked from a step's taps fail on behalf of that step, so
 * the error is not blamed on whichever stage happens to pull next.
 */
function attribute<A extends unknown[], R>(fn: (...args: A) => R, location: Located): (...args: A) => R {
  return (...args) => {
    try {
      return fn(...args);
    } catch (error) {
      throw wrapStepError(error, location);
    }
  };
}

/**
 * Close every opened stage, downstream first. A stage that fails to close does
 * not keep the others open; the first failure is returned.
 */
async function closeStages(
  opened: readonly AsyncGenerator<unknown>[],
  runLogger: Logger,
): Promise<{ error: unknown } | null> {
  let first: { error: unknown } | null = null;
  for (const generator of [...opened].reverse()) {
    try {
      await generator.return(undefined);
    } catch (error) {
      runLogger.warn({ event: "stage_close_failed", err: error instanceof Error ? error : new Error(String(error)) });
      if (first === null) {
        first = { error };
      }
    }
  }
  return first;
}

function expectStream(value: unknown, location: Located): StreamSource<unknown> {
  if (isAsyncIterable(value) || isIterable(value)) {
    return value;
  }
  throw new TypeError(
    `Step "${location.stepName}" declares a stream output but returned ${value === null ? "null" : typeof value}`,
  );
}

/**
 * Open a stage lazily and attribute anything it throws to its step.
 * Errors already attributed upstream pass through unchanged.
 */
async function* guardStage(open: () => unknown, location: Located): AsyncGenerator<unknown> {
  let inner: AsyncGenerator<unknown> | undefined;
  try {
    inner = fromIterable(expectStream(open(), location));
    yield* inner;
  } catch (error) {
    throw wrapStepError(error, location);
  } finally {
    await inner?.return(undefined);
  }
}

function resolveParams(step: PipelineStep, supplied: StepParams | undefined, location: Located): StepParams {
  const raw = supplied ?? {};
  if (!step.params) {
    return raw;
  }

  const result = step.params.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new StepParameterError(
      `Invalid parameters for step "${location.stepName}": ${details}`,
      result.error.issues,
      location,
      result.error,
    );
  }
  return result.data;
}

function checkAdjacency(role: StepRole, hasStream: boolean, location: Located): void {
  if (role === "source" && hasStream) {
    throw new PipelineStructureError("source cannot follow a stream", location);
  }
  if (role !== "source" && !hasStream) {
    throw new PipelineStructureError(`${role} requires an input stream`, location);
  }
}

function checkCount(name: string, value: number, min: number, location: Located): number {
  if (!Number.isInteger(value) || value < min) {
    throw new PipelineStructureError(`${name} must be an integer >= ${min}, got ${value}`, location);
  }
  return value;
}

function openStage(
  classified: ClassifiedStep,
  upstream: AsyncGenerator<unknown> | null,
  params: StepParams,
  call: StepCall,
  pool: PoolSettings,
  runLogger: Logger,
): unknown {
  const input = upstream ?? fromIterable<unknown>([]);
  switch (classified.role) {
    case "source":
      return classified.step.run(params, call);
    case "transform":
      return classified.step.run(input, params, call);
    case "generic": {
      const { step } = classified;
      if (pool.workers > 0) {
        runLogger.debug({
          event: "step_parallel",
          step: call.stepName,
          workers: pool.workers,
          chunkSize: pool.chunkSize,
        });
        return parallelize((item: unknown) => step.run(item, params, call), {
          workers: pool.workers,
          chunkSize: pool.chunkSize,
          maxInFlight: pool.workers * pool.inFlightFactor,
          clone: pool.clone,
        })(input);
      }
      return liftWith((item: unknown) => step.run(item, params, call))(input);
    }
    case "sink":
      throw new Error("sink steps are consumed by the runner, not opened as stages");
  }
}

export class PipelineRunner {
  private currentState: RunState = "idle";
  private readonly engine: EngineConfig;

  constructor(engine: Partial<EngineConfig> = {}) {
    this.engine = { ...defaultConfig.engine, ...engine };
  }

  get state(): RunState {
    return this.currentState;
  }

  /**
   * Run a pipeline to completion, cancellation or failure.
   *
   * @throws ClassificationError, PipelineStructureError, StepParameterError or
   *   StepExecutionError; the run is then in state "failed"
   *
   * @example
   * ```typescript
   * const result = await new PipelineRunner().run([
   *   { step: range, params: { count: 10 } },
   *   { step: scale, params: { factor: 2 }, parallelism: 4 },
   *   { step: sum },
   * ]);
   * console.log(result.value); // 90
   * ```
   */
  async run(descriptors: readonly StepDescriptor[], options: RunOptions = {}): Promise<PipelineResult> {
    if (this.currentState === "validating" || this.currentState === "running") {
      throw new Error("PipelineRunner is already running a pipeline");
    }
    this.transition("idle", options);

    const runLogger = withRunContext(options.logger ?? logger, randomUUID());
    const plan = descriptors.map((descriptor) =>
      Object.freeze({ ...descriptor, params: Object.freeze({ ...descriptor.params }) }),
    );
    const preview = options.preview ?? false;
    const previewLimit = options.previewLimit ?? this.engine.previewLimit;
    const inFlightFactor = options.inFlightFactor ?? this.engine.inFlightFactor;
    const clone = options.cloneAcrossWorkers ?? false;
    const isCancelled = toCancellationCheck(options.cancellation);
    const { onPeek, onProgress } = options;

    let cancelled = false;
    const markCancelled = () => {
      if (!cancelled) {
        cancelled = true;
        runLogger.info({ event: "pipeline_cancel_requested" });
      }
    };

    const opened: AsyncGenerator<unknown>[] = [];
    let stream: AsyncGenerator<unknown> | null = null;
    let stepsRun = 0;
    const startTime = performance.now();

    runLogger.info({ event: "pipeline_start", steps: plan.length, preview });

    const execute = async (): Promise<PipelineResult> => {
      if (!Number.isInteger(previewLimit) || previewLimit < 1) {
        throw new RangeError(`previewLimit must be a positive integer, got ${previewLimit}`);
      }

      for (const [index, descriptor] of plan.entries()) {
        this.transition("validating", options);

        const classified = classifyStep(descriptor.step, { stepName: descriptor.label, stepIndex: index });
        const location: Located = { stepName: descriptor.label ?? classified.step.name, stepIndex: index };
        checkAdjacency(classified.role, stream !== null, location);
        const params = resolveParams(classified.step, descriptor.params, location);
        const parallelism = checkCount("parallelism", descriptor.parallelism ?? 0, 0, location);
        const chunkSize = checkCount("chunkSize", descriptor.chunkSize ?? this.engine.defaultChunkSize, 1, location);

        this.transition("running", options);
        stepsRun++;

        const call: StepCall = {
          preview,
          stepName: location.stepName,
          stepIndex: index,
          logger: runLogger.child({ step: location.stepName }),
        };
        const peek = (value: unknown): PeekEvent => ({
          step: location.stepName,
          stepIndex: index,
          role: classified.role,
          value,
        });
        const progress = (count: number): ProgressEvent => ({ step: location.stepName, stepIndex: index, count });

        runLogger.debug({ event: "step_start", step: location.stepName, stepIndex: index, role: classified.role });

        if (parallelism > 0 && classified.role !== "generic") {
          runLogger.warn({
            event: "parallelism_ignored",
            step: location.stepName,
            role: classified.role,
            parallelism,
          });
        }

        if (classified.role === "sink") {
          // Adjacency guarantees an upstream stream here
          const input = stream ?? fromIterable<unknown>([]);
          let value: unknown;
          try {
            value = await classified.step.run(input, params, call);
          } catch (error) {
            throw wrapStepError(error, location);
          }

          onProgress?.(progress(1));
          onPeek?.(peek(value));
          return { status: cancelled ? "cancelled" : "completed", value, drained: false, stepsRun };
        }

        const upstream = stream;
        const pool: PoolSettings = { workers: parallelism, chunkSize, inFlightFactor, clone };
        let output = guardStage(() => openStage(classified, upstream, params, call, pool, runLogger), location);
        opened.push(output);

        if (preview && (classified.role === "source" || classified.role === "transform")) {
          output = previewTap(output, previewLimit);
          opened.push(output);
        }

        if (onPeek) {
          if (classified.role === "source") {
            onPeek(peek(undefined));
          } else {
            output = await peekTap(output, attribute((first: unknown) => onPeek(peek(first)), location));
            opened.push(output);
          }
        }

        if (options.cancellation !== undefined) {
          output = cancellationTap(output, attribute(isCancelled, location), markCancelled);
          opened.push(output);
        }

        if (onProgress) {
          output = progressTap(output, attribute((count: number) => onProgress(progress(count)), location));
          opened.push(output);
        }

        stream = output;
      }

      if (stream === null) {
        return { status: "completed", value: [], drained: true, stepsRun };
      }

      runLogger.warn({ event: "pipeline_no_sink", msg: "pipeline has no sink; draining final stream" });
      const value = await toArray(stream);
      return { status: cancelled ? "cancelled" : "completed", value, drained: true, stepsRun };
    };

    let result: PipelineResult;
    try {
      result = await execute();
    } catch (error) {
      await closeStages(opened, runLogger);
      throw this.fail(error, runLogger, options, stepsRun, startTime);
    }

    const closeFailure = await closeStages(opened, runLogger);
    if (closeFailure !== null) {
      throw this.fail(closeFailure.error, runLogger, options, stepsRun, startTime);
    }
    return this.finish(result, runLogger, options, startTime);
  }

  private fail(error: unknown, runLogger: Logger, options: RunOptions, stepsRun: number, startTime: number): unknown {
    this.transition("failed", options);
    runLogger.error({
      event: "pipeline_failed",
      stepsRun,
      durationMs: performance.now() - startTime,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return error;
  }

  private finish(
    result: PipelineResult,
    runLogger: Logger,
    options: RunOptions,
    startTime: number,
  ): PipelineResult {
    this.transition(result.status, options);
    runLogger.info({
      event: result.status === "cancelled" ? "pipeline_cancelled" : "pipeline_complete",
      stepsRun: result.stepsRun,
      drained: result.drained,
      durationMs: performance.now() - startTime,
    });
    return result;
  }

  private transition(next: RunState, options: RunOptions): void {
    if (this.currentState === next) {
      return;
    }
    this.currentState = next;
    options.onStateChange?.(next);
  }
}

/**
 * Run a pipeline with a fresh runner.
 *
 * @example
 * ```typescript
 * const { status, value } = await runPipeline(
 *   [{ step: range, params: { count: 1000 } }, { step: collect }],
 *   { preview: true, onPeek: (e) => console.log(e.step, e.value) },
 * );
 * ```
 */
export function runPipeline(
  descriptors: readonly StepDescriptor[],
  options: RunOptions = {},
  engine: Partial<EngineConfig> = {},
): Promise<PipelineResult> {
  return new PipelineRunner(engine).run(descriptors, options);
}

/**
 * Positional surface: parallel lists of steps, parameter mappings and flags.
 * Missing entries in the parameter or flag lists default to empty.
 */
export function runPipelineLists(
  steps: readonly PipelineStep[],
  paramsPerStep: readonly (StepParams | undefined)[] = [],
  flagsPerStep: readonly (StepFlags | undefined)[] = [],
  preview = false,
  onPeek?: (event: PeekEvent) => void,
  onProgress?: (event: ProgressEvent) => void,
  onCancelCheck?: () => boolean,
): Promise<PipelineResult> {
  const descriptors = steps.map(
    (step, index): StepDescriptor => ({
      step,
      params: paramsPerStep[index] ?? {},
      ...flagsPerStep[index],
    }),
  );
  return runPipeline(descriptors, { preview, onPeek, onProgress, cancellation: onCancelCheck });
}

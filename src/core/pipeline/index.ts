/**
 * Role-classified streaming pipeline engine.
 *
 * @example
 * ```typescript
 * import { defineGeneric, defineSink, defineSource, runPipeline } from "./core/pipeline";
 *
 * const numbers = defineSource({ name: "numbers", *run() { yield* [1, 2, 3]; } });
 * const double = defineGeneric({ name: "double", run: (x: number) => x * 2 });
 * const total = defineSink({
 *   name: "total",
 *   async run(input: AsyncGenerator<number>) {
 *     let sum = 0;
 *     for await (const x of input) sum += x;
 *     return sum;
 *   },
 * });
 *
 * const { value } = await runPipeline([{ step: numbers }, { step: double, parallelism: 2 }, { step: total }]);
 * // value === 12
 * ```
 */

export { CancellationSource, type IsCancelledFn, toCancellationCheck } from "./cancellation";
export { classify, classifyStep, describeStep, isPipelineStep, type StepDescription } from "./classifier";
export {
  ClassificationError,
  isPipelineError,
  PipelineError,
  PipelineErrorCode,
  type PipelineErrorCodeType,
  PipelineStructureError,
  StepExecutionError,
  StepParameterError,
  type StepLocation,
} from "./errors";
export { StepRegistry } from "./registry";
export { PipelineRunner, runPipeline, runPipelineLists, type StepFlags } from "./runner";
export { defineGeneric, defineSink, defineSource, defineTransform } from "./steps";
export * from "./streaming";
export type * from "./types";

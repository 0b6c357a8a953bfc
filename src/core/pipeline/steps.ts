import type {
  GenericStep,
  ParamsSchema,
  SinkStep,
  SourceStep,
  StepCall,
  StepParams,
  StreamSource,
  TransformStep,
} from "./types";

/**
 * Helpers for declaring pipeline steps with an explicit calling convention.
 *
 * Each helper fixes the `consumesStream` / `producesStream` flags so the role
 * classifier can place the step, and infers parameter types from the zod
 * schema when one is given.
 *
 * **Steps must not call other steps.** Shared logic belongs in plain helper
 * utility functions that several steps can call.
 *
 * @example
 * ```typescript
 * const scale = defineGeneric({
 *   name: "scale",
 *   params: z.object({ factor: z.number().default(1) }).strict(),
 *   run: (x: number, { factor }) => x * factor,
 * });
 * ```
 */

interface StepOptions<P> {
  name: string;
  description?: string;
  params?: ParamsSchema<P>;
}

export function defineSource<TOut, P = StepParams>(
  options: StepOptions<P> & { run: (params: P, call: StepCall) => StreamSource<TOut> },
): SourceStep<TOut, P> {
  return { ...options, consumesStream: false, producesStream: true };
}

export function defineTransform<TIn, TOut, P = StepParams>(
  options: StepOptions<P> & {
    run: (input: AsyncGenerator<TIn>, params: P, call: StepCall) => StreamSource<TOut>;
  },
): TransformStep<TIn, TOut, P> {
  return { ...options, consumesStream: true, producesStream: true };
}

export function defineSink<TIn, TResult, P = StepParams>(
  options: StepOptions<P> & {
    run: (input: AsyncGenerator<TIn>, params: P, call: StepCall) => TResult | Promise<TResult>;
  },
): SinkStep<TIn, TResult, P> {
  return { ...options, consumesStream: true, producesStream: false };
}

/**
 * Declare a plain item-to-item step. The runner promotes it to a per-item
 * stream transform, optionally spread over a worker pool.
 */
export function defineGeneric<TIn, TOut, P = StepParams>(
  options: StepOptions<P> & { run: (item: TIn, params: P, call: StepCall) => TOut | Promise<TOut> },
): GenericStep<TIn, TOut, P> {
  return { ...options, consumesStream: false, producesStream: false };
}

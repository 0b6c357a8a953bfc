/**
 * Composition utilities for async generators.
 *
 * `lift` promotes a plain item mapper into a per-item stream transform. This is
 * how the runner adapts `generic` steps: one output per input, in arrival
 * order, with exactly one item in flight.
 *
 * @module compose
 */

/**
 * Generator transformation function type.
 * Takes an async generator and returns a transformed async generator.
 */
export type GeneratorFn<TIn, TOut> = (input: AsyncGenerator<TIn>) => AsyncGenerator<TOut>;

/**
 * Compose generator functions left to right.
 *
 * @example
 * ```typescript
 * const transform = pipe(lift((n: number) => n * 2), lift((n: number) => n + 1));
 * await toArray(transform(fromArray([1, 2, 3]))); // [3, 5, 7]
 * ```
 */
export function pipe<T1, T2>(fn1: GeneratorFn<T1, T2>): GeneratorFn<T1, T2>;
export function pipe<T1, T2, T3>(fn1: GeneratorFn<T1, T2>, fn2: GeneratorFn<T2, T3>): GeneratorFn<T1, T3>;
export function pipe<T1, T2, T3, T4>(
  fn1: GeneratorFn<T1, T2>,
  fn2: GeneratorFn<T2, T3>,
  fn3: GeneratorFn<T3, T4>,
): GeneratorFn<T1, T4>;
export function pipe<T1, T2, T3, T4, T5>(
  fn1: GeneratorFn<T1, T2>,
  fn2: GeneratorFn<T2, T3>,
  fn3: GeneratorFn<T3, T4>,
  fn4: GeneratorFn<T4, T5>,
): GeneratorFn<T1, T5>;
export function pipe(...fns: GeneratorFn<unknown, unknown>[]): GeneratorFn<unknown, unknown>;

// Implementation
export function pipe(...fns: GeneratorFn<unknown, unknown>[]): GeneratorFn<unknown, unknown> {
  if (fns.length === 0) {
    throw new Error("pipe requires at least one function");
  }

  return (input: AsyncGenerator<unknown>) => {
    let result = input;
    for (const fn of fns) {
      result = fn(result);
    }
    return result;
  };
}

/**
 * Promote an item mapper into a lazy per-item stream transform.
 *
 * The mapper is applied strictly in arrival order and the next upstream item
 * is not pulled until the previous result has been yielded downstream.
 *
 * @example
 * ```typescript
 * const double = lift((n: number) => n * 2);
 * await toArray(double(fromArray([1, 2, 3]))); // [2, 4, 6]
 * ```
 */
export function lift<TIn, TOut>(fn: (item: TIn) => TOut | Promise<TOut>): GeneratorFn<TIn, TOut> {
  return async function* (input: AsyncGenerator<TIn>): AsyncGenerator<TOut> {
    try {
      for await (const item of input) {
        yield await fn(item);
      }
    } finally {
      await input.return?.(undefined);
    }
  };
}

/**
 * Lift a mapper that takes extra arguments after the item, binding them once.
 * Used for generic steps, whose mappers receive `(item, params, call)`.
 *
 * @example
 * ```typescript
 * const scaled = liftWith((x: number, factor: number) => x * factor, 3);
 * await toArray(scaled(fromArray([1, 2]))); // [3, 6]
 * ```
 */
export function liftWith<TIn, TOut, TRest extends unknown[]>(
  fn: (item: TIn, ...rest: TRest) => TOut | Promise<TOut>,
  ...rest: TRest
): GeneratorFn<TIn, TOut> {
  return lift((item: TIn) => fn(item, ...rest));
}

/**
 * Identity transform; yields every item unchanged.
 */
export function identity<T>(): GeneratorFn<T, T> {
  return async function* (input: AsyncGenerator<T>): AsyncGenerator<T> {
    try {
      for await (const item of input) {
        yield item;
      }
    } finally {
      await input.return?.(undefined);
    }
  };
}

/**
 * Base generator utilities for streaming pipelines.
 *
 * Every generator here closes its upstream in a `finally` block, so a consumer
 * that stops early (a preview truncation, a cancellation, a failure further
 * down) releases every stage above it.
 *
 * @module generators
 */

import type { StreamSource } from "../types";

export function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    (typeof value === "object" && value !== null && Symbol.iterator in value) || typeof value === "string"
  );
}

/**
 * Convert an array to an async generator stream.
 *
 * @example
 * ```typescript
 * const stream = fromArray([1, 2, 3]);
 * for await (const n of stream) console.log(n); // 1, 2, 3
 * ```
 */
export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

/**
 * Normalize a sync or async iterable into an async generator.
 * Sources and transforms may return either; the runner only threads
 * async generators between stages.
 */
export async function* fromIterable<T>(iterable: StreamSource<T>): AsyncGenerator<T> {
  if (isAsyncIterable(iterable)) {
    yield* iterable;
    return;
  }
  for (const item of iterable) {
    yield item;
  }
}

/**
 * Consume a stream into an array.
 * Materializes everything: only for finite streams.
 */
export async function toArray<T>(stream: AsyncGenerator<T>): Promise<T[]> {
  const results: T[] = [];

  try {
    for await (const item of stream) {
      results.push(item);
    }
  } finally {
    await stream.return?.(undefined);
  }

  return results;
}

/**
 * Limit a stream to its first N items, closing the source afterwards.
 *
 * The count is checked before pulling, so the source is never asked for an
 * item past the limit.
 *
 * @example
 * ```typescript
 * const firstTwo = await toArray(take(range(1000), 2)); // [0, 1]
 * ```
 */
export async function* take<T>(stream: AsyncGenerator<T>, n: number): AsyncGenerator<T> {
  let count = 0;

  try {
    while (count < n) {
      const next = await stream.next();
      if (next.done) {
        return;
      }
      count++;
      yield next.value;
    }
  } finally {
    await stream.return?.(undefined);
  }
}

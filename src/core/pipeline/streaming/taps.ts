/**
 * Instrumentation taps placed between pipeline stages.
 *
 * Apart from the preview tap, which exists to truncate, a tap never changes
 * the order or number of items that pass through it. Each tap closes its
 * upstream when it finishes or when its consumer stops early.
 *
 * @module taps
 */

import { take } from "./generators";

/**
 * Bound a stage to a short prefix for preview runs.
 */
export function previewTap<T>(stream: AsyncGenerator<T>, limit: number): AsyncGenerator<T> {
  return take(stream, limit);
}

/**
 * Report a running item count after each item passes.
 */
export async function* progressTap<T>(stream: AsyncGenerator<T>, report: (count: number) => void): AsyncGenerator<T> {
  let count = 0;
  try {
    for await (const item of stream) {
      count++;
      report(count);
      yield item;
    }
  } finally {
    await stream.return?.(undefined);
  }
}

async function* replay<T>(first: IteratorResult<T>, rest: AsyncGenerator<T>): AsyncGenerator<T> {
  try {
    if (first.done) {
      return;
    }
    yield first.value;
    yield* rest;
  } finally {
    await rest.return?.(undefined);
  }
}

/**
 * Single-item lookahead.
 *
 * Pulls the first item as soon as the tap is attached, hands it to `report`
 * (`undefined` when the stream is empty) and returns a stream that re-emits
 * that item before the rest. The downstream consumer sees every item exactly
 * once.
 *
 * @example
 * ```typescript
 * const stream = await peekTap(fromArray([1, 2, 3]), (first) => console.log(first)); // logs 1
 * await toArray(stream); // [1, 2, 3]
 * ```
 */
export async function peekTap<T>(
  stream: AsyncGenerator<T>,
  report: (first: T | undefined) => void,
): Promise<AsyncGenerator<T>> {
  const first = await stream.next();
  report(first.done ? undefined : first.value);
  return replay(first, stream);
}

/**
 * Stop a stream cooperatively.
 *
 * `isCancelled` is polled before every upstream pull; once it returns true the
 * tap calls `onCancel` and ends without pulling anything else.
 */
export async function* cancellationTap<T>(
  stream: AsyncGenerator<T>,
  isCancelled: () => boolean,
  onCancel: () => void,
): AsyncGenerator<T> {
  try {
    while (true) {
      if (isCancelled()) {
        onCancel();
        return;
      }
      const next = await stream.next();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  } finally {
    await stream.return?.(undefined);
  }
}

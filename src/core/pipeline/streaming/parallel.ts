/**
 * Ordered worker pool for per-item parallelism inside a streaming pipeline.
 *
 * Upstream items are grouped into chunks and handed to a fixed number of
 * worker slots. Results come back through an ordered window: chunk k is never
 * yielded before chunk k-1, whatever order the workers finish in.
 *
 * - Back-pressure: at most `maxInFlight` chunks are dispatched and not yet
 *   yielded, so the pool never buffers the whole stream.
 * - Fail-fast: the first worker failure (by time) is rethrown to the consumer,
 *   queued items of other in-flight chunks are skipped, and no new chunk is
 *   dispatched.
 * - Scoped release: the pool waits for its in-flight chunks and closes the
 *   upstream on every exit path (exhaustion, error, consumer `return()`).
 * - Serialization boundary: with `clone: true`, items and results cross the
 *   worker boundary through `structuredClone`.
 *
 * @module parallel
 */

import type { GeneratorFn } from "./compose";

export interface ParallelOptions {
  /** Worker slots (>= 1) */
  workers: number;
  /** Items per dispatched chunk (default 1) */
  chunkSize?: number;
  /** Chunks dispatched but not yet yielded (default workers * 2) */
  maxInFlight?: number;
  /** Copy items and results across the worker boundary */
  clone?: boolean;
}

export type ItemMapper<TIn, TOut> = (item: TIn, index: number) => TOut | Promise<TOut>;

export interface WorkerPoolStats {
  workers: number;
  dispatchedChunks: number;
  completedItems: number;
  /** Largest number of chunks dispatched but not yet yielded */
  peakWindow: number;
}

type ChunkOutcome<T> = { ok: true; values: T[] } | { ok: false; error: unknown };

/**
 * Queue-based limiter handing out a fixed number of worker slots.
 */
export class WorkerSlots {
  private running = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly size: number) {}

  get runningCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  async acquire(): Promise<void> {
    if (this.running < this.size) {
      this.running++;
      return;
    }
    // The releasing worker hands its slot over directly, so `running` is unchanged
    await new Promise<void>((resolve) => this.queue.push(resolve));
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.running--;
    }
  }
}

/**
 * Apply defaults and check bounds.
 *
 * @throws RangeError when a count is not a positive integer
 */
export function resolveParallelOptions(options: ParallelOptions): Required<ParallelOptions> {
  const { workers, chunkSize = 1, maxInFlight = workers * 2, clone = false } = options;
  for (const [name, value] of [
    ["workers", workers],
    ["chunkSize", chunkSize],
    ["maxInFlight", maxInFlight],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
  }
  return { workers, chunkSize, maxInFlight, clone };
}

async function readChunk<T>(iterator: AsyncIterator<T>, size: number): Promise<{ items: T[]; done: boolean }> {
  const items: T[] = [];
  while (items.length < size) {
    const next = await iterator.next();
    if (next.done) {
      return { items, done: true };
    }
    items.push(next.value);
  }
  return { items, done: false };
}

/**
 * A bounded pool applying one item mapper over one stream.
 * Each instance serves a single `map()` call.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool(async (n: number) => n * 2, { workers: 4 });
 * await toArray(pool.map(fromArray([0, 1, 2, 3]))); // [0, 2, 4, 6]
 * ```
 */
export class WorkerPool<TIn, TOut> {
  private readonly slots: WorkerSlots;
  private readonly chunkSize: number;
  private readonly maxInFlight: number;
  private readonly clone: boolean;
  private readonly abort = new AbortController();
  private readonly inFlight = new Set<Promise<ChunkOutcome<TOut>>>();
  private wakeOnFailure: ((outcome: ChunkOutcome<TOut>) => void) | null = null;
  private failure: { error: unknown } | null = null;
  private started = false;
  private readonly counters: WorkerPoolStats;

  constructor(
    private readonly fn: ItemMapper<TIn, TOut>,
    options: ParallelOptions,
  ) {
    const { workers, chunkSize, maxInFlight, clone } = resolveParallelOptions(options);
    this.slots = new WorkerSlots(workers);
    this.chunkSize = chunkSize;
    this.maxInFlight = maxInFlight;
    this.clone = clone;
    this.counters = { workers, dispatchedChunks: 0, completedItems: 0, peakWindow: 0 };
  }

  get stats(): WorkerPoolStats {
    return { ...this.counters };
  }

  async *map(source: AsyncIterable<TIn>): AsyncGenerator<TOut> {
    if (this.started) {
      throw new Error("WorkerPool.map() can only be called once per pool");
    }
    this.started = true;

    const iterator = source[Symbol.asyncIterator]();
    const window: Array<Promise<ChunkOutcome<TOut>>> = [];
    let exhausted = false;
    let nextIndex = 0;

    try {
      while (true) {
        while (!exhausted && this.failure === null && window.length < this.maxInFlight) {
          const { items, done } = await readChunk(iterator, this.chunkSize);
          exhausted = done;
          if (items.length > 0) {
            window.push(this.dispatch(items, nextIndex));
            nextIndex += items.length;
            this.counters.peakWindow = Math.max(this.counters.peakWindow, window.length);
          }
        }

        const head = window.shift();
        if (!head) {
          return;
        }

        const outcome = await this.settle(head);
        if (!outcome.ok) {
          throw outcome.error;
        }
        for (const value of outcome.values) {
          yield value;
        }
      }
    } catch (error) {
      this.abort.abort();
      throw error;
    } finally {
      await Promise.all(this.inFlight);
      await iterator.return?.();
    }
  }

  /**
   * Wait for the head of the window, or for any chunk to fail first.
   * The failure signal is created per wait and dropped afterwards, so a long
   * run never piles reactions onto one pending promise.
   */
  private settle(head: Promise<ChunkOutcome<TOut>>): Promise<ChunkOutcome<TOut>> {
    if (this.failure !== null) {
      return Promise.resolve({ ok: false, error: this.failure.error });
    }
    const failed = new Promise<ChunkOutcome<TOut>>((resolve) => {
      this.wakeOnFailure = resolve;
    });
    return Promise.race([failed, head]).finally(() => {
      this.wakeOnFailure = null;
    });
  }

  private dispatch(chunk: TIn[], startIndex: number): Promise<ChunkOutcome<TOut>> {
    this.counters.dispatchedChunks++;
    const task: Promise<ChunkOutcome<TOut>> = this.execute(chunk, startIndex).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  private async execute(chunk: TIn[], startIndex: number): Promise<ChunkOutcome<TOut>> {
    await this.slots.acquire();
    try {
      const values: TOut[] = [];
      for (const [offset, item] of chunk.entries()) {
        if (this.abort.signal.aborted) {
          break;
        }
        const input = this.clone ? structuredClone(item) : item;
        const output = await this.fn(input, startIndex + offset);
        values.push(this.clone ? structuredClone(output) : output);
        this.counters.completedItems++;
      }
      return { ok: true, values };
    } catch (error) {
      return this.fail(error);
    } finally {
      this.slots.release();
    }
  }

  private fail(error: unknown): ChunkOutcome<TOut> {
    const outcome: ChunkOutcome<TOut> = { ok: false, error };
    if (this.failure === null) {
      this.failure = { error };
      this.abort.abort();
      this.wakeOnFailure?.(outcome);
    }
    return outcome;
  }
}

/**
 * Wrap an item mapper so that a stream is processed by a fresh worker pool.
 * The pool lives exactly as long as the returned stream is consumed.
 *
 * @example
 * ```typescript
 * const doubled = parallelize(async (n: number) => n * 2, { workers: 4, chunkSize: 2 });
 * await toArray(doubled(fromArray([0, 1, 2, 3, 4]))); // [0, 2, 4, 6, 8]
 * ```
 */
export function parallelize<TIn, TOut>(fn: ItemMapper<TIn, TOut>, options: ParallelOptions): GeneratorFn<TIn, TOut> {
  resolveParallelOptions(options);
  return (input: AsyncGenerator<TIn>) => new WorkerPool(fn, options).map(input);
}

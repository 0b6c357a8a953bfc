/**
 * Streaming primitives for async generator pipelines.
 *
 * Pull-based and demand-driven: nothing upstream runs until a consumer asks
 * for the next item, and every stage closes its upstream when it stops.
 *
 * @module streaming
 */

// Composition and the generator adapter
export type { GeneratorFn } from "./compose";
export { identity, lift, liftWith, pipe } from "./compose";
// Generator utilities
export { fromArray, fromIterable, isAsyncIterable, isIterable, take, toArray } from "./generators";
// Worker pool
export type { ItemMapper, ParallelOptions, WorkerPoolStats } from "./parallel";
export { parallelize, resolveParallelOptions, WorkerPool, WorkerSlots } from "./parallel";
// Taps
export { cancellationTap, peekTap, previewTap, progressTap } from "./taps";

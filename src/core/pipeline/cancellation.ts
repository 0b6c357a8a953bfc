/**
 * Cooperative cancellation.
 *
 * The runner accepts a token object, a bare check function or an AbortSignal
 * and polls it once per item at every stage boundary. Nothing is preempted:
 * an item already being processed finishes.
 */

import type { CancellationInput, CancellationToken } from "./types";

export type IsCancelledFn = () => boolean;

const neverCancelled: IsCancelledFn = () => false;

/**
 * Normalize any accepted cancellation input into a check function.
 */
export function toCancellationCheck(input?: CancellationInput): IsCancelledFn {
  if (input === undefined) {
    return neverCancelled;
  }
  if (typeof input === "function") {
    return input;
  }
  if (input instanceof AbortSignal) {
    return () => input.aborted;
  }
  return () => input.isCancelled();
}

/**
 * A token that can be cancelled by whoever holds it.
 *
 * @example
 * ```typescript
 * const source = new CancellationSource();
 * process.once("SIGINT", () => source.cancel());
 * await runPipeline(steps, { cancellation: source });
 * ```
 */
export class CancellationSource implements CancellationToken {
  private cancelled = false;

  cancel(): void {
    this.cancelled = true;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }
}

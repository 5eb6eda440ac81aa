import { type AcceptResult } from '../shared/accept-result/accept-result.js';

/**
 * Represents a _consumer_ of values, whose `accept` may wait (I/O, a shared resource, ...) before completing.
 *
 * An implementation must honor the provided `signal`: if it aborts while `accept` is pending,
 * `accept` resolves to an _interrupted_ `AcceptResult` (an `Err` holding an `InterruptedError`).
 * Any other failure is specific to the implementation and rejects.
 *
 * @template GValue - Type of the accepted values.
 */
export interface BlockingConsumer<GValue> {
  accept(value: GValue, signal: AbortSignal): PromiseLike<AcceptResult> | AcceptResult;
}

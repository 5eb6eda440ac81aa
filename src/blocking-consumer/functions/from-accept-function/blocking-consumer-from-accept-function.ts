import { abortify } from '@xstd/abortable';
import { isResultOk, type Result, tryAsyncFnc } from '@xstd/enum';
import {
  type AcceptResult,
  acceptInterrupted,
  acceptOk,
} from '../../../shared/accept-result/accept-result.js';
import { InterruptedError } from '../../../shared/interrupted-error.js';
import { type BlockingConsumer } from '../../blocking-consumer.js';

/**
 * A function delivering a `value` somewhere, possibly waiting to do so.
 *
 * It should reject with `signal.reason` when `signal` is aborted.
 */
export interface AcceptFunction<GValue> {
  (value: GValue, signal: AbortSignal): PromiseLike<void> | void;
}

export interface BlockingConsumerOptions {
  /**
   * When `true`, a pending `accept` resolves as _interrupted_ as soon as the signal aborts,
   * without waiting for the `AcceptFunction` to settle.
   *
   * @default true
   */
  readonly interruptible?: boolean;
}

/**
 * Creates a `BlockingConsumer` from a plain `AcceptFunction`.
 *
 * - if the signal is already aborted, the function is not called
 * - a rejection with the signal's `reason` (while the signal is aborted), or with an `InterruptedError`, resolves as _interrupted_
 * - any other rejection is propagated
 *
 * @example
 *
 * ```ts
 * const consumer = blockingConsumer<number>(async (offset: number, signal: AbortSignal): Promise<void> => {
 *   await commitOffset(offset, { signal });
 * });
 * ```
 */
export function blockingConsumer<GValue>(
  acceptFnc: AcceptFunction<GValue>,
  { interruptible = true }: BlockingConsumerOptions = {},
): BlockingConsumer<GValue> {
  return {
    accept: async (value: GValue, signal: AbortSignal): Promise<AcceptResult> => {
      if (signal.aborted) {
        return acceptInterrupted(InterruptedError.fromSignal(signal));
      }

      const result: Result<void> = await tryAsyncFnc((): Promise<void> => {
        const promise: Promise<void> = Promise.resolve(acceptFnc(value, signal));
        return interruptible ? abortify(promise, { signal }) : promise;
      });

      if (isResultOk(result)) {
        if (signal.aborted) {
          console.warn(
            'The `AcceptFunction` fulfilled while its `signal` was aborted. It is expected to reject with `signal.reason` instead.',
          );
        }
        return acceptOk();
      }

      const error: unknown = result.error;

      if (error instanceof InterruptedError) {
        return acceptInterrupted(error);
      }

      if (signal.aborted && error === signal.reason) {
        return acceptInterrupted(InterruptedError.fromSignal(signal));
      }

      throw error;
    },
  };
}

import { type MapFunction } from '@xstd/functional';
import { type None } from '@xstd/none';
import { type BlockingConsumer } from '../blocking-consumer/blocking-consumer.js';
import { type AcceptResult } from '../shared/accept-result/accept-result.js';

/**
 * A `BlockingConsumer` that retains values in a buffer before sending them to a delegate consumer.
 * Buffered values may need to be _flushed_ periodically.
 *
 * Values reach the delegate in the order they were accepted.
 *
 * @template GValue - Type of the accepted values.
 */
export abstract class BufferedBlockingConsumer<GValue> implements BlockingConsumer<GValue> {
  abstract accept(value: GValue, signal: AbortSignal): Promise<AcceptResult>;

  /**
   * Flushes all the buffered values to the delegate, running each of them through `mapFnc` first.
   *
   * - values are flushed in buffering order
   * - a value handed to the delegate is considered flushed, even if its delivery is interrupted
   * - flushing an empty buffer resolves immediately, without calling the delegate
   */
  abstract flushMapped(
    signal: AbortSignal,
    mapFnc: MapFunction<GValue, GValue>,
  ): Promise<AcceptResult>;

  /**
   * Returns the next value a flush would deliver (before mapping), or `NONE` if the buffer is empty.
   */
  abstract peek(): GValue | None;

  /**
   * Flushes all the buffered values to the delegate, optionally mapped by `mapFnc`.
   */
  flush(signal: AbortSignal, mapFnc?: MapFunction<GValue, GValue>): Promise<AcceptResult> {
    return this.flushMapped(signal, mapFnc ?? identity);
  }
}

function identity<GValue>(value: GValue): GValue {
  return value;
}

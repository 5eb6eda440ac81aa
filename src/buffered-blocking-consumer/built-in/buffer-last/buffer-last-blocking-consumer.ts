import { type MapFunction } from '@xstd/functional';
import { NONE, type None } from '@xstd/none';
import { type BlockingConsumer } from '../../../blocking-consumer/blocking-consumer.js';
import { type AcceptResult, acceptOk } from '../../../shared/accept-result/accept-result.js';
import { BufferedBlockingConsumer } from '../../buffered-blocking-consumer.js';

/**
 * A `BufferedBlockingConsumer` that buffers just the last accepted value.
 *
 * When another value is accepted, the prior one is pushed into the delegate and the latest is buffered.
 * Any value still buffered when the consumer is discarded is never delivered.
 *
 * NOTE: calls must not overlap: each `accept` or `flush` has to be awaited before the next one starts.
 * Wrap it with `serializeBufferedBlockingConsumer` when callers cannot guarantee this.
 */
export class BufferLastBlockingConsumer<GValue> extends BufferedBlockingConsumer<GValue> {
  readonly #delegate: BlockingConsumer<GValue>;
  #last: GValue | None;

  constructor(delegate: BlockingConsumer<GValue>) {
    super();
    this.#delegate = delegate;
    this.#last = NONE;
  }

  async accept(value: GValue, signal: AbortSignal): Promise<AcceptResult> {
    const last: GValue | None = this.#last;

    if (last === NONE) {
      this.#last = value;
      return acceptOk();
    }

    try {
      return await this.#delegate.accept(last, signal);
    } finally {
      // └> an interrupted (or failed) delivery drops `last`
      this.#last = value;
    }
  }

  async flushMapped(
    signal: AbortSignal,
    mapFnc: MapFunction<GValue, GValue>,
  ): Promise<AcceptResult> {
    const last: GValue | None = this.#last;

    if (last === NONE) {
      return acceptOk();
    }

    try {
      return await this.#delegate.accept(mapFnc(last), signal);
    } finally {
      this.#last = NONE;
    }
  }

  peek(): GValue | None {
    return this.#last;
  }
}

/**
 * Returns a `BufferedBlockingConsumer` that buffers a single value at a time.
 *
 * @param delegate - The consumer to which values are flushed.
 */
export function bufferLast<GValue>(
  delegate: BlockingConsumer<GValue>,
): BufferLastBlockingConsumer<GValue> {
  return new BufferLastBlockingConsumer<GValue>(delegate);
}

import { abortify } from '@xstd/abortable';
import { isResultOk, type Result, tryAsyncFnc } from '@xstd/enum';
import { type MapFunction } from '@xstd/functional';
import { type None } from '@xstd/none';
import {
  type AcceptResult,
  acceptInterrupted,
} from '../../../shared/accept-result/accept-result.js';
import { InterruptedError } from '../../../shared/interrupted-error.js';
import { BufferedBlockingConsumer } from '../../buffered-blocking-consumer.js';

interface QueuedCall {
  (): Promise<AcceptResult>;
}

/**
 * Wraps a `BufferedBlockingConsumer` so that overlapping callers are run one after the other, in call order.
 *
 * Each `accept` or `flush` awaits that all previously queued calls are settled (fulfilled or rejected),
 * then it is forwarded to the wrapped consumer.
 * Results, rejections and interruptions are the wrapped consumer's, unchanged.
 *
 * A call whose `signal` aborts while it waits for its turn resolves as _interrupted_ at once,
 * and never reaches the wrapped consumer.
 */
export class SerializedBufferedBlockingConsumer<GValue> extends BufferedBlockingConsumer<GValue> {
  readonly #consumer: BufferedBlockingConsumer<GValue>;
  #queue: Promise<unknown>;

  constructor(consumer: BufferedBlockingConsumer<GValue>) {
    super();
    this.#consumer = consumer;
    this.#queue = Promise.resolve();
  }

  async #enqueue(call: QueuedCall, signal: AbortSignal): Promise<AcceptResult> {
    const task = (): Promise<AcceptResult> | AcceptResult => {
      if (signal.aborted) {
        return acceptInterrupted(InterruptedError.fromSignal(signal));
      }
      return call();
    };

    const queued: Promise<AcceptResult> = this.#queue.then(task, task);
    this.#queue = queued;

    const result: Result<AcceptResult> = await tryAsyncFnc(
      (): Promise<AcceptResult> => abortify(queued, { signal }),
    );

    if (isResultOk(result)) {
      return result.value;
    }

    if (signal.aborted && result.error === signal.reason) {
      return acceptInterrupted(InterruptedError.fromSignal(signal));
    }

    throw result.error;
  }

  accept(value: GValue, signal: AbortSignal): Promise<AcceptResult> {
    return this.#enqueue(
      (): Promise<AcceptResult> => this.#consumer.accept(value, signal),
      signal,
    );
  }

  flushMapped(signal: AbortSignal, mapFnc: MapFunction<GValue, GValue>): Promise<AcceptResult> {
    return this.#enqueue(
      (): Promise<AcceptResult> => this.#consumer.flushMapped(signal, mapFnc),
      signal,
    );
  }

  peek(): GValue | None {
    return this.#consumer.peek();
  }
}

export function serializeBufferedBlockingConsumer<GValue>(
  consumer: BufferedBlockingConsumer<GValue>,
): SerializedBufferedBlockingConsumer<GValue> {
  return new SerializedBufferedBlockingConsumer<GValue>(consumer);
}

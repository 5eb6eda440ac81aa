import { type MapFunction } from '@xstd/functional';
import { type AcceptResult } from '../../../shared/accept-result/accept-result.js';
import { type BlockingConsumer } from '../../blocking-consumer.js';

/**
 * Returns a new `BlockingConsumer` whose accepted values are _mapped_ using the function `mapFnc` before reaching `consumer`.
 *
 * @example: commit offsets as strings
 *
 * ```ts
 * const consumer: BlockingConsumer<number> = mapBlockingConsumer(stringConsumer, String);
 * ```
 */
export function mapBlockingConsumer<GIn, GOut>(
  consumer: BlockingConsumer<GOut>,
  mapFnc: MapFunction<GIn, GOut>,
): BlockingConsumer<GIn> {
  return {
    accept: async (value: GIn, signal: AbortSignal): Promise<AcceptResult> => {
      return consumer.accept(mapFnc(value), signal);
    },
  };
}

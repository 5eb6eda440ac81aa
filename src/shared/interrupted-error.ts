import { CustomError, type CustomErrorOptions } from '@xstd/custom-error';

export interface InterruptedErrorOptions extends CustomErrorOptions {
  readonly reason?: unknown;
}

/**
 * The caller stopped waiting for a blocking operation: its `AbortSignal` was aborted while the operation was pending.
 */
export class InterruptedError extends CustomError<'InterruptedError'> {
  static fromSignal(
    signal: AbortSignal,
    options?: Omit<InterruptedErrorOptions, 'reason'>,
  ): InterruptedError {
    return new InterruptedError({
      ...options,
      reason: signal.reason,
    });
  }

  /**
   * The `reason` of the aborted signal.
   */
  readonly reason: unknown;

  constructor({ reason, ...options }: InterruptedErrorOptions = {}) {
    super('InterruptedError', options);
    this.reason = reason;
  }
}

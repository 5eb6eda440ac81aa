import { isResultErr, type Result, type ResultErr, resultErr, resultOk } from '@xstd/enum';
import { InterruptedError } from '../interrupted-error.js';

/**
 * Outcome of a blocking operation: `Ok` when the value was delivered, `Err` when the caller interrupted the wait.
 */
export type AcceptResult = Result<void, InterruptedError>;

export function acceptOk(): AcceptResult {
  return resultOk<void>(undefined);
}

export function acceptInterrupted(reason?: unknown): AcceptResult {
  return resultErr<InterruptedError>(
    reason instanceof InterruptedError ? reason : new InterruptedError({ reason }),
  );
}

export function isAcceptInterrupted(
  result: AcceptResult,
): result is ResultErr<InterruptedError> {
  return isResultErr<InterruptedError>(result);
}

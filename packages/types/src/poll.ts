/**
 * Results of one rate-limited sweep over a set of units.
 */

/** A unit whose call failed, kept intact so it can be retried */
export interface PollFailure<U> {
  readonly unit: U;
  readonly error: string;
  /** True when the unit was never dispatched because the sweep was cancelled */
  readonly cancelled: boolean;
}

/**
 * `succeeded.length + failed.length` always equals the number of input units.
 * `succeeded` is in completion order, not input order.
 */
export interface PollResult<U, R> {
  readonly succeeded: R[];
  readonly failed: PollFailure<U>[];
  readonly cancelled: boolean;
  readonly elapsedMs: number;
}

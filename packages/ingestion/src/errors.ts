/**
 * Error types raised inside ingestion.
 *
 * Sources never let `UpstreamError` escape; they convert it into a
 * provenance-tagged fallback record. The poller turns `TimeoutError` and any
 * other per-unit rejection into a `failed` entry. `SinkError` is the only one
 * that reaches the scheduler.
 */

export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export type RecordKind = "traffic" | "incident" | "vehicle" | "risk";

export class SinkError extends Error {
  constructor(
    message: string,
    readonly kind: RecordKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SinkError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A wait or dispatch was abandoned because the sweep was cancelled */
export class CancelledError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

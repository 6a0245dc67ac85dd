/**
 * Rate-limited, failure-isolated sweep over a set of units.
 *
 * Units are processed in batches of `batchSize`; inside a batch up to
 * `concurrency` workers pull units. Calls that go through a gated
 * `UpstreamClient` are spaced per request there; for other calls a `gate` or
 * `minSpacingMs` spaces each unit dispatch. Between batches the sweep rests
 * for `batchCooldownMs`.
 *
 * A rejected or timed-out call becomes a `failed` entry and the sweep moves
 * on. Once `signal` aborts no further unit is dispatched: in-flight calls run
 * to completion (or their timeout) and every undispatched unit is reported
 * as a cancelled failure, so the partial result can still be flushed.
 */

import type { PollFailure, PollResult } from "@roadrisk/types";
import { performance } from "node:perf_hooks";
import { delay } from "../delay.js";
import { CancelledError, TimeoutError, errorMessage } from "../errors.js";
import { RateGate } from "./rate-gate.js";

export interface PollOptions<U> {
  /** Minimum spacing between two unit dispatches; ignored when `gate` is given */
  minSpacingMs?: number;
  batchSize: number;
  batchCooldownMs: number;
  /** Parallel calls in flight (default: 1) */
  concurrency?: number;
  /** Shared gate for the rate-limit domain the units belong to */
  gate?: RateGate;
  /** Per-call timeout; the call's signal is aborted when it fires */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Name used in progress logs */
  label?: string;
  describeUnit?: (unit: U) => string;
  /** Log every N completed units (default: 10) */
  progressEvery?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type PollCall<U, R> = (unit: U, signal: AbortSignal) => Promise<R>;

/** Run `call` with its own abort signal, failing with `TimeoutError` after `timeoutMs` */
export function callWithTimeout<R>(
  call: (signal: AbortSignal) => Promise<R>,
  timeoutMs: number | undefined,
): Promise<R> {
  const controller = new AbortController();
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return call(controller.signal);
  }
  return new Promise<R>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    call(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

export async function runPoll<U, R>(
  units: readonly U[],
  call: PollCall<U, R>,
  options: PollOptions<U>,
): Promise<PollResult<U, R>> {
  const {
    batchSize,
    batchCooldownMs,
    timeoutMs,
    signal,
    label = "sweep",
    describeUnit = (unit: U) => String(unit),
    progressEvery = 10,
  } = options;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const sleep = options.sleep ?? delay;
  const minSpacingMs = options.minSpacingMs ?? 0;
  const gate =
    options.gate ?? (minSpacingMs > 0 ? new RateGate({ minSpacingMs, sleep }) : undefined);

  const start = performance.now();
  const total = units.length;
  const succeeded: R[] = [];
  const failed: PollFailure<U>[] = [];
  let completed = 0;

  const record = (): void => {
    completed++;
    if (completed % progressEvery === 0 && completed < total) {
      console.log(`[poll] ${label}: ${completed}/${total} units (${failed.length} failed)`);
    }
  };

  const dispatched = new Array<boolean>(total).fill(false);
  const reportUndispatched = (): void => {
    units.forEach((unit, index) => {
      if (!dispatched[index]) {
        failed.push({ unit, error: "Cancelled before dispatch", cancelled: true });
      }
    });
  };

  let next = 0;
  let cancelled = false;

  const worker = async (batchEnd: number): Promise<void> => {
    while (next < batchEnd && !cancelled) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }
      const index = next++;
      const unit = units[index];
      if (unit === undefined) continue;
      try {
        await gate?.acquire(signal);
      } catch (err) {
        if (!(err instanceof CancelledError)) throw err;
        cancelled = true;
        return;
      }
      dispatched[index] = true;
      try {
        succeeded.push(await callWithTimeout((callSignal) => call(unit, callSignal), timeoutMs));
      } catch (err) {
        const message = errorMessage(err);
        console.warn(`[poll] ${label}: ${describeUnit(unit)} failed: ${message}`);
        failed.push({ unit, error: message, cancelled: false });
      }
      record();
    }
  };

  for (let batchStart = 0; batchStart < total && !cancelled; batchStart += batchSize) {
    if (batchStart > 0 && batchCooldownMs > 0) {
      try {
        await sleep(batchCooldownMs, signal);
      } catch (err) {
        if (!(err instanceof CancelledError)) throw err;
        cancelled = true;
        break;
      }
    }
    if (signal?.aborted) {
      cancelled = true;
      break;
    }
    const batchEnd = Math.min(total, batchStart + batchSize);
    next = batchStart;
    await Promise.all(
      Array.from({ length: Math.min(concurrency, batchEnd - batchStart) }, () => worker(batchEnd)),
    );
  }

  if (cancelled) reportUndispatched();

  const elapsedMs = performance.now() - start;
  console.log(
    `[poll] ${label} ${cancelled ? "cancelled" : "complete"}: ` +
      `${succeeded.length} succeeded, ${failed.length} failed, ${total} total ` +
      `(${(elapsedMs / 1000).toFixed(1)}s)`,
  );
  return { succeeded, failed, cancelled, elapsedMs };
}

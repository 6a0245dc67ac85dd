/**
 * Monotonic-clock spacing gate.
 *
 * Every caller reserves the next free slot synchronously, then waits for it.
 * Because the reservation happens before any await, concurrent workers sharing
 * one gate can never be granted slots closer than `minSpacingMs` apart.
 */

import { performance } from "node:perf_hooks";
import { delay } from "../delay.js";
import { CancelledError } from "../errors.js";

export interface RateGateOptions {
  minSpacingMs: number;
  /** Monotonic clock in ms (default: performance.now) */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RateGate {
  readonly minSpacingMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private nextSlot = Number.NEGATIVE_INFINITY;

  constructor(options: RateGateOptions) {
    if (!Number.isFinite(options.minSpacingMs) || options.minSpacingMs < 0) {
      throw new Error(`minSpacingMs must be a non-negative number, got ${options.minSpacingMs}`);
    }
    this.minSpacingMs = options.minSpacingMs;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Wait for this caller's slot. Rejects with `CancelledError` if `signal`
   * aborts first; the reserved slot is then left unused.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minSpacingMs;
    const wait = slot - now;
    if (wait > 0) await this.sleep(wait, signal);
  }
}

/**
 * One gate per rate-limit domain (e.g. per upstream API key), so sources that
 * share a quota share a gate.
 */
export class RateGateRegistry {
  private readonly gates = new Map<string, RateGate>();

  constructor(private readonly defaults: Omit<RateGateOptions, "minSpacingMs"> = {}) {}

  gate(domain: string, minSpacingMs: number): RateGate {
    const existing = this.gates.get(domain);
    if (existing) {
      if (existing.minSpacingMs !== minSpacingMs) {
        console.warn(
          `[poll] Gate "${domain}" already spaced at ${existing.minSpacingMs}ms; ignoring ${minSpacingMs}ms`,
        );
      }
      return existing;
    }
    const created = new RateGate({ ...this.defaults, minSpacingMs });
    this.gates.set(domain, created);
    return created;
  }
}

/**
 * Runs each job on its own cadence.
 *
 * Every job gets a slot with its own timer and its own state
 * (idle → running → idle, or running → cancelling on stop). A tick that finds
 * its job still running is skipped and logged, never queued. Jobs run once
 * as soon as the scheduler starts. A failing run is logged and counted; it
 * never stops the scheduler.
 */

import { performance } from "node:perf_hooks";
import { errorMessage } from "@roadrisk/ingestion";
import type { DisabledJob, Job, JobReport } from "./job.js";

export type JobState = "idle" | "running" | "cancelling";

export interface JobStatus {
  name: string;
  state: JobState | "disabled";
  intervalMs?: number;
  runs: number;
  failures: number;
  skippedTicks: number;
  lastStartedAt?: Date;
  lastFinishedAt?: Date;
  lastDurationMs?: number;
  lastReport?: JobReport;
  lastError?: string;
  /** Why a disabled job is not scheduled */
  reason?: string;
}

interface Slot {
  job: Job;
  state: JobState;
  timer?: ReturnType<typeof setInterval>;
  controller?: AbortController;
  inFlight?: Promise<void>;
  runs: number;
  failures: number;
  skippedTicks: number;
  lastStartedAt?: Date;
  lastFinishedAt?: Date;
  lastDurationMs?: number;
  lastReport?: JobReport;
  lastError?: string;
}

export interface JobSchedulerOptions {
  disabled?: readonly DisabledJob[];
  now?: () => Date;
}

export class JobScheduler {
  private readonly slots: Slot[];
  private readonly disabled: readonly DisabledJob[];
  private readonly now: () => Date;
  private started = false;
  private stopping?: Promise<void>;

  constructor(jobs: readonly Job[], options: JobSchedulerOptions = {}) {
    const names = new Set<string>();
    for (const job of jobs) {
      if (names.has(job.name)) throw new Error(`Duplicate job name "${job.name}"`);
      if (!(job.intervalMs > 0)) {
        throw new Error(`Job "${job.name}" needs a positive interval, got ${job.intervalMs}`);
      }
      names.add(job.name);
    }
    this.slots = jobs.map((job) => ({ job, state: "idle", runs: 0, failures: 0, skippedTicks: 0 }));
    this.disabled = options.disabled ?? [];
    this.now = options.now ?? (() => new Date());
  }

  /** Run every job once now, then on its cadence */
  start(): void {
    if (this.started) return;
    this.started = true;
    for (const { name, reason } of this.disabled) {
      console.warn(`[scheduler] ${name} disabled: ${reason}`);
    }
    for (const slot of this.slots) {
      console.log(`[scheduler] ${slot.job.name} every ${formatInterval(slot.job.intervalMs)}`);
      this.tick(slot);
      slot.timer = setInterval(() => this.tick(slot), slot.job.intervalMs);
    }
  }

  /**
   * Stop all timers, abort running jobs and wait for them to flush.
   * Resolves once every slot is idle.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  status(): JobStatus[] {
    const active = this.slots.map(
      (slot): JobStatus => ({
        name: slot.job.name,
        state: slot.state,
        intervalMs: slot.job.intervalMs,
        runs: slot.runs,
        failures: slot.failures,
        skippedTicks: slot.skippedTicks,
        lastStartedAt: slot.lastStartedAt,
        lastFinishedAt: slot.lastFinishedAt,
        lastDurationMs: slot.lastDurationMs,
        lastReport: slot.lastReport,
        lastError: slot.lastError,
      }),
    );
    const disabled = this.disabled.map(
      ({ name, reason }): JobStatus => ({
        name,
        state: "disabled",
        runs: 0,
        failures: 0,
        skippedTicks: 0,
        reason,
      }),
    );
    return [...active, ...disabled];
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private tick(slot: Slot): void {
    if (this.stopping) return;
    if (slot.state !== "idle") {
      slot.skippedTicks++;
      console.warn(`[scheduler] ${slot.job.name} still ${slot.state} — skipping tick`);
      return;
    }
    slot.inFlight = this.execute(slot);
  }

  private async execute(slot: Slot): Promise<void> {
    const { job } = slot;
    const controller = new AbortController();
    slot.controller = controller;
    slot.state = "running";
    slot.runs++;
    slot.lastStartedAt = this.now();
    const start = performance.now();
    console.log(`[scheduler] ${job.name} started (run ${slot.runs})`);

    try {
      const report = await job.run(controller.signal);
      slot.lastReport = report;
      slot.lastError = undefined;
      console.log(
        `[scheduler] ${job.name} ${report.cancelled ? "cancelled" : "finished"}: ` +
          `${report.succeeded} succeeded, ${report.failed} failed`,
      );
    } catch (err) {
      slot.failures++;
      slot.lastError = errorMessage(err);
      console.error(`[scheduler] ${job.name} failed: ${slot.lastError}`);
    } finally {
      slot.lastDurationMs = performance.now() - start;
      slot.lastFinishedAt = this.now();
      slot.state = "idle";
      slot.controller = undefined;
      slot.inFlight = undefined;
    }
  }

  private async shutdown(): Promise<void> {
    console.log("[scheduler] Stopping");
    const pending: Promise<void>[] = [];
    for (const slot of this.slots) {
      if (slot.timer !== undefined) {
        clearInterval(slot.timer);
        slot.timer = undefined;
      }
      if (slot.state === "running" && slot.inFlight) {
        slot.state = "cancelling";
        slot.controller?.abort();
        pending.push(slot.inFlight);
      }
    }
    await Promise.all(pending);
    console.log("[scheduler] Stopped");
  }
}

function formatInterval(ms: number): string {
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0) return `${ms / 60_000}min`;
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}

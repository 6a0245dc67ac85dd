/**
 * Vehicle sweep: decode and rate the next batch of queued VINs.
 */

import {
  rateVin,
  runPoll,
  type RecordSink,
  type VehicleSafetySource,
  type VinDecoder,
} from "@roadrisk/ingestion";
import type { PollSettings } from "../config.js";
import type { JobReport } from "../scheduler/job.js";
import type { SignalCache } from "../signal-cache.js";
import { pollOptions } from "./poll-options.js";
import { SingleFlightJob } from "./single-flight.js";

/**
 * Rotating queue of VINs. Each sweep takes the front of the queue and moves
 * it to the back; VINs that failed are put back at the front for the next
 * sweep.
 */
export class VinBacklog {
  private queue: string[];

  constructor(vins: readonly string[] = []) {
    this.queue = [...new Set(vins.map((vin) => vin.toUpperCase()))];
  }

  get size(): number {
    return this.queue.length;
  }

  take(limit: number): string[] {
    const batch = this.queue.slice(0, limit);
    this.queue = [...this.queue.slice(limit), ...batch];
    return batch;
  }

  retryFirst(vins: readonly string[]): void {
    const retry = new Set(vins.map((vin) => vin.toUpperCase()));
    this.queue = [
      ...this.queue.filter((vin) => retry.has(vin)),
      ...this.queue.filter((vin) => !retry.has(vin)),
    ];
  }

  peek(): readonly string[] {
    return this.queue;
  }
}

export interface VehicleSweepOptions {
  intervalMs: number;
  backlog: VinBacklog;
  batchLimit: number;
  decoder: VinDecoder;
  source: VehicleSafetySource;
  poll: PollSettings;
  sink: RecordSink;
  cache: SignalCache;
}

export class VehicleSweepJob extends SingleFlightJob {
  readonly name = "vehicle-sweep";

  constructor(private readonly options: VehicleSweepOptions) {
    super(options.intervalMs);
  }

  protected async execute(signal: AbortSignal): Promise<JobReport> {
    const { backlog, batchLimit, decoder, source, poll, sink, cache } = this.options;
    const batch = backlog.take(batchLimit);
    if (batch.length === 0) {
      console.log("[nhtsa] No VINs queued — nothing to rate");
      return { succeeded: 0, failed: 0, cancelled: false };
    }
    console.log(`[nhtsa] Rating ${batch.length} of ${backlog.size} queued VIN(s)`);

    const result = await runPoll(
      batch,
      (vin, callSignal) => rateVin(vin, decoder, source, callSignal),
      pollOptions(poll, signal, "vehicle safety"),
    );
    backlog.retryFirst(result.failed.map((f) => f.unit));
    cache.putVehicles(result.succeeded);
    await sink.writeVehicleRecords(result.succeeded);

    const tiers = { live: 0, default: 0, "error-fallback": 0 };
    for (const record of result.succeeded) tiers[record.source]++;
    console.log(
      `[nhtsa] ${tiers.live} live, ${tiers.default} default, ` +
        `${tiers["error-fallback"]} error-fallback, ${result.failed.length} failed`,
    );

    return {
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      cancelled: result.cancelled,
    };
  }
}

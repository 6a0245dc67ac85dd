/**
 * Traffic sweep: flow samples over every region's grid, then incidents
 * around each region center.
 */

import type { Coordinate, Incident } from "@roadrisk/types";
import {
  runPoll,
  sampleGrid,
  type IncidentSource,
  type RecordSink,
  type TrafficFlowSource,
} from "@roadrisk/ingestion";
import type { PollSettings, Region } from "../config.js";
import type { JobReport } from "../scheduler/job.js";
import type { SignalCache } from "../signal-cache.js";
import { pollOptions } from "./poll-options.js";
import { SingleFlightJob } from "./single-flight.js";

export interface TrafficSweepOptions {
  intervalMs: number;
  flow: TrafficFlowSource;
  incidents: IncidentSource;
  regions: readonly Region[];
  grid: { density: number; radiusKm: number; incidentRadiusKm: number };
  poll: PollSettings;
  sink: RecordSink;
  cache: SignalCache;
}

interface GridUnit {
  region: string;
  coordinate: Coordinate;
}

function fmtCoord(c: Coordinate): string {
  return `${c.lat.toFixed(4)},${c.lng.toFixed(4)}`;
}

export class TrafficSweepJob extends SingleFlightJob {
  readonly name = "traffic-sweep";

  constructor(private readonly options: TrafficSweepOptions) {
    super(options.intervalMs);
  }

  /** Every grid point of every region, region by region */
  gridUnits(): GridUnit[] {
    const { regions, grid } = this.options;
    return regions.flatMap((region) =>
      sampleGrid(region.center, grid.radiusKm, grid.density).map((coordinate) => ({
        region: region.name,
        coordinate,
      })),
    );
  }

  protected async execute(signal: AbortSignal): Promise<JobReport> {
    const { flow, incidents, regions, grid, poll, sink, cache } = this.options;
    const units = this.gridUnits();
    console.log(`[traffic] Sweeping ${units.length} grid points across ${regions.length} region(s)`);

    const samples = await runPoll(
      units,
      (unit, callSignal) => flow.fetch(unit.coordinate, callSignal),
      pollOptions(poll, signal, "traffic flow", (unit: GridUnit) =>
        `${unit.region} ${fmtCoord(unit.coordinate)}`,
      ),
    );
    cache.putTraffic(samples.succeeded);
    await sink.writeTrafficSamples(samples.succeeded);

    const fallbackCount = samples.succeeded.filter((s) => s.source === "fallback").length;
    console.log(
      `[traffic] ${samples.succeeded.length} samples (${fallbackCount} fallback), ` +
        `${samples.failed.length} failed`,
    );

    if (signal.aborted) {
      return {
        succeeded: samples.succeeded.length,
        failed: samples.failed.length,
        cancelled: true,
      };
    }

    const found = await runPoll(
      regions,
      (region, callSignal) => incidents.fetch(region.center, grid.incidentRadiusKm, callSignal),
      pollOptions(poll, signal, "incidents", (region: Region) => region.name),
    );
    const all: Incident[] = found.succeeded.flat();
    await sink.writeIncidents(all);
    console.log(`[traffic] ${all.length} incident(s) near ${found.succeeded.length} region(s)`);

    return {
      succeeded: samples.succeeded.length + found.succeeded.length,
      failed: samples.failed.length + found.failed.length,
      cancelled: samples.cancelled || found.cancelled,
    };
  }
}

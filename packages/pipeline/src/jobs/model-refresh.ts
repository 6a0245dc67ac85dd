/**
 * Model refresh: re-score every known subject against the latest signals.
 */

import type { RecordSink } from "@roadrisk/ingestion";
import type { RiskFusionEngine } from "@roadrisk/risk";
import type { JobReport } from "../scheduler/job.js";
import type { SignalCache } from "../signal-cache.js";
import type { SubjectDirectory } from "../subjects.js";
import { scoreSubject } from "../risk-scoring.js";
import { SingleFlightJob } from "./single-flight.js";

export interface ModelRefreshOptions {
  intervalMs: number;
  directory: SubjectDirectory;
  engine: RiskFusionEngine;
  cache: SignalCache;
  sink: RecordSink;
  now?: () => Date;
}

export class ModelRefreshJob extends SingleFlightJob {
  readonly name = "model-refresh";

  constructor(private readonly options: ModelRefreshOptions) {
    super(options.intervalMs);
  }

  protected async execute(signal: AbortSignal): Promise<JobReport> {
    const { directory, engine, cache, sink } = this.options;
    const subjects = await directory.listSubjects();
    if (signal.aborted) {
      return { succeeded: 0, failed: 0, cancelled: true };
    }

    const now = this.options.now?.() ?? new Date();
    const scores = subjects.map((subject) => scoreSubject(engine, cache, subject, now));
    await sink.writeRiskScores(scores);

    const degraded = scores.filter(
      (s) => s.signals.traffic !== "live" || s.signals.vehicle !== "live",
    ).length;
    console.log(
      `[pipeline] Re-scored ${scores.length} subject(s), ${degraded} without a full set of live signals`,
    );
    return { succeeded: scores.length, failed: 0, cancelled: false };
  }
}

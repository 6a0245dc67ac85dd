/**
 * Full pipeline: run a fixed sequence of jobs, one after another.
 *
 * A failing step does not stop the later ones; the run then fails with every
 * step's error. Cancellation stops the sequence between steps.
 */

import { errorMessage } from "@roadrisk/ingestion";
import type { Job, JobReport } from "../scheduler/job.js";
import { SingleFlightJob } from "./single-flight.js";

export class FullPipelineJob extends SingleFlightJob {
  readonly name = "full-pipeline";

  constructor(
    intervalMs: number,
    private readonly steps: readonly Job[],
  ) {
    super(intervalMs);
  }

  protected async execute(signal: AbortSignal): Promise<JobReport> {
    const total: JobReport = { succeeded: 0, failed: 0, cancelled: false };
    const errors: string[] = [];

    for (const step of this.steps) {
      if (signal.aborted) {
        total.cancelled = true;
        break;
      }
      try {
        const report = await step.run(signal);
        total.succeeded += report.succeeded;
        total.failed += report.failed;
        total.cancelled = total.cancelled || report.cancelled;
      } catch (err) {
        errors.push(`${step.name}: ${errorMessage(err)}`);
      }
    }

    if (errors.length > 0) {
      throw new Error(errors.join("; "));
    }
    return total;
  }
}

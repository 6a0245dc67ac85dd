import type { Job, JobReport } from "../scheduler/job.js";

/**
 * A job that is never executed twice at once. The composite job calls the
 * same job objects the scheduler runs on their own cadence; a second caller
 * joins the run already in progress instead of starting another sweep.
 */
export abstract class SingleFlightJob implements Job {
  abstract readonly name: string;
  private current?: Promise<JobReport>;

  constructor(readonly intervalMs: number) {}

  run(signal: AbortSignal): Promise<JobReport> {
    if (this.current) {
      console.log(`[pipeline] ${this.name} already running — joining the current run`);
      return this.current;
    }
    const current = this.execute(signal).finally(() => {
      this.current = undefined;
    });
    this.current = current;
    return current;
  }

  protected abstract execute(signal: AbortSignal): Promise<JobReport>;
}

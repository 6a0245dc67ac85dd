/** What one run of a job did */
export interface JobReport {
  succeeded: number;
  failed: number;
  /** The run stopped early because the scheduler is shutting down */
  cancelled: boolean;
}

/**
 * A periodic unit of work. `run` should stop issuing new work once `signal`
 * aborts and still flush what it has collected. A rejection marks the tick
 * failed; the next tick runs normally.
 */
export interface Job {
  readonly name: string;
  readonly intervalMs: number;
  run(signal: AbortSignal): Promise<JobReport>;
}

/** A job that could not be built from the configuration */
export interface DisabledJob {
  name: string;
  reason: string;
}

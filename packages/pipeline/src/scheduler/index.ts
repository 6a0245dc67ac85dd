export type { Job, JobReport, DisabledJob } from "./job.js";
export { JobScheduler, type JobState, type JobStatus, type JobSchedulerOptions } from "./scheduler.js";

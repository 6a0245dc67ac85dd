export { SingleFlightJob } from "./single-flight.js";
export { TrafficSweepJob, type TrafficSweepOptions } from "./traffic-sweep.js";
export { VehicleSweepJob, VinBacklog, type VehicleSweepOptions } from "./vehicle-sweep.js";
export { ModelRefreshJob, type ModelRefreshOptions } from "./model-refresh.js";
export { FullPipelineJob } from "./full-pipeline.js";

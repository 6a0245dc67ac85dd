export type { TrafficFlowSource, IncidentSource } from "./source.js";
export { congestionLevel, CONGESTION_BUCKETS, HEAVY_CONGESTION } from "./congestion.js";
export { liveSample, fallbackSample, FALLBACK_FLOW, type FlowReading } from "./samples.js";
export { TomTomFlowSource, type TomTomFlowSourceOptions } from "./tomtom-flow.js";
export { TomTomIncidentSource, type TomTomIncidentSourceOptions } from "./tomtom-incidents.js";

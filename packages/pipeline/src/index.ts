export * from "./config.js";
export * from "./signal-cache.js";
export * from "./subjects.js";
export { scoreSubject } from "./risk-scoring.js";
export * from "./scheduler/index.js";
export * from "./jobs/index.js";
export { Pipeline, type PipelineOverrides } from "./pipeline.js";

/**
 * @roadrisk/types
 *
 * Shared value types for the traffic/vehicle ingestion and risk fusion engine.
 *
 * - Geo: coordinates
 * - Traffic: flow samples and incidents
 * - Vehicle: crash-safety records
 * - Risk: behavioral inputs and fused scores
 * - Poll: sweep results
 */

export * from "./geo.js";
export * from "./traffic.js";
export * from "./vehicle.js";
export * from "./risk.js";
export * from "./poll.js";

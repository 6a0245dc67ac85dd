export type { VehicleSafetySource } from "./source.js";
export { NhtsaSafetySource, type NhtsaSafetySourceOptions } from "./nhtsa.js";
export { VinDecoder, isValidVin, rateVin } from "./vin.js";
export {
  PREMIUM_ADJUSTMENTS,
  DEFAULT_RATING,
  ERROR_FALLBACK_RATING,
  parseStarRating,
  premiumAdjustment,
  safetyScoreBoost,
  riskReduction,
  riskImpact,
  type VehicleRiskImpact,
} from "./ratings.js";
export { vehicleKey, defaultRecord, errorFallbackRecord } from "./records.js";

export { RiskFusionEngine, clamp01, type FuseOptions } from "./fusion.js";
export {
  DEFAULT_FUSION_POLICY,
  RISK_FACTORS,
  loadFusionPolicy,
  mergePolicy,
  parsePolicyOverrides,
  validatePolicy,
  type ConfidencePolicy,
  type FusionPolicy,
  type FusionPolicyOverrides,
} from "./fusion-policy.js";

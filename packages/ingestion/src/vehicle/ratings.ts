/**
 * Star-rating lookups.
 */

import { isStarRating, type StarRating } from "@roadrisk/types";

/** Premium adjustment per overall star rating (negative = discount) */
export const PREMIUM_ADJUSTMENTS: Readonly<Record<StarRating, number>> = {
  5: -0.15,
  4: -0.08,
  3: 0.0,
  2: 0.05,
  1: 0.1,
};

/** Rating assumed when the lookup succeeded but returned no rating data */
export const DEFAULT_RATING: StarRating = 4;
/** Rating assumed when the lookup itself failed */
export const ERROR_FALLBACK_RATING: StarRating = 3;

/**
 * Parse an upstream rating ("5", 4, "Not Rated") into a star rating.
 * Anything that is not an integer 1-5 is absent.
 */
export function parseStarRating(value: unknown): StarRating | null {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return isStarRating(n) ? n : null;
}

/** 0 for unset or out-of-range ratings */
export function premiumAdjustment(rating: number | null | undefined): number {
  return isStarRating(rating) ? PREMIUM_ADJUSTMENTS[rating] : 0;
}

/** Safety-score points gained above a 3-star rating (0-20) */
export function safetyScoreBoost(rating: number | null | undefined): number {
  return isStarRating(rating) ? Math.max(0, (rating - 3) * 10) : 0;
}

/** Fractional risk reduction above a 3-star rating (0-0.10) */
export function riskReduction(rating: number | null | undefined): number {
  return isStarRating(rating) ? Math.max(0, (rating - 3) * 0.05) : 0;
}

export interface VehicleRiskImpact {
  premiumAdjustment: number;
  safetyScoreBoost: number;
  riskReduction: number;
}

export function riskImpact(rating: number | null | undefined): VehicleRiskImpact {
  return {
    premiumAdjustment: premiumAdjustment(rating),
    safetyScoreBoost: safetyScoreBoost(rating),
    riskReduction: riskReduction(rating),
  };
}

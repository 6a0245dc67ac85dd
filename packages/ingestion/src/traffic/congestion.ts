/**
 * Speed-ratio → congestion level.
 *
 * A fixed four-bucket step function of current/free-flow speed. Downstream
 * weighting depends on these exact values, so it is not interpolated.
 */

/** Lower bound of each ratio bucket and the congestion level it maps to */
export const CONGESTION_BUCKETS: readonly { minRatio: number; level: number }[] = [
  { minRatio: 0.85, level: 0.0 }, // free flow
  { minRatio: 0.65, level: 0.3 }, // light
  { minRatio: 0.45, level: 0.6 }, // moderate
];

/** Level for ratios below every bucket */
export const HEAVY_CONGESTION = 1.0;

export function congestionLevel(currentSpeed: number, freeFlowSpeed: number): number {
  if (!(freeFlowSpeed > 0)) return 0;

  const ratio = currentSpeed / freeFlowSpeed;
  for (const bucket of CONGESTION_BUCKETS) {
    if (ratio >= bucket.minRatio) return bucket.level;
  }
  return HEAVY_CONGESTION;
}

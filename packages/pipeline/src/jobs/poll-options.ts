import type { PollOptions } from "@roadrisk/ingestion";
import type { PollSettings } from "../config.js";

/**
 * Poll options for a sweep whose calls go through gated upstream clients:
 * spacing is enforced per request by the clients, so the poller adds none.
 */
export function pollOptions<U>(
  settings: PollSettings,
  signal: AbortSignal,
  label: string,
  describeUnit?: (unit: U) => string,
): PollOptions<U> {
  return {
    batchSize: settings.batchSize,
    batchCooldownMs: settings.batchCooldownMs,
    concurrency: settings.concurrency,
    timeoutMs: settings.callTimeoutMs,
    signal,
    label,
    describeUnit,
  };
}

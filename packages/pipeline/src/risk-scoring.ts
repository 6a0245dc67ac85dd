import type { RiskScore } from "@roadrisk/types";
import type { RiskFusionEngine } from "@roadrisk/risk";
import type { SignalCache } from "./signal-cache.js";
import type { Subject } from "./subjects.js";

/** Fuse a subject's behavioral factors with the latest cached signals */
export function scoreSubject(
  engine: RiskFusionEngine,
  cache: SignalCache,
  subject: Subject,
  now: Date = new Date(),
): RiskScore {
  const traffic = subject.coordinate ? cache.nearestTraffic(subject.coordinate) : undefined;
  const vehicle = subject.vehicle ? cache.vehicle(subject.vehicle) : undefined;
  return engine.fuse(subject.behavioral, traffic, vehicle, { subjectId: subject.id, now });
}

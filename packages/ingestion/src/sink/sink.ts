import type { Incident, RiskScore, TrafficSample, VehicleSafetyRecord } from "@roadrisk/types";
import type { RecordKind } from "../errors.js";

/**
 * Append-only destination for collected records. A failed write rejects
 * with `SinkError`.
 */
export interface RecordSink {
  readonly name: string;
  writeTrafficSamples(samples: readonly TrafficSample[]): Promise<void>;
  writeIncidents(incidents: readonly Incident[]): Promise<void>;
  writeVehicleRecords(records: readonly VehicleSafetyRecord[]): Promise<void>;
  writeRiskScores(scores: readonly RiskScore[]): Promise<void>;
  /** Stored records of one kind */
  count(kind: RecordKind): Promise<number>;
  close(): Promise<void>;
}

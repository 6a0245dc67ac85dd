import type { Incident, RiskScore, TrafficSample, VehicleSafetyRecord } from "@roadrisk/types";
import type { RecordKind } from "../errors.js";
import type { RecordSink } from "./sink.js";

/** In-process sink for tests and embedding */
export class MemoryRecordSink implements RecordSink {
  readonly name = "memory";
  readonly trafficSamples: TrafficSample[] = [];
  readonly incidents: Incident[] = [];
  readonly vehicleRecords: VehicleSafetyRecord[] = [];
  readonly riskScores: RiskScore[] = [];

  async writeTrafficSamples(samples: readonly TrafficSample[]): Promise<void> {
    this.trafficSamples.push(...samples);
  }

  async writeIncidents(incidents: readonly Incident[]): Promise<void> {
    this.incidents.push(...incidents);
  }

  async writeVehicleRecords(records: readonly VehicleSafetyRecord[]): Promise<void> {
    this.vehicleRecords.push(...records);
  }

  async writeRiskScores(scores: readonly RiskScore[]): Promise<void> {
    this.riskScores.push(...scores);
  }

  async count(kind: RecordKind): Promise<number> {
    switch (kind) {
      case "traffic":
        return this.trafficSamples.length;
      case "incident":
        return this.incidents.length;
      case "vehicle":
        return this.vehicleRecords.length;
      case "risk":
        return this.riskScores.length;
    }
  }

  async close(): Promise<void> {}
}

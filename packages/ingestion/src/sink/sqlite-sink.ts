/**
 * SQLite record sink.
 *
 * One table per record kind, keyed by the record id. Each batch is written in
 * a single transaction; a record whose id is already stored is skipped.
 */

import Database from "better-sqlite3";
import type { Incident, RiskScore, TrafficSample, VehicleSafetyRecord } from "@roadrisk/types";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { SinkError, errorMessage, type RecordKind } from "../errors.js";
import type { RecordSink } from "./sink.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS traffic_samples (
    id TEXT PRIMARY KEY,
    lat REAL NOT NULL,
    lng REAL NOT NULL,
    current_speed REAL NOT NULL,
    free_flow_speed REAL NOT NULL,
    congestion_level REAL NOT NULL,
    road_closed INTEGER NOT NULL,
    confidence REAL NOT NULL,
    source TEXT NOT NULL,
    collected_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS incidents (
    id TEXT PRIMARY KEY,
    category TEXT NOT NULL,
    description TEXT NOT NULL,
    severity REAL NOT NULL,
    lat REAL NOT NULL,
    lng REAL NOT NULL,
    delay_seconds REAL NOT NULL,
    road TEXT,
    collected_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS vehicle_safety (
    id TEXT PRIMARY KEY,
    make TEXT NOT NULL,
    model TEXT NOT NULL,
    year INTEGER NOT NULL,
    vin TEXT,
    overall_rating INTEGER,
    rollover_rating INTEGER,
    frontal_crash_rating INTEGER,
    side_crash_rating INTEGER,
    recall_count INTEGER NOT NULL,
    source TEXT NOT NULL,
    upstream_vehicle_id INTEGER,
    description TEXT,
    error TEXT,
    collected_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS risk_scores (
    subject_id TEXT NOT NULL,
    computed_at TEXT NOT NULL,
    overall REAL NOT NULL,
    confidence REAL NOT NULL,
    factor_breakdown TEXT NOT NULL,
    components TEXT NOT NULL,
    traffic_signal TEXT NOT NULL,
    vehicle_signal TEXT NOT NULL,
    traffic_sample_id TEXT,
    vehicle_record_id TEXT,
    PRIMARY KEY (subject_id, computed_at)
  );
`;

const TABLES: Record<RecordKind, string> = {
  traffic: "traffic_samples",
  incident: "incidents",
  vehicle: "vehicle_safety",
  risk: "risk_scores",
};

export class SqliteRecordSink implements RecordSink {
  readonly name: string;
  private readonly db: Database.Database;

  /** @param filePath - Database file, or ":memory:" */
  constructor(filePath: string) {
    this.name = `sqlite:${filePath}`;
    if (filePath !== ":memory:") {
      mkdirSync(dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  async writeTrafficSamples(samples: readonly TrafficSample[]): Promise<void> {
    this.insert(
      "traffic",
      `INSERT OR IGNORE INTO traffic_samples VALUES
        (@id, @lat, @lng, @currentSpeed, @freeFlowSpeed, @congestionLevel,
         @roadClosed, @confidence, @source, @collectedAt)`,
      samples.map((s) => ({
        id: s.id,
        lat: s.coordinate.lat,
        lng: s.coordinate.lng,
        currentSpeed: s.currentSpeed,
        freeFlowSpeed: s.freeFlowSpeed,
        congestionLevel: s.congestionLevel,
        roadClosed: s.roadClosed ? 1 : 0,
        confidence: s.confidence,
        source: s.source,
        collectedAt: s.collectedAt.toISOString(),
      })),
    );
  }

  async writeIncidents(incidents: readonly Incident[]): Promise<void> {
    this.insert(
      "incident",
      `INSERT OR IGNORE INTO incidents VALUES
        (@id, @category, @description, @severity, @lat, @lng, @delaySeconds,
         @road, @collectedAt)`,
      incidents.map((i) => ({
        id: i.id,
        category: i.category,
        description: i.description,
        severity: i.severity,
        lat: i.coordinate.lat,
        lng: i.coordinate.lng,
        delaySeconds: i.delaySeconds,
        road: i.road ?? null,
        collectedAt: i.collectedAt.toISOString(),
      })),
    );
  }

  async writeVehicleRecords(records: readonly VehicleSafetyRecord[]): Promise<void> {
    this.insert(
      "vehicle",
      `INSERT OR IGNORE INTO vehicle_safety VALUES
        (@id, @make, @model, @year, @vin, @overallRating, @rolloverRating,
         @frontalCrashRating, @sideCrashRating, @recallCount, @source,
         @upstreamVehicleId, @description, @error, @collectedAt)`,
      records.map((r) => ({
        id: r.id,
        make: r.make,
        model: r.model,
        year: r.year,
        vin: r.vin ?? null,
        overallRating: r.overallRating,
        rolloverRating: r.rolloverRating,
        frontalCrashRating: r.frontalCrashRating,
        sideCrashRating: r.sideCrashRating,
        recallCount: r.recallCount,
        source: r.source,
        upstreamVehicleId: r.upstreamVehicleId ?? null,
        description: r.description ?? null,
        error: r.error ?? null,
        collectedAt: r.collectedAt.toISOString(),
      })),
    );
  }

  async writeRiskScores(scores: readonly RiskScore[]): Promise<void> {
    this.insert(
      "risk",
      `INSERT OR IGNORE INTO risk_scores VALUES
        (@subjectId, @computedAt, @overall, @confidence, @factorBreakdown,
         @components, @trafficSignal, @vehicleSignal, @trafficSampleId,
         @vehicleRecordId)`,
      scores.map((s) => ({
        subjectId: s.subjectId,
        computedAt: s.computedAt.toISOString(),
        overall: s.overall,
        confidence: s.confidence,
        factorBreakdown: JSON.stringify(s.factorBreakdown),
        components: JSON.stringify(s.components),
        trafficSignal: s.signals.traffic,
        vehicleSignal: s.signals.vehicle,
        trafficSampleId: s.inputsUsed.trafficSampleId ?? null,
        vehicleRecordId: s.inputsUsed.vehicleRecordId ?? null,
      })),
    );
  }

  async count(kind: RecordKind): Promise<number> {
    const row: unknown = this.db.prepare(`SELECT COUNT(*) AS n FROM ${TABLES[kind]}`).get();
    return typeof row === "object" && row !== null && "n" in row && typeof row.n === "number"
      ? row.n
      : 0;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private insert(kind: RecordKind, sql: string, rows: readonly Record<string, unknown>[]): void {
    if (rows.length === 0) return;
    try {
      const stmt = this.db.prepare(sql);
      const writeAll = this.db.transaction((batch: readonly Record<string, unknown>[]) => {
        for (const row of batch) stmt.run(row);
      });
      writeAll(rows);
      console.log(`[sink] Wrote ${rows.length} ${TABLES[kind]} row(s)`);
    } catch (err) {
      throw new SinkError(
        `Failed to write ${rows.length} ${kind} record(s): ${errorMessage(err)}`,
        kind,
        { cause: err },
      );
    }
  }
}

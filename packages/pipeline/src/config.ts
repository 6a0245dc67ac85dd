/**
 * Process configuration from environment variables.
 *
 * Every setting has a default; an invalid value raises `ConfigError` naming
 * the variable. A missing TomTom key is not an error here: the pipeline
 * disables only the jobs that need it.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Coordinate } from "@roadrisk/types";
import { assertCoordinate, errorMessage, isValidVin } from "@roadrisk/ingestion";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly key: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface PollSettings {
  minSpacingMs: number;
  batchSize: number;
  batchCooldownMs: number;
  concurrency: number;
  callTimeoutMs: number;
}

export interface JobIntervals {
  trafficSweepMs: number;
  vehicleSweepMs: number;
  modelRefreshMs: number;
  fullPipelineMs: number;
}

export interface Region {
  name: string;
  center: Coordinate;
}

export interface PipelineConfig {
  tomtom: { apiKey?: string; baseUrl: string };
  nhtsa: { ratingsUrl: string; vpicUrl: string };
  poll: PollSettings;
  intervals: JobIntervals;
  grid: { density: number; radiusKm: number; incidentRadiusKm: number };
  vehicles: { vins: string[]; batchLimit: number };
  fusionPolicyFile?: string;
  subjectsFile?: string;
  /** Sweep regions; `configs/regions.json` when unset */
  regionsFile?: string;
  /** SQLite file, or ":memory:" */
  sinkPath: string;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function stringVar(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function intVar(env: Env, key: string, fallback: number, min = 0): number {
  const raw = stringVar(env, key);
  if (raw === undefined) return fallback;
  const value = /^-?\d+$/.test(raw) ? parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`, key);
  }
  return value;
}

function positiveNumberVar(env: Env, key: string, fallback: number): number {
  const raw = stringVar(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive number, got "${raw}"`, key);
  }
  return value;
}

function vinListVar(env: Env, key: string): string[] {
  const raw = stringVar(env, key);
  if (raw === undefined) return [];
  const vins = raw
    .split(",")
    .map((vin) => vin.trim().toUpperCase())
    .filter((vin) => vin !== "");
  const invalid = vins.filter((vin) => !isValidVin(vin));
  if (invalid.length > 0) {
    throw new ConfigError(`${key} contains malformed VINs: ${invalid.join(", ")}`, key);
  }
  return [...new Set(vins)];
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

export function defaultSinkPath(): string {
  return join(homedir(), ".roadrisk", "records.sqlite");
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const config: PipelineConfig = {
    tomtom: {
      apiKey: stringVar(env, "TOMTOM_API_KEY"),
      baseUrl: stringVar(env, "TOMTOM_BASE_URL") ?? "https://api.tomtom.com",
    },
    nhtsa: {
      ratingsUrl: stringVar(env, "NHTSA_RATINGS_URL") ?? "https://api.nhtsa.gov",
      vpicUrl: stringVar(env, "NHTSA_VPIC_URL") ?? "https://vpic.nhtsa.dot.gov/api/vehicles",
    },
    poll: {
      minSpacingMs: intVar(env, "POLL_MIN_SPACING_MS", 1000),
      batchSize: intVar(env, "POLL_BATCH_SIZE", 100, 1),
      batchCooldownMs: intVar(env, "POLL_BATCH_COOLDOWN_MS", 5000),
      concurrency: intVar(env, "POLL_CONCURRENCY", 4, 1),
      callTimeoutMs: intVar(env, "POLL_CALL_TIMEOUT_MS", 15_000, 1),
    },
    intervals: {
      trafficSweepMs: intVar(env, "TRAFFIC_SWEEP_INTERVAL_MS", 15 * 60_000, 1),
      vehicleSweepMs: intVar(env, "VEHICLE_SWEEP_INTERVAL_MS", 6 * 60 * 60_000, 1),
      modelRefreshMs: intVar(env, "MODEL_REFRESH_INTERVAL_MS", 60 * 60_000, 1),
      fullPipelineMs: intVar(env, "FULL_PIPELINE_INTERVAL_MS", 30 * 60_000, 1),
    },
    grid: {
      density: intVar(env, "GRID_DENSITY", 5),
      radiusKm: positiveNumberVar(env, "GRID_RADIUS_KM", 25),
      incidentRadiusKm: positiveNumberVar(env, "INCIDENT_RADIUS_KM", 10),
    },
    vehicles: {
      vins: vinListVar(env, "VEHICLE_VINS"),
      batchLimit: intVar(env, "VEHICLE_BATCH_LIMIT", 10, 1),
    },
    fusionPolicyFile: stringVar(env, "FUSION_POLICY_FILE"),
    subjectsFile: stringVar(env, "SUBJECTS_FILE"),
    regionsFile: stringVar(env, "REGIONS_FILE"),
    sinkPath: stringVar(env, "SINK_PATH") ?? defaultSinkPath(),
  };
  if (!config.tomtom.apiKey) {
    console.warn("[config] TOMTOM_API_KEY is not set — traffic jobs will be disabled");
  }
  return config;
}

// ---------------------------------------------------------------------------
// Regions
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/`.
 * Works from both source (packages/pipeline/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs");
    if (existsSync(join(candidate, "regions.json"))) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new ConfigError("Could not locate configs/regions.json", "regions");
}

/** Sweep regions: named centers the traffic grid is laid around */
export function loadRegions(filePath = join(findConfigsRoot(), "regions.json")): Region[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Could not read regions from ${filePath}: ${errorMessage(err)}`,
      "regions",
    );
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`${filePath} must contain an array of regions`, "regions");
  }
  return raw.map((entry: unknown, i): Region => {
    if (
      typeof entry !== "object" ||
      entry === null ||
      !("name" in entry) ||
      !("lat" in entry) ||
      !("lng" in entry) ||
      typeof entry.name !== "string" ||
      typeof entry.lat !== "number" ||
      typeof entry.lng !== "number"
    ) {
      throw new ConfigError(`Region ${i} in ${filePath} needs a name, lat and lng`, "regions");
    }
    const center = { lat: entry.lat, lng: entry.lng };
    try {
      assertCoordinate(center);
    } catch (err) {
      throw new ConfigError(`Region ${i} in ${filePath}: ${errorMessage(err)}`, "regions");
    }
    return { name: entry.name, center };
  });
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, findConfigsRoot, loadConfig, loadRegions } from "./config.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const TEST_VIN = "1HGBH41JXMN109186";

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── loadConfig ─────────────────────────────────────────────────────────────

describe("loadConfig", () => {
  it("applies the defaults", () => {
    const config = loadConfig({});

    expect(config.tomtom).toEqual({ apiKey: undefined, baseUrl: "https://api.tomtom.com" });
    expect(config.nhtsa).toEqual({
      ratingsUrl: "https://api.nhtsa.gov",
      vpicUrl: "https://vpic.nhtsa.dot.gov/api/vehicles",
    });
    expect(config.poll).toEqual({
      minSpacingMs: 1000,
      batchSize: 100,
      batchCooldownMs: 5000,
      concurrency: 4,
      callTimeoutMs: 15_000,
    });
    expect(config.intervals).toEqual({
      trafficSweepMs: 900_000,
      vehicleSweepMs: 21_600_000,
      modelRefreshMs: 3_600_000,
      fullPipelineMs: 1_800_000,
    });
    expect(config.grid).toEqual({ density: 5, radiusKm: 25, incidentRadiusKm: 10 });
    expect(config.vehicles).toEqual({ vins: [], batchLimit: 10 });
    expect(config.fusionPolicyFile).toBeUndefined();
    expect(config.sinkPath).toBe(join(homedir(), ".roadrisk", "records.sqlite"));
  });

  it("warns when the traffic key is missing", () => {
    loadConfig({});

    expect(console.warn).toHaveBeenCalledWith(
      "[config] TOMTOM_API_KEY is not set — traffic jobs will be disabled",
    );
  });

  it("reads overrides", () => {
    const config = loadConfig({
      TOMTOM_API_KEY: "test-key",
      POLL_MIN_SPACING_MS: "250",
      POLL_BATCH_SIZE: "20",
      GRID_DENSITY: "0",
      GRID_RADIUS_KM: "7.5",
      TRAFFIC_SWEEP_INTERVAL_MS: "60000",
      VEHICLE_VINS: ` ${TEST_VIN.toLowerCase()}, ${TEST_VIN},,WBANU53508CT05174 `,
      SINK_PATH: ":memory:",
      FUSION_POLICY_FILE: "/etc/roadrisk/policy.json",
    });

    expect(config.tomtom.apiKey).toBe("test-key");
    expect(config.poll.minSpacingMs).toBe(250);
    expect(config.poll.batchSize).toBe(20);
    expect(config.grid.density).toBe(0);
    expect(config.grid.radiusKm).toBe(7.5);
    expect(config.intervals.trafficSweepMs).toBe(60_000);
    expect(config.vehicles.vins).toEqual([TEST_VIN, "WBANU53508CT05174"]);
    expect(config.sinkPath).toBe(":memory:");
    expect(config.fusionPolicyFile).toBe("/etc/roadrisk/policy.json");
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ TOMTOM_API_KEY: "  ", POLL_BATCH_SIZE: "" });

    expect(config.tomtom.apiKey).toBeUndefined();
    expect(config.poll.batchSize).toBe(100);
  });

  it.each([
    ["POLL_BATCH_SIZE", "0", 'POLL_BATCH_SIZE must be an integer >= 1, got "0"'],
    ["POLL_MIN_SPACING_MS", "fast", 'POLL_MIN_SPACING_MS must be an integer >= 0, got "fast"'],
    ["GRID_DENSITY", "2.5", 'GRID_DENSITY must be an integer >= 0, got "2.5"'],
    ["GRID_DENSITY", "-1", 'GRID_DENSITY must be an integer >= 0, got "-1"'],
    ["GRID_RADIUS_KM", "0", 'GRID_RADIUS_KM must be a positive number, got "0"'],
    ["VEHICLE_VINS", "NOT-A-VIN", "VEHICLE_VINS contains malformed VINs: NOT-A-VIN"],
  ])("rejects %s=%s", (key, value, message) => {
    const err = configError(() => loadConfig({ [key]: value }));

    expect(err.key).toBe(key);
    expect(err.message).toBe(message);
  });
});

// ─── Regions ────────────────────────────────────────────────────────────────

describe("loadRegions", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "roadrisk-regions-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("finds the bundled regions file", () => {
    expect(findConfigsRoot().endsWith("configs")).toBe(true);

    const regions = loadRegions();

    expect(regions).toHaveLength(10);
    expect(regions[0]).toEqual({
      name: "San Francisco",
      center: { lat: 37.7749, lng: -122.4194 },
    });
  });

  it("rejects an entry without coordinates", () => {
    const filePath = join(testDir, "regions.json");
    writeFileSync(filePath, JSON.stringify([{ name: "Nowhere" }]), "utf-8");

    const err = configError(() => loadRegions(filePath));

    expect(err.key).toBe("regions");
    expect(err.message).toBe(`Region 0 in ${filePath} needs a name, lat and lng`);
  });

  it("rejects an out-of-range center", () => {
    const filePath = join(testDir, "regions.json");
    writeFileSync(filePath, JSON.stringify([{ name: "Off map", lat: 95, lng: 0 }]), "utf-8");

    const err = configError(() => loadRegions(filePath));

    expect(err.message).toBe(`Region 0 in ${filePath}: Invalid coordinate: 95,0`);
  });

  it("reports a missing or unparseable file as a configuration error", () => {
    const missing = join(testDir, "absent.json");
    const broken = join(testDir, "broken.json");
    writeFileSync(broken, "[{", "utf-8");

    expect(configError(() => loadRegions(missing)).message).toMatch(
      `Could not read regions from ${missing}: `,
    );
    expect(configError(() => loadRegions(broken)).key).toBe("regions");
  });
});

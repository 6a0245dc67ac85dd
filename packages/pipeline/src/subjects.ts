/**
 * Subjects whose risk is re-scored by the model refresh job.
 */

import { readFileSync } from "node:fs";
import {
  BEHAVIORAL_FACTORS,
  type BehavioralFactors,
  type Coordinate,
  type VehicleDescriptor,
} from "@roadrisk/types";

export interface Subject {
  id: string;
  behavioral: BehavioralFactors;
  /** Where the subject usually drives; matched to the nearest traffic sample */
  coordinate?: Coordinate;
  vehicle?: VehicleDescriptor;
}

export interface SubjectDirectory {
  listSubjects(): Promise<Subject[]>;
}

export class StaticSubjectDirectory implements SubjectDirectory {
  constructor(private readonly subjects: readonly Subject[] = []) {}

  async listSubjects(): Promise<Subject[]> {
    return [...this.subjects];
  }
}

// ---------------------------------------------------------------------------
// JSON file directory
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBehavioral(raw: unknown): BehavioralFactors {
  const factors: BehavioralFactors = {};
  if (!isObject(raw)) return factors;
  for (const factor of BEHAVIORAL_FACTORS) {
    const value = raw[factor];
    if (typeof value === "number") factors[factor] = value;
  }
  return factors;
}

function parseCoordinate(raw: unknown): Coordinate | undefined {
  if (!isObject(raw)) return undefined;
  const { lat, lng } = raw;
  return typeof lat === "number" && typeof lng === "number" ? { lat, lng } : undefined;
}

function parseVehicle(raw: unknown): VehicleDescriptor | undefined {
  if (!isObject(raw)) return undefined;
  const { year, make, model, vin } = raw;
  if (typeof year !== "number" || typeof make !== "string" || typeof model !== "string") {
    return undefined;
  }
  return typeof vin === "string" ? { year, make, model, vin } : { year, make, model };
}

/** Parse one subject entry; entries without an id are skipped */
export function parseSubject(raw: unknown): Subject | undefined {
  if (!isObject(raw)) return undefined;
  const id = raw["id"];
  if (typeof id !== "string" || id === "") return undefined;
  const coordinate = parseCoordinate(raw["coordinate"]);
  const vehicle = parseVehicle(raw["vehicle"]);
  return {
    id,
    behavioral: parseBehavioral(raw["behavioral"]),
    ...(coordinate ? { coordinate } : {}),
    ...(vehicle ? { vehicle } : {}),
  };
}

/**
 * Reads a JSON array of subjects on every call, so edits to the file are
 * picked up by the next refresh.
 */
export class JsonSubjectDirectory implements SubjectDirectory {
  constructor(private readonly filePath: string) {}

  async listSubjects(): Promise<Subject[]> {
    const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`${this.filePath} must contain an array of subjects`);
    }
    const subjects: Subject[] = [];
    for (const entry of raw) {
      const subject = parseSubject(entry);
      if (subject) subjects.push(subject);
      else console.warn(`[pipeline] Skipping malformed subject in ${this.filePath}`);
    }
    return subjects;
  }
}

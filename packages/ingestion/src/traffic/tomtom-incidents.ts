/**
 * TomTom Traffic Incidents source.
 *
 * Fetches incident features inside the bounding box of a disc and maps them
 * to `Incident` records. Failure is logged and reported as no incidents:
 * incidents are context for the sweep, not an input fusion depends on.
 */

import type { Coordinate, Incident, IncidentCategory } from "@roadrisk/types";
import { errorMessage } from "../errors.js";
import { bboxFromCenter } from "../grid/index.js";
import { recordId } from "../ids.js";
import {
  isRecord,
  numberField,
  recordList,
  stringField,
  type JsonRecord,
} from "../http/json.js";
import type { UpstreamClient } from "../http/upstream-client.js";
import type { IncidentSource } from "./source.js";

/** TomTom iconCategory codes */
const ICON_CATEGORIES: Record<number, IncidentCategory> = {
  0: "unknown",
  1: "accident",
  2: "fog",
  3: "dangerous-conditions",
  4: "rain",
  5: "ice",
  6: "jam",
  7: "lane-closed",
  8: "road-closed",
  9: "road-works",
  10: "wind",
  11: "flooding",
  14: "broken-down-vehicle",
};

const INCIDENT_FIELDS =
  "{incidents{type,geometry{type,coordinates},properties{id,iconCategory,magnitudeOfDelay,events{description},delay,roadNumbers}}}";

export interface TomTomIncidentSourceOptions {
  client: UpstreamClient;
  /** Response language (default: "en-US") */
  language?: string;
  now?: () => Date;
}

export class TomTomIncidentSource implements IncidentSource {
  readonly name = "TomTom Traffic Incidents";

  private readonly client: UpstreamClient;
  private readonly language: string;
  private readonly now: () => Date;

  constructor(options: TomTomIncidentSourceOptions) {
    this.client = options.client;
    this.language = options.language ?? "en-US";
    this.now = options.now ?? (() => new Date());
  }

  async fetch(
    coordinate: Coordinate,
    radiusKm: number,
    signal?: AbortSignal,
  ): Promise<Incident[]> {
    const bbox = bboxFromCenter(coordinate, radiusKm);
    try {
      const data = await this.client.get(
        "/traffic/services/5/incidentDetails",
        {
          bbox: `${bbox.minLng},${bbox.minLat},${bbox.maxLng},${bbox.maxLat}`,
          fields: INCIDENT_FIELDS,
          language: this.language,
        },
        signal,
      );
      if (!isRecord(data)) return [];

      const collectedAt = this.now();
      return recordList(data, "incidents").map((feature, index) =>
        toIncident(feature, index, coordinate, collectedAt),
      );
    } catch (err) {
      console.warn(
        `[traffic] Incident lookup failed at ${coordinate.lat},${coordinate.lng}: ${errorMessage(err)}`,
      );
      return [];
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toIncident(
  feature: JsonRecord,
  index: number,
  fallbackCoordinate: Coordinate,
  collectedAt: Date,
): Incident {
  const rawProps = feature["properties"];
  const props: JsonRecord = isRecord(rawProps) ? rawProps : {};
  const coordinate = featureCoordinate(feature) ?? fallbackCoordinate;
  const iconCategory = numberField(props, "iconCategory");
  const firstEvent = recordList(props, "events")[0];
  const roads = props["roadNumbers"];
  const firstRoad: unknown = Array.isArray(roads) ? roads[0] : undefined;
  const road = typeof firstRoad === "string" ? firstRoad : undefined;

  const category = (iconCategory !== undefined && ICON_CATEGORIES[iconCategory]) || "unknown";
  const description =
    (firstEvent && stringField(firstEvent, "description")) ?? "Traffic incident";

  const incident: Incident = {
    // Without an upstream id, the position in the response keeps ids apart
    id:
      stringField(props, "id") ??
      recordId(
        "inc",
        coordinate.lat,
        coordinate.lng,
        collectedAt.toISOString(),
        index,
        category,
        description,
      ),
    category,
    description,
    severity: Math.max(0, numberField(props, "magnitudeOfDelay") ?? 0),
    coordinate,
    delaySeconds: Math.max(0, numberField(props, "delay") ?? 0),
    collectedAt,
  };
  return road ? { ...incident, road } : incident;
}

/** Point geometry, or the first vertex of a line */
function featureCoordinate(feature: JsonRecord): Coordinate | undefined {
  const geometry = feature["geometry"];
  if (!isRecord(geometry)) return undefined;
  const coords = geometry["coordinates"];
  if (!Array.isArray(coords)) return undefined;

  const first: unknown = Array.isArray(coords[0]) ? coords[0] : coords;
  if (!Array.isArray(first)) return undefined;
  const [lng, lat]: unknown[] = first;
  if (typeof lat !== "number" || typeof lng !== "number") return undefined;
  return { lat, lng };
}

import * as turf from "@turf/turf";
import type {
  CompiledGeometry,
  GeoJSONPolygon,
  PolygonRings,
  Position,
  RawPolygon,
  Ring,
} from "../types/index.js";
import { InvalidGeometryError } from "../errors.js";

const MIN_RING_POSITIONS = 4;

// ============================================================
// Ring extraction (current and legacy encodings)
// ============================================================

/**
 * Normalizes one raw polygon into shell + holes.
 *
 * - `{ type: "Polygon", coordinates }` — GeoJSON rings of `[lng, lat, alt?]`
 * - `{ points }` — legacy single ring of `[lat, lng]`, no holes
 *
 * Only shape is checked here; ring sizes and coordinate ranges are validated
 * by `buildGeometry`.
 */
export function extractRings(raw: RawPolygon): PolygonRings {
  if ("coordinates" in raw) {
    const rings = raw.coordinates.map((ring) =>
      ring.map((values) => toPosition(values, "lngLat")),
    );
    const [shell, ...holes] = rings;
    if (shell === undefined) {
      throw new InvalidGeometryError("Polygon has no rings.");
    }
    return { shell, holes };
  }

  return {
    shell: raw.points.map((values) => toPosition(values, "latLng")),
    holes: [],
  };
}

/** Serializes rings back into the GeoJSON polygon form used for storage. */
export function toGeoJSONPolygon(rings: PolygonRings): GeoJSONPolygon {
  return {
    type: "Polygon",
    coordinates: [rings.shell, ...rings.holes].map((ring) =>
      ring.map(([lng, lat]) => [lng, lat]),
    ),
  };
}

/** Total number of positions across every ring, as stored. */
export function countPositions(polygon: GeoJSONPolygon): number {
  return polygon.coordinates.reduce((sum, ring) => sum + ring.length, 0);
}

// ============================================================
// Build
// ============================================================

/**
 * Validates the rings and compiles them into a multi-polygon.
 * Rings are closed here when the source did not repeat the first position.
 *
 * @throws InvalidGeometryError on an empty polygon list, a ring with fewer
 *   than 4 positions, or a coordinate outside lng [-180,180] / lat [-90,90].
 */
export function buildGeometry(polygons: PolygonRings[]): CompiledGeometry {
  if (polygons.length === 0) {
    throw new InvalidGeometryError("An area needs at least one polygon.");
  }

  const closed: PolygonRings[] = polygons.map((polygon, i) => ({
    shell: closeRing(validateRing(polygon.shell, `polygon ${i} shell`)),
    holes: polygon.holes.map((hole, j) =>
      closeRing(validateRing(hole, `polygon ${i} hole ${j}`)),
    ),
  }));

  const feature = turf.multiPolygon(
    closed.map((polygon) => [polygon.shell, ...polygon.holes]),
  );

  return Object.freeze({ polygons: Object.freeze(closed), feature });
}

/** Extracts rings from each raw polygon and builds the area's geometry. */
export function buildAreaGeometry(polygons: RawPolygon[]): CompiledGeometry {
  return buildGeometry(polygons.map(extractRings));
}

// ============================================================
// Helpers
// ============================================================

function toPosition(values: number[], order: "lngLat" | "latLng"): Position {
  const first = values[0];
  const second = values[1];
  if (first === undefined || second === undefined) {
    throw new InvalidGeometryError(
      `Position needs two values, got ${values.length}.`,
    );
  }
  return order === "lngLat" ? [first, second] : [second, first];
}

function validateRing(ring: Ring, label: string): Ring {
  if (ring.length < MIN_RING_POSITIONS) {
    throw new InvalidGeometryError(
      `Ring (${label}) has ${ring.length} positions; at least ${MIN_RING_POSITIONS} are required.`,
    );
  }
  for (const [lng, lat] of ring) {
    if (!Number.isFinite(lng) || lng < -180 || lng > 180) {
      throw new InvalidGeometryError(
        `Longitude ${lng} in ${label} is outside [-180, 180].`,
      );
    }
    if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
      throw new InvalidGeometryError(
        `Latitude ${lat} in ${label} is outside [-90, 90].`,
      );
    }
  }
  return ring;
}

function closeRing(ring: Ring): Ring {
  const copy: Ring = ring.map(([lng, lat]): Position => [lng, lat]);
  const first = copy[0];
  const last = copy[copy.length - 1];
  if (
    first !== undefined &&
    last !== undefined &&
    (first[0] !== last[0] || first[1] !== last[1])
  ) {
    copy.push([first[0], first[1]]);
  }
  return copy;
}

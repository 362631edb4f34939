import * as turf from "@turf/turf";
import type { CompiledGeometry, Point } from "../types/index.js";
import { haversineMeters, roundToCentimeters } from "./distance.js";

/**
 * True when the point is inside any constituent polygon or exactly on one of
 * its rings (shell or hole). Points inside a hole are outside.
 */
export function contains(geometry: CompiledGeometry, point: Point): boolean {
  return turf.booleanPointInPolygon([point.lng, point.lat], geometry.feature, {
    ignoreBoundary: false,
  });
}

/**
 * Closest point on the geometry's boundary, found by orthogonal projection
 * onto every ring segment in planar lng/lat space. On ties the first segment
 * visited wins (polygon order, shell before holes).
 *
 * turf's `nearestPointOnLine` projects along great circles, so the planar
 * projection is done here.
 */
export function nearestBoundaryPoint(
  geometry: CompiledGeometry,
  point: Point,
): Point {
  const segments: Array<[number[], number[]]> = [];
  turf.segmentEach(geometry.feature, (segment) => {
    if (segment === undefined) return;
    const [start, end] = segment.geometry.coordinates;
    if (start !== undefined && end !== undefined) {
      segments.push([start, end]);
    }
  });

  let best: Point | null = null;
  let bestDistSq = Infinity;
  for (const [start, end] of segments) {
    const candidate = projectOntoSegment(point, start, end);
    const dLng = candidate.lng - point.lng;
    const dLat = candidate.lat - point.lat;
    const distSq = dLng * dLng + dLat * dLat;
    if (distSq < bestDistSq) {
      bestDistSq = distSq;
      best = candidate;
    }
  }

  if (best === null) {
    // buildGeometry guarantees at least one ring of 4+ positions
    throw new Error("Geometry has no boundary segments.");
  }
  return best;
}

/**
 * Ground distance in meters from the point to the nearest boundary point,
 * rounded to centimeters. Callers report 0 for points where `contains` holds
 * instead of calling this.
 */
export function nearestBoundaryDistanceMeters(
  geometry: CompiledGeometry,
  point: Point,
): number {
  const nearest = nearestBoundaryPoint(geometry, point);
  return roundToCentimeters(haversineMeters(point, nearest));
}

function projectOntoSegment(
  point: Point,
  start: number[],
  end: number[],
): Point {
  const [ax = 0, ay = 0] = start;
  const [bx = 0, by = 0] = end;
  const dx = bx - ax;
  const dy = by - ay;
  const lengthSq = dx * dx + dy * dy;

  let t = 0;
  if (lengthSq > 0) {
    t = ((point.lng - ax) * dx + (point.lat - ay) * dy) / lengthSq;
    t = Math.max(0, Math.min(1, t));
  }
  return { lng: ax + t * dx, lat: ay + t * dy };
}

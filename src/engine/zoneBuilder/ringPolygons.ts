/**
 * Discretized ring outlines for map rendering. Not used for membership tests.
 */

import { WIND_THRESHOLDS } from "@/domain/storm/storm.schema";
import type { WindThreshold } from "@/domain/storm/storm.schema";
import type { ImpactZone, WindRing, ZoneCircle } from "@/domain/exposure/exposure.types";
import { destinationPoint } from "@/lib/geo";

export const DEFAULT_POLYGON_SEGMENTS = 64;

/** [longitude, latitude], GeoJSON order. */
export type Position = [number, number];

export type MultiPolygonGeometry = {
  type: "MultiPolygon";
  coordinates: Position[][][];
};

/** Closed geodesic circle outline: segments vertices plus the first vertex repeated. */
export function circleToPolygon(circle: ZoneCircle, segments = DEFAULT_POLYGON_SEGMENTS): Position[] {
  const n = Math.max(3, Math.floor(segments));
  const ring: Position[] = [];
  for (let i = 0; i < n; i++) {
    const p = destinationPoint(circle, (360 * i) / n, circle.radiusKm);
    ring.push([p.longitude, p.latitude]);
  }
  const first = ring[0];
  if (first) ring.push([first[0], first[1]]);
  return ring;
}

/** One polygon per member circle; overlapping polygons are left for the renderer to union. */
export function ringToMultiPolygon(ring: WindRing, segments = DEFAULT_POLYGON_SEGMENTS): MultiPolygonGeometry {
  return {
    type: "MultiPolygon",
    coordinates: ring.circles.map((c) => [circleToPolygon(c, segments)]),
  };
}

export function zoneRingPolygons(
  zone: ImpactZone,
  segments = DEFAULT_POLYGON_SEGMENTS
): Record<WindThreshold, MultiPolygonGeometry> {
  const out: Record<WindThreshold, MultiPolygonGeometry> = {
    34: { type: "MultiPolygon", coordinates: [] },
    50: { type: "MultiPolygon", coordinates: [] },
    64: { type: "MultiPolygon", coordinates: [] },
  };
  for (const kt of WIND_THRESHOLDS) out[kt] = ringToMultiPolygon(zone.rings[kt], segments);
  return out;
}

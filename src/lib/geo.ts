/**
 * Spherical-earth helpers (pure). Distances in km, angles in decimal degrees.
 */

export const EARTH_RADIUS_KM = 6371.0088;

export type LatLon = { latitude: number; longitude: number };

const toRad = (deg: number) => (deg * Math.PI) / 180;
const toDeg = (rad: number) => (rad * 180) / Math.PI;

/** Great-circle distance (haversine). */
export function haversineKm(a: LatLon, b: LatLon): number {
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  // clamp: rounding can push h just past 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Point reached from origin after travelling distanceKm on the given initial bearing (deg from north). */
export function destinationPoint(origin: LatLon, bearingDeg: number, distanceKm: number): LatLon {
  const delta = distanceKm / EARTH_RADIUS_KM;
  const theta = toRad(bearingDeg);
  const phi1 = toRad(origin.latitude);
  const lambda1 = toRad(origin.longitude);

  const sinPhi2 = Math.sin(phi1) * Math.cos(delta) + Math.cos(phi1) * Math.sin(delta) * Math.cos(theta);
  const phi2 = Math.asin(Math.max(-1, Math.min(1, sinPhi2)));
  const y = Math.sin(theta) * Math.sin(delta) * Math.cos(phi1);
  const x = Math.cos(delta) - Math.sin(phi1) * sinPhi2;
  const lambda2 = lambda1 + Math.atan2(y, x);

  return { latitude: toDeg(phi2), longitude: normalizeLongitude(toDeg(lambda2)) };
}

/** Wraps longitude into [-180, 180). */
export function normalizeLongitude(lon: number): number {
  const wrapped = ((((lon + 180) % 360) + 360) % 360) - 180;
  return Object.is(wrapped, -0) ? 0 : wrapped;
}

/** Spherical centroid (mean of unit vectors); falls back to the first point when they cancel out. */
export function centroid(points: readonly LatLon[]): LatLon | null {
  if (points.length === 0) return null;
  let x = 0;
  let y = 0;
  let z = 0;
  for (const p of points) {
    const phi = toRad(p.latitude);
    const lambda = toRad(p.longitude);
    x += Math.cos(phi) * Math.cos(lambda);
    y += Math.cos(phi) * Math.sin(lambda);
    z += Math.sin(phi);
  }
  const n = points.length;
  x /= n;
  y /= n;
  z /= n;
  const hyp = Math.sqrt(x * x + y * y);
  if (hyp < 1e-12 && Math.abs(z) < 1e-12) return points[0] ?? null;
  return { latitude: toDeg(Math.atan2(z, hyp)), longitude: toDeg(Math.atan2(y, x)) };
}

/** Mean great-circle distance of points from their centroid (0 for fewer than two points). */
export function meanSpreadKm(points: readonly LatLon[]): number {
  if (points.length < 2) return 0;
  const c = centroid(points);
  if (!c) return 0;
  const total = points.reduce((s, p) => s + haversineKm(c, p), 0);
  return total / points.length;
}

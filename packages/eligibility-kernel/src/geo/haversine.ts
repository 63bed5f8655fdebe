// Eligibility Kernel - Geospatial utility (v1)
//
// Great-circle distance on a spherical Earth. Pure, no state.

export type GeoPointV1 = {
  latitude: number;
  longitude: number;
};

export const EARTH_RADIUS_MILES = 3958.8;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Haversine distance between two points, in miles.
 */
export function haversineMilesV1(a: GeoPointV1, b: GeoPointV1): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_MILES * c;
}

/**
 * True when `point` lies within `radiusMiles` of `target` (boundary inclusive).
 */
export function isWithinRadiusV1(point: GeoPointV1, target: GeoPointV1, radiusMiles: number): boolean {
  return haversineMilesV1(point, target) <= radiusMiles;
}

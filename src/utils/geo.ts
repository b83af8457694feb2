import { GEO_CONSTANTS } from "./constants";

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function deg2rad(deg: number): number {
  return deg * (Math.PI / 180);
}

/**
 * Great-circle distance in kilometres between two points given in degrees,
 * on a spherical Earth, rounded to 2 decimals.
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = deg2rad(lat2 - lat1);
  const dLon = deg2rad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(deg2rad(lat1)) * Math.cos(deg2rad(lat2)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.asin(Math.sqrt(a));
  return roundTo(GEO_CONSTANTS.EARTH_RADIUS_KM * c, GEO_CONSTANTS.DISTANCE_DECIMALS);
}

/**
 * Geodesic distances and nearest-station lookup.
 */

import { PreconditionError } from './errors';

type LatLon = { lat: number; lon: number };

// WGS-84 ellipsoid
const WGS84_A = 6378137;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = (1 - WGS84_F) * WGS84_A;

const MEAN_EARTH_RADIUS_KM = 6371.0088;
const VINCENTY_MAX_ITERATIONS = 200;
const VINCENTY_TOLERANCE = 1e-12;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Great-circle distance on a sphere (Haversine), in km.
 */
export function haversineDistanceKm(from: LatLon, to: LatLon): number {
  const dLat = toRadians(to.lat - from.lat);
  const dLon = toRadians(to.lon - from.lon);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.lat)) * Math.cos(toRadians(to.lat)) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return MEAN_EARTH_RADIUS_KM * c;
}

/**
 * Surface distance on the WGS-84 ellipsoid (Vincenty inverse), in km.
 * Returns undefined when the iteration does not converge (nearly antipodal points).
 */
export function vincentyDistanceKm(from: LatLon, to: LatLon): number | undefined {
  const L = toRadians(to.lon - from.lon);
  const U1 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(from.lat)));
  const U2 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(to.lat)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  let sinSigma = 0;
  let cosSigma = 0;
  let sigma = 0;
  let cosSqAlpha = 0;
  let cos2SigmaM = 0;

  for (let i = 0; i < VINCENTY_MAX_ITERATIONS; i += 1) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const t1 = cosU2 * sinLambda;
    const t2 = cosU1 * sinU2 - sinU1 * cosU2 * cosLambda;
    sinSigma = Math.sqrt(t1 * t1 + t2 * t2);
    if (sinSigma === 0) return 0; // coincident points

    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // both points on the equator
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;

    const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) * WGS84_F * sinAlpha *
      (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    if (Math.abs(lambda - previous) < VINCENTY_TOLERANCE) {
      const uSq = (cosSqAlpha * (WGS84_A * WGS84_A - WGS84_B * WGS84_B)) / (WGS84_B * WGS84_B);
      const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
      const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
      const deltaSigma =
        B * sinSigma *
        (cos2SigmaM +
          (B / 4) *
            (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
              (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaM * cos2SigmaM)));
      return (WGS84_B * A * (sigma - deltaSigma)) / 1000;
    }
  }

  return undefined;
}

export function geodesicDistanceKm(from: LatLon, to: LatLon): number {
  return vincentyDistanceKm(from, to) ?? haversineDistanceKm(from, to);
}

export type ClosestMatch = {
  index: number;
  distanceKm: number;
};

const hasNumericLocation = (candidate: { lat: unknown; lon: unknown }): boolean =>
  typeof candidate.lat === 'number' &&
  Number.isFinite(candidate.lat) &&
  typeof candidate.lon === 'number' &&
  Number.isFinite(candidate.lon);

/**
 * Linear scan for the candidate closest to `origin`. On equal distances the
 * earliest candidate is kept.
 */
export function identifyClosestStation(origin: LatLon, candidates: ReadonlyArray<LatLon>): ClosestMatch {
  if (candidates.length === 0) {
    throw new PreconditionError('station list is empty');
  }

  candidates.forEach((candidate, index) => {
    if (!hasNumericLocation(candidate)) {
      throw new PreconditionError(`station at index ${index} has no numeric lat/lon`);
    }
  });

  let minIndex = -1;
  let minDistance = Number.POSITIVE_INFINITY;

  candidates.forEach((candidate, index) => {
    const distance = geodesicDistanceKm(origin, candidate);
    if (distance < minDistance) {
      minIndex = index;
      minDistance = distance;
    }
  });

  return { index: minIndex, distanceKm: minDistance };
}

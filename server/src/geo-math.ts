// ── Geographic math utilities ────────────────────────────────────────────────
//
// Ellipsoidal geodesics on WGS84 (Vincenty's inverse and direct solutions),
// with spherical helpers used when the inverse iteration cannot converge.

export const WGS84 = {
  /** Semi-major axis in meters. */
  a: 6_378_137,
  /** Flattening. */
  f: 1 / 298.257223563,
  /** Semi-minor axis in meters. */
  b: 6_378_137 * (1 - 1 / 298.257223563),
} as const;

/** Mean radius of the ellipsoid, (2a + b) / 3. */
const R = (2 * WGS84.a + WGS84.b) / 3;

/** Number of intermediate points sampled between two endpoints. */
export const DEFAULT_SAMPLE_COUNT = 1024;

const CONVERGENCE = 1e-12;
const MAX_ITERATIONS = 200;

const toRad = (d: number) => (d * Math.PI) / 180;
const toDeg = (r: number) => (r * 180) / Math.PI;

// ── Types ────────────────────────────────────────────────────────────────────

export interface LatLng {
  lat: number;
  lng: number;
}

export interface GeodesicInverse {
  /** Surface distance in meters. */
  distanceMeters: number;
  /** Forward azimuth at the start, degrees 0-360. */
  initialBearing: number;
  /** Direction of travel on arrival at the destination, degrees 0-360. */
  finalBearing: number;
  /** Bearing from the destination back toward the start, degrees 0-360. */
  backAzimuth: number;
  /** False when the iteration failed and the spherical solution was used. */
  converged: boolean;
}

export interface GeodesicDirect extends LatLng {
  /** Direction of travel at the reached point, degrees 0-360. */
  finalBearing: number;
}

// ── Normalization ────────────────────────────────────────────────────────────

/** Map any angle in degrees to [0, 360). */
export function normalizeBearing(deg: number): number {
  const b = ((deg % 360) + 360) % 360;
  // -1e-17 + 360 rounds to exactly 360
  return b === 360 ? 0 : b;
}

/** Map any longitude in degrees to (-180, 180]. */
export function normalizeLongitude(deg: number): number {
  const x = ((deg % 360) + 360) % 360;
  return x > 180 ? x - 360 : x;
}

// ── Spherical ────────────────────────────────────────────────────────────────

/** Haversine distance between two points in meters, on the mean-radius sphere. */
export function haversineDistance(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const dLat = toRad(lat2 - lat1);
  const dLng = toRad(lng2 - lng1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLng / 2) ** 2;
  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Great-circle forward azimuth (bearing) in degrees 0-360 from point 1 to point 2. */
export function computeBearing(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const dLng = toRad(lng2 - lng1);
  const y = Math.sin(dLng) * Math.cos(toRad(lat2));
  const x =
    Math.cos(toRad(lat1)) * Math.sin(toRad(lat2)) -
    Math.sin(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.cos(dLng);
  return normalizeBearing(toDeg(Math.atan2(y, x)));
}

function sphericalInverse(lat1: number, lng1: number, lat2: number, lng2: number): GeodesicInverse {
  const finalBearing = normalizeBearing(computeBearing(lat2, lng2, lat1, lng1) + 180);
  return {
    distanceMeters: haversineDistance(lat1, lng1, lat2, lng2),
    initialBearing: computeBearing(lat1, lng1, lat2, lng2),
    finalBearing,
    backAzimuth: normalizeBearing(finalBearing + 180),
    converged: false,
  };
}

// ── Ellipsoidal ──────────────────────────────────────────────────────────────

/** Vincenty's A and B series coefficients for a given cos²α. */
function seriesCoefficients(cosSqAlpha: number): { A: number; B: number } {
  const { a, b } = WGS84;
  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  return { A, B };
}

function deltaSigma(B: number, sinSigma: number, cosSigma: number, cos2SigmaM: number): number {
  const c2 = cos2SigmaM * cos2SigmaM;
  return (
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * c2) - (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * c2)))
  );
}

/**
 * Inverse geodesic problem on WGS84: distance and azimuths between two points.
 *
 * Coincident points give a zero distance and zero bearings. Nearly antipodal
 * points, where the iteration does not converge, get the great-circle answer
 * on the mean-radius sphere with `converged: false`. The result is always
 * finite for finite, in-range input.
 */
export function geodesicInverse(lat1: number, lng1: number, lat2: number, lng2: number): GeodesicInverse {
  const { f, b } = WGS84;
  const L = toRad(normalizeLongitude(lng2 - lng1));
  const tanU1 = (1 - f) * Math.tan(toRad(lat1));
  const tanU2 = (1 - f) * Math.tan(toRad(lat2));
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const cosU2 = 1 / Math.sqrt(1 + tanU2 * tanU2);
  const sinU1 = tanU1 * cosU1;
  const sinU2 = tanU2 * cosU2;

  let lambda = L;
  let sinLambda = 0;
  let cosLambda = 1;
  let sinSigma = 0;
  let cosSigma = 1;
  let sigma = 0;
  let cosSqAlpha = 1;
  let cos2SigmaM = 0;
  let converged = false;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    sinLambda = Math.sin(lambda);
    cosLambda = Math.cos(lambda);
    const t = cosU1 * sinU2 - sinU1 * cosU2 * cosLambda;
    const sinSqSigma = (cosU2 * sinLambda) ** 2 + t * t;
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;

    if (sinSqSigma < 1e-24 && cosSigma > 0) {
      return { distanceMeters: 0, initialBearing: 0, finalBearing: 0, backAzimuth: 0, converged: true };
    }

    sinSigma = Math.sqrt(sinSqSigma);
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // equatorial line: cosSqAlpha = 0
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) *
        f *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    if (!Number.isFinite(lambda) || Math.abs(lambda) > Math.PI) break;
    if (Math.abs(lambda - previous) <= CONVERGENCE) {
      converged = true;
      break;
    }
  }

  if (!converged) return sphericalInverse(lat1, lng1, lat2, lng2);

  const { A, B } = seriesCoefficients(cosSqAlpha);
  const distanceMeters = b * A * (sigma - deltaSigma(B, sinSigma, cosSigma, cos2SigmaM));
  const alpha1 = Math.atan2(cosU2 * sinLambda, cosU1 * sinU2 - sinU1 * cosU2 * cosLambda);
  const alpha2 = Math.atan2(cosU1 * sinLambda, -sinU1 * cosU2 + cosU1 * sinU2 * cosLambda);

  if (![distanceMeters, alpha1, alpha2].every(Number.isFinite)) {
    return sphericalInverse(lat1, lng1, lat2, lng2);
  }

  const finalBearing = normalizeBearing(toDeg(alpha2));
  return {
    distanceMeters,
    initialBearing: normalizeBearing(toDeg(alpha1)),
    finalBearing,
    backAzimuth: normalizeBearing(finalBearing + 180),
    converged: true,
  };
}

/** Direct geodesic problem on WGS84: the point reached from a start, bearing and distance. */
export function geodesicDirect(lat: number, lng: number, bearing: number, distanceMeters: number): GeodesicDirect {
  const { f, b } = WGS84;
  const alpha1 = toRad(bearing);
  const sinAlpha1 = Math.sin(alpha1);
  const cosAlpha1 = Math.cos(alpha1);

  const tanU1 = (1 - f) * Math.tan(toRad(lat));
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const sinU1 = tanU1 * cosU1;
  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const { A, B } = seriesCoefficients(cosSqAlpha);

  let sigma = distanceMeters / (b * A);
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const previous = sigma;
    sigma =
      distanceMeters / (b * A) + deltaSigma(B, Math.sin(sigma), Math.cos(sigma), Math.cos(2 * sigma1 + sigma));
    if (Math.abs(sigma - previous) <= CONVERGENCE) break;
  }
  const cos2SigmaM = Math.cos(2 * sigma1 + sigma);
  const sinSigma = Math.sin(sigma);
  const cosSigma = Math.cos(sigma);

  const x = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const phi2 = Math.atan2(sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1, (1 - f) * Math.sqrt(sinAlpha * sinAlpha + x * x));
  const lambda = Math.atan2(sinSigma * sinAlpha1, cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1);
  const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const L =
    lambda -
    (1 - C) * f * sinAlpha * (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

  return {
    lat: toDeg(phi2),
    lng: normalizeLongitude(lng + toDeg(L)),
    finalBearing: normalizeBearing(toDeg(Math.atan2(sinAlpha, -x))),
  };
}

/** Point reached on the mean-radius sphere from a start, great-circle bearing and distance. */
function sphericalDestination(lat: number, lng: number, bearing: number, distanceMeters: number): LatLng {
  const delta = distanceMeters / R;
  const theta = toRad(bearing);
  const phi1 = toRad(lat);
  const sinPhi2 = Math.sin(phi1) * Math.cos(delta) + Math.cos(phi1) * Math.sin(delta) * Math.cos(theta);
  const phi2 = Math.asin(Math.max(-1, Math.min(1, sinPhi2)));
  const dLng = Math.atan2(
    Math.sin(theta) * Math.sin(delta) * Math.cos(phi1),
    Math.cos(delta) - Math.sin(phi1) * sinPhi2,
  );
  return { lat: toDeg(phi2), lng: normalizeLongitude(lng + toDeg(dLng)) };
}

/**
 * Sample `count` evenly spaced points along an already solved inverse from
 * (lat, lng). A spherical fallback is followed on the sphere it was solved
 * on, so the samples still end at the destination.
 */
export function pointsAlongGeodesic(
  lat: number,
  lng: number,
  inverse: GeodesicInverse,
  count: number = DEFAULT_SAMPLE_COUNT,
): LatLng[] {
  const { distanceMeters, initialBearing, converged } = inverse;
  const step = distanceMeters / (count + 1);
  const points: LatLng[] = [];
  for (let i = 1; i <= count; i++) {
    if (!converged) {
      points.push(sphericalDestination(lat, lng, initialBearing, step * i));
      continue;
    }
    const p = geodesicDirect(lat, lng, initialBearing, step * i);
    points.push({ lat: p.lat, lng: p.lng });
  }
  return points;
}

/**
 * Points strictly between two endpoints along the geodesic, evenly spaced by
 * distance. The endpoints themselves are not included.
 */
export function geodesicIntermediatePoints(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number,
  count: number = DEFAULT_SAMPLE_COUNT,
): LatLng[] {
  return pointsAlongGeodesic(lat1, lng1, geodesicInverse(lat1, lng1, lat2, lng2), count);
}

import {
  EARTH_FLATTENING,
  EARTH_MEAN_RADIUS_M,
  EARTH_SEMI_MAJOR_AXIS_M,
  EARTH_SEMI_MINOR_AXIS_M,
  GEODESIC_MAX_ITERATIONS,
  GEODESIC_TOLERANCE_RAD,
} from '../constants/geo.constants';
import {
  GeodesicNonConvergenceError,
  InvalidGeometryInputError,
} from '../errors/geo.errors';

export interface GeoPoint {
  lat: number;
  lon: number;
}

const toRadians = (degrees: number): number => degrees * (Math.PI / 180);
const toDegrees = (radians: number): number => radians * (180 / Math.PI);

/**
 * Project a WGS84 point along a geodesic (Vincenty's direct formula).
 *
 * A zero distance returns the origin untouched. The series is iterated until
 * sigma moves by less than 1e-12 rad; if that has not happened after
 * `maxIterations` the projection is abandoned with
 * {@link GeodesicNonConvergenceError} rather than returning a half-converged
 * point.
 *
 * @param lat - Origin latitude in degrees
 * @param lon - Origin longitude in degrees
 * @param bearingDeg - Initial azimuth, clockwise from north
 * @param distanceM - Distance along the ellipsoid in meters
 * @returns Destination with longitude in [-180, 180)
 */
export function projectGeodesic(
  lat: number,
  lon: number,
  bearingDeg: number,
  distanceM: number,
  maxIterations: number = GEODESIC_MAX_ITERATIONS,
): GeoPoint {
  if (![lat, lon, bearingDeg].every(Number.isFinite)) {
    throw new InvalidGeometryInputError(
      `Projection origin and bearing must be finite (got ${lat}, ${lon}, ${bearingDeg})`,
    );
  }

  if (!Number.isFinite(distanceM) || distanceM < 0) {
    throw new InvalidGeometryInputError(
      `Projection distance must be a finite, non-negative number (got ${distanceM})`,
    );
  }

  if (distanceM === 0) {
    return { lat, lon };
  }

  const a = EARTH_SEMI_MAJOR_AXIS_M;
  const b = EARTH_SEMI_MINOR_AXIS_M;
  const f = EARTH_FLATTENING;

  const alpha1 = toRadians(bearingDeg);
  const sinAlpha1 = Math.sin(alpha1);
  const cosAlpha1 = Math.cos(alpha1);

  const tanU1 = (1 - f) * Math.tan(toRadians(lat));
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const sinU1 = tanU1 * cosU1;

  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const A =
    1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));

  let sigma = distanceM / (b * A);
  let sigmaPrev = Number.POSITIVE_INFINITY;
  let sinSigma = 0;
  let cosSigma = 1;
  let cos2SigmaM = 1;
  let iterations = 0;

  while (Math.abs(sigma - sigmaPrev) > GEODESIC_TOLERANCE_RAD) {
    if (iterations >= maxIterations) {
      throw new GeodesicNonConvergenceError(iterations);
    }
    iterations += 1;

    cos2SigmaM = Math.cos(2 * sigma1 + sigma);
    sinSigma = Math.sin(sigma);
    cosSigma = Math.cos(sigma);
    const deltaSigma =
      B *
      sinSigma *
      (cos2SigmaM +
        (B / 4) *
          (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
            (B / 6) *
              cos2SigmaM *
              (-3 + 4 * sinSigma * sinSigma) *
              (-3 + 4 * cos2SigmaM * cos2SigmaM)));
    sigmaPrev = sigma;
    sigma = distanceM / (b * A) + deltaSigma;
  }

  const tmp = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const phi2 = Math.atan2(
    sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1,
    (1 - f) * Math.sqrt(sinAlpha * sinAlpha + tmp * tmp),
  );
  const lambda = Math.atan2(
    sinSigma * sinAlpha1,
    cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1,
  );
  const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const L =
    lambda -
    (1 - C) *
      f *
      sinAlpha *
      (sigma +
        C *
          sinSigma *
          (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

  const lon2 = toDegrees(toRadians(lon) + L);

  return {
    lat: toDegrees(phi2),
    lon: normalizeLongitude(lon2),
  };
}

/**
 * Wrap a longitude into [-180, 180).
 */
export function normalizeLongitude(lon: number): number {
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

/**
 * Great-circle distance between two coordinates (Haversine formula).
 *
 * @returns Distance in meters
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const dPhi = toRadians(lat2 - lat1);
  const dLambda = toRadians(lon2 - lon1);

  const h =
    Math.sin(dPhi / 2) * Math.sin(dPhi / 2) +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) * Math.sin(dLambda / 2);

  return EARTH_MEAN_RADIUS_M * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

// WGS84 ellipsoid
export const EARTH_SEMI_MAJOR_AXIS_M = 6_378_137.0;
export const EARTH_FLATTENING = 1 / 298.257_223_563;
export const EARTH_SEMI_MINOR_AXIS_M =
  EARTH_SEMI_MAJOR_AXIS_M * (1 - EARTH_FLATTENING);

// Mean radius used for great-circle distances
export const EARTH_MEAN_RADIUS_M = 6_371_000.0;

export const GEODESIC_TOLERANCE_RAD = 1e-12;
export const GEODESIC_MAX_ITERATIONS = 200;

export const DEFAULT_ASSUMED_DISTANCE_M = 20.0;
export const DEFAULT_SEARCH_RADIUS_M = 50.0;
export const DEFAULT_PIPELINE_DEADLINE_MS = 6000;

export const DEBUG_NOTES = {
  NEAREST_FEATURE:
    'Nominatim returns the nearest suitable feature to the coordinate, not an exact address.',
  NO_PANORAMA: 'No panorama available from configured providers.',
} as const;

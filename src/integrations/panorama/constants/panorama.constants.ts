export const SUPPORTED_PROVIDERS = ['google', 'mapillary'] as const;

export type PanoramaProviderId = (typeof SUPPORTED_PROVIDERS)[number];

export const DEFAULT_PROVIDER_PRIORITY: PanoramaProviderId[] = [
  'google',
  'mapillary',
];

export const PANORAMA_PROVIDERS = Symbol('PANORAMA_PROVIDERS');

// Five meters of distance weigh as much as one degree of heading mismatch
export const METERS_PER_HEADING_DEGREE = 5.0;

export const MAPILLARY_CANDIDATE_LIMIT = 5;

export const STREET_VIEW_THUMBNAIL = {
  size: '640x400',
  fov: 80,
  pitch: 0,
} as const;

export function isSupportedProvider(value: string): value is PanoramaProviderId {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value);
}

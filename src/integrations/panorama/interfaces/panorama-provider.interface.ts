import type { PanoramaProviderId } from '../constants/panorama.constants';

export interface PanoramaQuery {
  lat: number;
  lon: number;
  /** Bearing from the camera to the target; thumbnails face this way */
  bearingDeg: number;
  radiusM: number;
}

export interface PanoramaCandidate {
  provider: PanoramaProviderId;
  lat: number;
  lon: number;
  compassAngle: number | null;
  thumbnailUrl: string | null;
  meta: Record<string, unknown>;
}

export interface PanoramaProvider {
  readonly id: PanoramaProviderId;

  /** False when credentials are missing; the selector skips the provider */
  isConfigured(): boolean;

  findNearby(
    query: PanoramaQuery,
    signal?: AbortSignal,
  ): Promise<PanoramaCandidate[]>;
}

export interface PanoramaSelection {
  provider: PanoramaProviderId | null;
  meta: Record<string, unknown>;
  thumbnailUrl: string | null;
}

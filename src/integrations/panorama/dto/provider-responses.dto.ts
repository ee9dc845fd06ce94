/**
 * Street View Static API metadata response.
 * https://developers.google.com/maps/documentation/streetview/metadata
 */
export interface StreetViewMetadataResponse {
  status: string;
  pano_id?: string;
  location?: {
    lat: number;
    lng: number;
  };
  date?: string;
  copyright?: string;
}

export interface MapillaryImage {
  id: string;
  compass_angle?: number | null;
  captured_at?: number;
  geometry?: {
    type: string;
    coordinates: number[];
  };
  thumb_1024_url?: string;
  thumb_256_url?: string;
}

/**
 * Mapillary Graph API v4 `/images` search response.
 */
export interface MapillaryImagesResponse {
  data?: MapillaryImage[];
}

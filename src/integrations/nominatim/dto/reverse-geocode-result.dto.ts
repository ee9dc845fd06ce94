/**
 * Subset of Nominatim's `jsonv2` reverse payload that we read.
 * https://nominatim.org/release-docs/latest/api/Reverse/
 */
export interface NominatimReverseResponse {
  place_id?: number;
  display_name?: string;
  address?: Record<string, string>;
  error?: string;
}

export interface ReverseGeocodeResult {
  displayName: string | null;
  components: Record<string, string>;
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpGatewayService } from '../gateway/http-gateway.service';
import { describeError } from '../gateway/gateway.errors';
import {
  NominatimReverseResponse,
  ReverseGeocodeResult,
} from './dto/reverse-geocode-result.dto';

export const NOMINATIM_RATE_KEY = 'nominatim';

@Injectable()
export class ReverseGeocodingService {
  private readonly logger = new Logger(ReverseGeocodingService.name);
  private readonly baseUrl = 'https://nominatim.openstreetmap.org/reverse';
  private readonly contactEmail: string;

  constructor(
    private readonly gateway: HttpGatewayService,
    private readonly configService: ConfigService,
  ) {
    this.contactEmail = this.configService.get<string>('NOMINATIM_EMAIL') || '';

    if (!this.contactEmail) {
      this.logger.warn(
        'NOMINATIM_EMAIL not configured - requests will be sent without a contact',
      );
    }
  }

  /**
   * Nearest named feature to a coordinate.
   *
   * Never throws: a failed lookup comes back with a null display name and
   * the failure reason under `components.error`.
   */
  async reverseGeocode(
    lat: number,
    lon: number,
    signal?: AbortSignal,
  ): Promise<ReverseGeocodeResult> {
    const params: Record<string, string | number> = {
      format: 'jsonv2',
      lat,
      lon,
      zoom: 18,
      addressdetails: 1,
    };
    if (this.contactEmail) {
      params.email = this.contactEmail;
    }

    try {
      const payload = await this.gateway.get<NominatimReverseResponse>(
        this.baseUrl,
        {
          rateKey: NOMINATIM_RATE_KEY,
          params,
          headers: {
            'User-Agent': `DetectionGeolocationApi/1.0 (contact: ${this.contactEmail || 'n/a'})`,
          },
          signal,
        },
      );

      if (payload.error) {
        this.logger.warn(`Nominatim returned no feature: ${payload.error}`);
        return { displayName: null, components: { error: payload.error } };
      }

      return {
        displayName: payload.display_name ?? null,
        components: payload.address ?? {},
      };
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Reverse geocoding failed for ${lat},${lon}: ${message}`);
      return { displayName: null, components: { error: message } };
    }
  }
}

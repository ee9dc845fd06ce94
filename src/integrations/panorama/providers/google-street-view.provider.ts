import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpGatewayService } from '../../gateway/http-gateway.service';
import { normalizeAngle } from '../../../geo/utils/angle.util';
import { STREET_VIEW_THUMBNAIL } from '../constants/panorama.constants';
import { StreetViewMetadataResponse } from '../dto/provider-responses.dto';
import {
  PanoramaCandidate,
  PanoramaProvider,
  PanoramaQuery,
} from '../interfaces/panorama-provider.interface';

export interface StreetViewTarget {
  panoId?: string;
  lat: number;
  lon: number;
}

export interface ThumbnailOptions {
  pitch?: number;
  fov?: number;
  size?: string;
}

@Injectable()
export class GoogleStreetViewProvider implements PanoramaProvider {
  readonly id = 'google' as const;
  private readonly logger = new Logger(GoogleStreetViewProvider.name);
  private readonly apiKey: string;
  private readonly baseUrl = 'https://maps.googleapis.com/maps/api/streetview';

  constructor(
    private readonly gateway: HttpGatewayService,
    private readonly configService: ConfigService,
  ) {
    this.apiKey = this.configService.get<string>('GOOGLE_MAPS_API_KEY') || '';

    if (!this.apiKey) {
      this.logger.warn(
        'GOOGLE_MAPS_API_KEY not configured - Street View will be skipped',
      );
    }
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  /**
   * Look up the Street View panorama nearest to the query point. Street View
   * answers with at most one panorama, so this returns zero or one
   * candidate, with its thumbnail already turned towards the target.
   */
  async findNearby(
    query: PanoramaQuery,
    signal?: AbortSignal,
  ): Promise<PanoramaCandidate[]> {
    const metadata = await this.gateway.get<StreetViewMetadataResponse>(
      `${this.baseUrl}/metadata`,
      {
        rateKey: this.id,
        params: {
          location: `${query.lat},${query.lon}`,
          radius: query.radiusM,
          key: this.apiKey,
        },
        signal,
      },
    );

    if (metadata.status !== 'OK') {
      this.logger.debug(`No Street View panorama nearby (${metadata.status})`);
      return [];
    }

    const target: StreetViewTarget = {
      panoId: metadata.pano_id,
      lat: metadata.location?.lat ?? query.lat,
      lon: metadata.location?.lng ?? query.lon,
    };

    return [
      {
        provider: this.id,
        lat: target.lat,
        lon: target.lon,
        compassAngle: normalizeAngle(query.bearingDeg),
        thumbnailUrl: this.buildThumbnailUrl(target, query.bearingDeg),
        meta: { ...metadata },
      },
    ];
  }

  /**
   * Unsigned Street View Static API image URL looking along `headingDeg`.
   * Uses the panorama id when known, the raw coordinate otherwise.
   */
  buildThumbnailUrl(
    target: StreetViewTarget,
    headingDeg: number,
    options: ThumbnailOptions = {},
  ): string {
    const params = new URLSearchParams({
      size: options.size ?? STREET_VIEW_THUMBNAIL.size,
      fov: String(options.fov ?? STREET_VIEW_THUMBNAIL.fov),
      heading: String(normalizeAngle(headingDeg)),
      pitch: String(options.pitch ?? STREET_VIEW_THUMBNAIL.pitch),
      key: this.apiKey,
    });

    if (target.panoId) {
      params.set('pano', target.panoId);
    } else {
      params.set('location', `${target.lat},${target.lon}`);
    }

    return `${this.baseUrl}?${params.toString()}`;
  }
}

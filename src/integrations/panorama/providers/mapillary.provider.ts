import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpGatewayService } from '../../gateway/http-gateway.service';
import { MAPILLARY_CANDIDATE_LIMIT } from '../constants/panorama.constants';
import {
  MapillaryImage,
  MapillaryImagesResponse,
} from '../dto/provider-responses.dto';
import {
  PanoramaCandidate,
  PanoramaProvider,
  PanoramaQuery,
} from '../interfaces/panorama-provider.interface';

const MAPILLARY_FIELDS =
  'id,compass_angle,captured_at,geometry,thumb_1024_url';

@Injectable()
export class MapillaryProvider implements PanoramaProvider {
  readonly id = 'mapillary' as const;
  private readonly logger = new Logger(MapillaryProvider.name);
  private readonly accessToken: string;
  private readonly baseUrl = 'https://graph.mapillary.com/images';

  constructor(
    private readonly gateway: HttpGatewayService,
    private readonly configService: ConfigService,
  ) {
    this.accessToken = this.configService.get<string>('MAPILLARY_TOKEN') || '';

    if (!this.accessToken) {
      this.logger.warn('MAPILLARY_TOKEN not configured - Mapillary will be skipped');
    }
  }

  isConfigured(): boolean {
    return !!this.accessToken;
  }

  async findNearby(
    query: PanoramaQuery,
    signal?: AbortSignal,
  ): Promise<PanoramaCandidate[]> {
    const response = await this.gateway.get<MapillaryImagesResponse>(
      this.baseUrl,
      {
        rateKey: this.id,
        params: {
          access_token: this.accessToken,
          fields: MAPILLARY_FIELDS,
          limit: MAPILLARY_CANDIDATE_LIMIT,
          radius: query.radiusM,
          closeto: `${query.lon},${query.lat}`,
        },
        signal,
      },
    );

    const images = response.data ?? [];
    this.logger.debug(`Mapillary returned ${images.length} image(s)`);

    return images.map((image) => this.toCandidate(image, query));
  }

  private toCandidate(
    image: MapillaryImage,
    query: PanoramaQuery,
  ): PanoramaCandidate {
    // GeoJSON order: [lon, lat]
    const [lon, lat] = image.geometry?.coordinates ?? [];

    return {
      provider: this.id,
      lat: lat ?? query.lat,
      lon: lon ?? query.lon,
      compassAngle:
        typeof image.compass_angle === 'number' ? image.compass_angle : null,
      thumbnailUrl: image.thumb_1024_url ?? image.thumb_256_url ?? null,
      meta: { ...image },
    };
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { defer, firstValueFrom, forkJoin, throwError, timeout } from 'rxjs';
import { ReverseGeocodingService } from '../integrations/nominatim/reverse-geocoding.service';
import type { ReverseGeocodeResult } from '../integrations/nominatim/dto/reverse-geocode-result.dto';
import { PanoramaSelectorService } from '../integrations/panorama/panorama-selector.service';
import type {
  PanoramaQuery,
  PanoramaSelection,
} from '../integrations/panorama/interfaces/panorama-provider.interface';
import {
  DEBUG_NOTES,
  DEFAULT_ASSUMED_DISTANCE_M,
  DEFAULT_PIPELINE_DEADLINE_MS,
  DEFAULT_SEARCH_RADIUS_M,
} from './constants/geo.constants';
import type { EstimateRequestDto } from './dto/estimate-request.dto';
import type {
  BearingResponseDto,
  EstimateResponseDto,
} from './dto/estimate-response.dto';
import { PipelineTimeoutError } from './errors/geo.errors';
import {
  BearingMethod,
  bboxCenter,
  bearingFromBBox,
  resolveBearingMethod,
  wrapDelta,
} from './utils/angle.util';
import { GeoPoint, projectGeodesic } from './utils/geodesic.util';

interface ResolvedBearing {
  bearing: number;
  method: BearingMethod;
}

@Injectable()
export class GeoService {
  private readonly logger = new Logger(GeoService.name);
  private readonly deadlineMs: number;

  constructor(
    private readonly reverseGeocodingService: ReverseGeocodingService,
    private readonly panoramaSelectorService: PanoramaSelectorService,
    private readonly configService: ConfigService,
  ) {
    this.deadlineMs = parseInt(
      this.configService.get<string>('PIPELINE_DEADLINE_MS') ||
        String(DEFAULT_PIPELINE_DEADLINE_MS),
      10,
    );
  }

  /**
   * Bearing of the detection only, without projection or enrichment.
   */
  computeBearing(request: EstimateRequestDto): BearingResponseDto {
    return { bearing_deg: this.resolveBearing(request).bearing };
  }

  /**
   * Estimate where the detected object is and enrich it with an address and
   * a panorama.
   *
   * The geometry runs synchronously; the two lookups then run side by side.
   * If they have not both finished within the deadline (counted from the
   * start of this call) both are abandoned and {@link PipelineTimeoutError}
   * is thrown.
   */
  async runPipeline(request: EstimateRequestDto): Promise<EstimateResponseDto> {
    const startedAt = Date.now();

    const { bearing, method } = this.resolveBearing(request);
    const deltaYaw = wrapDelta(bearing - request.camera_heading_deg);
    const assumedDistance =
      request.assumed_distance_m ?? DEFAULT_ASSUMED_DISTANCE_M;

    const target = projectGeodesic(
      request.camera_lat,
      request.camera_lon,
      bearing,
      assumedDistance,
    );

    this.logger.log(
      `Projected target ${target.lat.toFixed(6)},${target.lon.toFixed(6)} (bearing ${bearing.toFixed(2)}°, ${assumedDistance}m, ${method})`,
    );

    const [address, panorama] = await this.enrich(
      target,
      {
        lat: target.lat,
        lon: target.lon,
        bearingDeg: bearing,
        radiusM: request.radius_m ?? DEFAULT_SEARCH_RADIUS_M,
      },
      request,
      this.deadlineMs - (Date.now() - startedAt),
    );

    const notes: string[] = [DEBUG_NOTES.NEAREST_FEATURE];
    if (!panorama.provider) {
      notes.push(DEBUG_NOTES.NO_PANORAMA);
    }

    this.logger.log(
      `Pipeline finished in ${Date.now() - startedAt}ms (panorama: ${panorama.provider ?? 'none'})`,
    );

    return {
      estimated_point: {
        lat: target.lat,
        lon: target.lon,
        bearing_deg: bearing,
      },
      address: {
        display_name: address.displayName,
        components: address.components,
      },
      panorama: {
        provider: panorama.provider,
        meta: panorama.meta,
        thumbnail_url: panorama.thumbnailUrl,
      },
      debug: {
        method,
        delta_yaw_deg: deltaYaw,
        assumed_distance_m: assumedDistance,
        notes,
      },
    };
  }

  private resolveBearing(request: EstimateRequestDto): ResolvedBearing {
    const { u } = bboxCenter(request.bbox);
    const method = resolveBearingMethod(request.hfov_deg, request.cx, request.fx);
    const bearing = bearingFromBBox(
      u,
      request.image_width,
      request.hfov_deg,
      request.camera_heading_deg,
      request.cx,
      request.fx,
    );

    return { bearing, method };
  }

  /**
   * Reverse geocoding and panorama selection share one abort signal, so
   * the deadline cancels both together and neither cancels the other.
   */
  private async enrich(
    target: GeoPoint,
    panoramaQuery: PanoramaQuery,
    request: EstimateRequestDto,
    remainingMs: number,
  ): Promise<[ReverseGeocodeResult, PanoramaSelection]> {
    const controller = new AbortController();

    try {
      return await firstValueFrom(
        forkJoin([
          defer(() =>
            this.reverseGeocodingService.reverseGeocode(
              target.lat,
              target.lon,
              controller.signal,
            ),
          ),
          defer(() =>
            this.panoramaSelectorService.select(
              panoramaQuery,
              request.provider_priority,
              controller.signal,
            ),
          ),
        ]).pipe(
          timeout({
            first: Math.max(0, remainingMs),
            with: () =>
              throwError(() => new PipelineTimeoutError(this.deadlineMs)),
          }),
        ),
      );
    } catch (error) {
      if (error instanceof PipelineTimeoutError) {
        this.logger.warn(
          `Enrichment exceeded the ${this.deadlineMs}ms deadline, abandoning lookups`,
        );
      }
      throw error;
    } finally {
      controller.abort();
    }
  }
}

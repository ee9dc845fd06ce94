import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ReverseGeocodingService } from '../integrations/nominatim/reverse-geocoding.service';
import { PanoramaSelectorService } from '../integrations/panorama/panorama-selector.service';
import { DEBUG_NOTES } from './constants/geo.constants';
import { EstimateRequestDto } from './dto/estimate-request.dto';
import {
  InvalidGeometryInputError,
  PipelineTimeoutError,
} from './errors/geo.errors';
import { GeoService } from './geo.service';
import { haversineDistance } from './utils/geodesic.util';

function buildRequest(
  overrides: Partial<EstimateRequestDto> = {},
): EstimateRequestDto {
  return Object.assign(new EstimateRequestDto(), {
    image_width: 200,
    image_height: 100,
    hfov_deg: 90,
    camera_lat: 48.8566,
    camera_lon: 2.3522,
    camera_heading_deg: 180,
    bbox: { x: 50, y: 0, w: 100, h: 100 },
    ...overrides,
  });
}

describe('GeoService', () => {
  const reverseGeocodingService = { reverseGeocode: jest.fn() };
  const panoramaSelectorService = { select: jest.fn() };

  async function createService(
    env: Record<string, string> = {},
  ): Promise<GeoService> {
    const module = await Test.createTestingModule({
      providers: [
        GeoService,
        { provide: ReverseGeocodingService, useValue: reverseGeocodingService },
        { provide: PanoramaSelectorService, useValue: panoramaSelectorService },
        { provide: ConfigService, useValue: new ConfigService(env) },
      ],
    }).compile();

    return module.get(GeoService);
  }

  beforeEach(() => {
    reverseGeocodingService.reverseGeocode.mockReset().mockResolvedValue({
      displayName: 'Place du Parvis, Paris',
      components: { city: 'Paris' },
    });
    panoramaSelectorService.select.mockReset().mockResolvedValue({
      provider: 'google',
      meta: { pano_id: 'pano-1' },
      thumbnailUrl: 'https://maps.example.com/pano-1.jpg',
    });
  });

  describe('runPipeline', () => {
    it('projects the detection and enriches the estimate', async () => {
      const service = await createService();

      const response = await service.runPipeline(buildRequest());

      expect(response.estimated_point.bearing_deg).toBe(180);
      expect(response.estimated_point.lat).toBeLessThan(48.8566);
      expect(response.estimated_point.lon).toBeCloseTo(2.3522, 9);
      expect(
        haversineDistance(
          48.8566,
          2.3522,
          response.estimated_point.lat,
          response.estimated_point.lon,
        ),
      ).toBeCloseTo(20, 1);
      expect(response.address).toEqual({
        display_name: 'Place du Parvis, Paris',
        components: { city: 'Paris' },
      });
      expect(response.panorama).toEqual({
        provider: 'google',
        meta: { pano_id: 'pano-1' },
        thumbnail_url: 'https://maps.example.com/pano-1.jpg',
      });
      expect(response.debug).toEqual({
        method: 'hfov',
        delta_yaw_deg: 0,
        assumed_distance_m: 20,
        notes: [DEBUG_NOTES.NEAREST_FEATURE],
      });
    });

    it('searches panoramas around the projected point', async () => {
      const service = await createService();

      const response = await service.runPipeline(
        buildRequest({ radius_m: 75, provider_priority: ['mapillary'] }),
      );

      expect(reverseGeocodingService.reverseGeocode).toHaveBeenCalledWith(
        response.estimated_point.lat,
        response.estimated_point.lon,
        expect.any(AbortSignal),
      );
      expect(panoramaSelectorService.select).toHaveBeenCalledWith(
        {
          lat: response.estimated_point.lat,
          lon: response.estimated_point.lon,
          bearingDeg: 180,
          radiusM: 75,
        },
        ['mapillary'],
        expect.any(AbortSignal),
      );
    });

    it('uses the default search radius', async () => {
      const service = await createService();

      await service.runPipeline(buildRequest());

      expect(panoramaSelectorService.select.mock.calls[0][0].radiusM).toBe(50);
    });

    it('wraps the yaw offset across north', async () => {
      const service = await createService();

      const response = await service.runPipeline(
        buildRequest({ camera_heading_deg: 350, bbox: { x: 150, y: 0, w: 100, h: 100 } }),
      );

      expect(response.estimated_point.bearing_deg).toBeCloseTo(35, 10);
      expect(response.debug.delta_yaw_deg).toBeCloseTo(45, 10);
    });

    it('prefers intrinsics over the field of view', async () => {
      const service = await createService();

      const response = await service.runPipeline(
        buildRequest({
          fx: 100,
          cx: 100,
          camera_heading_deg: 10,
          bbox: { x: 150, y: 0, w: 100, h: 100 },
          assumed_distance_m: 35,
        }),
      );

      expect(response.estimated_point.bearing_deg).toBeCloseTo(55, 10);
      expect(response.debug.method).toBe('intrinsics');
      expect(response.debug.assumed_distance_m).toBe(35);
    });

    it('notes when no panorama was found', async () => {
      panoramaSelectorService.select.mockResolvedValue({
        provider: null,
        meta: {},
        thumbnailUrl: null,
      });
      const service = await createService();

      const response = await service.runPipeline(buildRequest());

      expect(response.panorama).toEqual({
        provider: null,
        meta: {},
        thumbnail_url: null,
      });
      expect(response.debug.notes).toEqual([
        DEBUG_NOTES.NEAREST_FEATURE,
        DEBUG_NOTES.NO_PANORAMA,
      ]);
    });

    it('rejects requests without a geometry source', async () => {
      const service = await createService();

      await expect(
        service.runPipeline(buildRequest({ hfov_deg: undefined, fx: 100 })),
      ).rejects.toBeInstanceOf(InvalidGeometryInputError);
      expect(reverseGeocodingService.reverseGeocode).not.toHaveBeenCalled();
    });

    it('abandons the lookups at the deadline', async () => {
      let geocoderSignal: AbortSignal | undefined;
      reverseGeocodingService.reverseGeocode.mockImplementation(
        (_lat: number, _lon: number, signal: AbortSignal) => {
          geocoderSignal = signal;
          return new Promise((resolve) => {
            signal.addEventListener('abort', () =>
              resolve({ displayName: null, components: {} }),
            );
          });
        },
      );
      const service = await createService({ PIPELINE_DEADLINE_MS: '50' });

      const failure = service.runPipeline(buildRequest());

      await expect(failure).rejects.toBeInstanceOf(PipelineTimeoutError);
      await expect(failure).rejects.toThrow('Pipeline timed out after 50ms');
      expect(geocoderSignal?.aborted).toBe(true);
    });

    it('abandons a panorama search that outlives the deadline', async () => {
      let selectorSignal: AbortSignal | undefined;
      panoramaSelectorService.select.mockImplementation(
        (_query: unknown, _priority: unknown, signal: AbortSignal) => {
          selectorSignal = signal;
          return new Promise((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(signal.reason));
          });
        },
      );
      const service = await createService({ PIPELINE_DEADLINE_MS: '50' });

      await expect(service.runPipeline(buildRequest())).rejects.toBeInstanceOf(
        PipelineTimeoutError,
      );
      expect(selectorSignal?.aborted).toBe(true);
      expect(reverseGeocodingService.reverseGeocode).toHaveBeenCalledTimes(1);
    });

    it('propagates enrichment failures', async () => {
      panoramaSelectorService.select.mockRejectedValue(new Error('boom'));
      const service = await createService();

      await expect(service.runPipeline(buildRequest())).rejects.toThrow('boom');
    });
  });

  describe('computeBearing', () => {
    it('returns only the bearing', async () => {
      const service = await createService();

      expect(
        service.computeBearing(
          buildRequest({ camera_heading_deg: 0, bbox: { x: 0, y: 0, w: 100, h: 100 } }),
        ),
      ).toEqual({ bearing_deg: 337.5 });
      expect(reverseGeocodingService.reverseGeocode).not.toHaveBeenCalled();
    });

    it('throws without a geometry source', async () => {
      const service = await createService();

      expect(() =>
        service.computeBearing(buildRequest({ hfov_deg: undefined })),
      ).toThrow(InvalidGeometryInputError);
    });
  });
});

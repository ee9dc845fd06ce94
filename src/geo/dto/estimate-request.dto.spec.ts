import 'reflect-metadata';
import { instanceToPlain, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  EstimateRequestDto,
  GEOMETRY_SOURCE_MESSAGE,
} from './estimate-request.dto';

const baseBody = {
  image_width: 1920,
  image_height: 1080,
  hfov_deg: 120,
  camera_lat: 10,
  camera_lon: 20,
  camera_heading_deg: 45,
  bbox: { x: 0, y: 0, w: 100, h: 200 },
  assumed_distance_m: 15,
};

function toDto(body: Record<string, unknown>): EstimateRequestDto {
  return plainToInstance(EstimateRequestDto, body);
}

describe('EstimateRequestDto', () => {
  it('accepts a field-of-view request and fills in the default providers', async () => {
    const dto = toDto(baseBody);

    expect(await validate(dto)).toEqual([]);
    expect(dto.provider_priority).toEqual(['google', 'mapillary']);
    expect(dto.radius_m).toBeUndefined();
  });

  it('accepts intrinsics without a field of view', async () => {
    const { hfov_deg: _hfov, ...body } = baseBody;
    const dto = toDto({ ...body, fx: 1400, cx: 960 });

    expect(await validate(dto)).toEqual([]);
  });

  it('rejects a request with no geometry source', async () => {
    const { hfov_deg: _hfov, ...body } = baseBody;
    const errors = await validate(toDto({ ...body, fx: 1400 }));

    const hfovError = errors.find((error) => error.property === 'hfov_deg');
    expect(hfovError?.constraints?.isDefined).toBe(GEOMETRY_SOURCE_MESSAGE);
  });

  it('keeps the field of view inside (0, 360)', async () => {
    const tooWide = await validate(toDto({ ...baseBody, hfov_deg: 360 }));
    expect(tooWide[0].property).toBe('hfov_deg');
    expect(tooWide[0].constraints).toHaveProperty('isBelow');

    const empty = await validate(toDto({ ...baseBody, hfov_deg: 0 }));
    expect(empty[0].property).toBe('hfov_deg');
    expect(empty[0].constraints).toHaveProperty('isPositive');
  });

  it('validates the nested bounding box', async () => {
    const errors = await validate(
      toDto({ ...baseBody, bbox: { x: 0, y: 0, w: 0, h: 10 } }),
    );

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('bbox');
    expect(errors[0].children?.[0].property).toBe('w');
  });

  it('rejects a bounding box that is not an object', async () => {
    const errors = await validate(toDto({ ...baseBody, bbox: [] }));

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('bbox');
    expect(errors[0].constraints).toEqual({ isObject: 'bbox must be an object' });
  });

  it('rejects out-of-range camera coordinates', async () => {
    const errors = await validate(toDto({ ...baseBody, camera_lat: 91 }));

    expect(errors[0].property).toBe('camera_lat');
    expect(errors[0].constraints).toHaveProperty('max');
  });

  it('normalizes the provider priority', async () => {
    const dto = toDto({
      ...baseBody,
      provider_priority: ['Mapillary', 'google', 'bing', 'mapillary'],
    });

    expect(await validate(dto)).toEqual([]);
    expect(dto.provider_priority).toEqual(['mapillary', 'google']);
  });

  it('allows an empty provider priority', async () => {
    const dto = toDto({ ...baseBody, provider_priority: ['bing'] });

    expect(await validate(dto)).toEqual([]);
    expect(dto.provider_priority).toEqual([]);
  });

  it('falls back to the default providers for a null list', async () => {
    const dto = toDto({ ...baseBody, provider_priority: null });

    expect(await validate(dto)).toEqual([]);
    expect(dto.provider_priority).toEqual(['google', 'mapillary']);
  });

  it('rejects a provider priority that is not a list', async () => {
    const errors = await validate(
      toDto({ ...baseBody, provider_priority: 'google' }),
    );

    expect(errors[0].property).toBe('provider_priority');
    expect(errors[0].constraints).toHaveProperty('isArray');
  });

  it('survives a trip through the wire format', async () => {
    const body = {
      ...baseBody,
      fx: 1400.5,
      fy: 1398.25,
      cx: 959.5,
      cy: 540.25,
      provider_priority: ['mapillary', 'google'],
      radius_m: 75,
    };
    const dto = toDto(body);

    const wire = JSON.parse(JSON.stringify(instanceToPlain(dto)));
    const parsed = toDto(wire);

    expect(wire).toEqual(body);
    expect(parsed).toEqual(dto);
    expect(await validate(parsed)).toEqual([]);
  });
});

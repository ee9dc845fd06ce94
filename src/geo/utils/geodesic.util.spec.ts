import {
  GeodesicNonConvergenceError,
  InvalidGeometryInputError,
} from '../errors/geo.errors';
import {
  haversineDistance,
  normalizeLongitude,
  projectGeodesic,
} from './geodesic.util';

describe('geodesic utils', () => {
  describe('projectGeodesic', () => {
    it('returns the origin unchanged for a zero distance', () => {
      for (const bearing of [0, 45, 90, 181.5, 359.9]) {
        expect(projectGeodesic(12.345, -67.89, bearing, 0)).toEqual({
          lat: 12.345,
          lon: -67.89,
        });
      }
    });

    it('moves 1 km east along the equator', () => {
      const { lat, lon } = projectGeodesic(0, 0, 90, 1000);

      expect(Math.abs(lat)).toBeLessThan(1e-6);
      expect(lon).toBeGreaterThan(0.008);
      expect(lon).toBeLessThan(0.0095);
    });

    it('moves 1 km north along the prime meridian', () => {
      const { lat, lon } = projectGeodesic(0, 0, 0, 1000);

      // one degree of latitude is ~110.57 km at the equator
      expect(lat).toBeGreaterThan(0.009);
      expect(lat).toBeLessThan(0.0091);
      expect(lon).toBe(0);
    });

    it('wraps longitude across the antimeridian', () => {
      const { lon } = projectGeodesic(0, 179.9999, 90, 1000);

      expect(lon).toBeGreaterThanOrEqual(-180);
      expect(lon).toBeLessThan(-179.99);
    });

    it('rejects negative distances', () => {
      expect(() => projectGeodesic(0, 0, 90, -1)).toThrow(
        InvalidGeometryInputError,
      );
    });

    it('rejects a non-finite origin or bearing', () => {
      expect(() => projectGeodesic(Number.NaN, 0, 90, 20)).toThrow(
        InvalidGeometryInputError,
      );
      expect(() => projectGeodesic(0, Number.POSITIVE_INFINITY, 90, 20)).toThrow(
        InvalidGeometryInputError,
      );
      expect(() => projectGeodesic(0, 0, Number.NaN, 20)).toThrow(
        'Projection origin and bearing must be finite (got 0, 0, NaN)',
      );
    });

    it('gives up once the iteration cap is reached', () => {
      expect(() => projectGeodesic(45, 10, 45, 1_000_000, 1)).toThrow(
        GeodesicNonConvergenceError,
      );
    });

    it('converges well within the default cap for long distances', () => {
      const { lat, lon } = projectGeodesic(40.4168, -3.7038, 45, 1_000_000);

      expect(lat).toBeGreaterThan(40.4168);
      expect(lon).toBeGreaterThan(-3.7038);
    });
  });

  it('normalizeLongitude maps into [-180, 180)', () => {
    expect(normalizeLongitude(180)).toBe(-180);
    expect(normalizeLongitude(-180)).toBe(-180);
    expect(normalizeLongitude(190)).toBe(-170);
    expect(normalizeLongitude(-190)).toBe(170);
    expect(normalizeLongitude(12.5)).toBe(12.5);
  });

  describe('haversineDistance', () => {
    it('is zero for the same point', () => {
      expect(haversineDistance(40.4, -3.7, 40.4, -3.7)).toBe(0);
    });

    it('measures one degree of longitude on the equator', () => {
      expect(haversineDistance(0, 0, 0, 1)).toBeCloseTo(111194.927, 2);
    });

    it('is symmetric', () => {
      expect(haversineDistance(10, 20, 11, 21)).toBeCloseTo(
        haversineDistance(11, 21, 10, 20),
        6,
      );
    });
  });
});

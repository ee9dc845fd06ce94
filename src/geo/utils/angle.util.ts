import { InvalidGeometryInputError } from '../errors/geo.errors';

export interface BoxLike {
  x: number;
  y: number;
  w: number;
  h: number;
}

export type BearingMethod = 'intrinsics' | 'hfov';

const toDegrees = (radians: number): number => radians * (180 / Math.PI);

/**
 * Normalize an angle into [0, 360).
 *
 * @example
 * normalizeAngle(-90); // 270
 * normalizeAngle(720); // 0
 */
export function normalizeAngle(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

/**
 * Wrap an angle difference into (-180, 180]. An exact -180 is reported as
 * +180.
 */
export function wrapDelta(degrees: number): number {
  const wrapped = normalizeAngle(degrees + 180) - 180;
  return wrapped === -180 ? 180 : wrapped;
}

/**
 * Absolute heading mismatch between two bearings, in [0, 180].
 */
export function angularDifference(a: number, b: number): number {
  return Math.abs(wrapDelta(a - b));
}

export function bboxCenter(bbox: BoxLike): { u: number; v: number } {
  return {
    u: bbox.x + bbox.w / 2,
    v: bbox.y + bbox.h / 2,
  };
}

export function resolveBearingMethod(
  hfovDeg?: number | null,
  cx?: number | null,
  fx?: number | null,
): BearingMethod {
  if (fx != null && cx != null) {
    return 'intrinsics';
  }
  if (hfovDeg != null) {
    return 'hfov';
  }
  throw new InvalidGeometryInputError();
}

/**
 * Absolute bearing of an image column.
 *
 * Uses the pinhole model when both `fx` and `cx` are known, otherwise spreads
 * the horizontal field of view linearly across the image width. Lens
 * distortion is ignored.
 *
 * @param u - Horizontal pixel coordinate of the target
 * @param imageWidth - Image width in pixels
 * @param hfovDeg - Horizontal field of view, used when intrinsics are missing
 * @param heading - Compass heading of the camera
 * @returns Bearing in [0, 360)
 */
export function bearingFromBBox(
  u: number,
  imageWidth: number,
  hfovDeg: number | null | undefined,
  heading: number,
  cx?: number | null,
  fx?: number | null,
): number {
  let deltaYaw: number;

  if (fx != null && cx != null) {
    deltaYaw = toDegrees(Math.atan2(u - cx, fx));
  } else if (hfovDeg != null) {
    const degreesPerPixel = hfovDeg / imageWidth;
    deltaYaw = (u - imageWidth / 2) * degreesPerPixel;
  } else {
    throw new InvalidGeometryInputError();
  }

  return normalizeAngle(heading + deltaYaw);
}

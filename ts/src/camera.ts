import type { Ray } from './intersect';
import { DEFAULT_CAMERA_POSITION } from './types';
import { sub, type Vec3 } from './vec3';

/**
 * Map a pixel to a point on the z = 0 near plane.
 *
 * - X: column 0..width  → -1..1 (left to right)
 * - Y: row 0..height    → 1..-1 (top to bottom)
 *
 * Pixel (0, 0) lands exactly on the (-1, 1) corner; the far edge is never
 * reached, matching a half-open pixel grid.
 */
export function nearPlanePoint(x: number, y: number, width: number, height: number): Vec3 {
  const dx = 2 / width;
  const dy = 2 / height;
  return [-1 + dx * x, 1 - dy * y, 0];
}

/**
 * Primary ray from the camera through pixel (x, y).
 * The direction is left unnormalized; {@link intersect} accounts for its length.
 */
export function primaryRay(
  x: number,
  y: number,
  width: number,
  height: number,
  cameraPosition: Vec3 = DEFAULT_CAMERA_POSITION,
): Ray {
  return {
    origin: cameraPosition,
    direction: sub(nearPlanePoint(x, y, width, height), cameraPosition),
  };
}

/**
 * Scene-level hit queries built on {@link intersect}.
 *
 * Both queries brute-force the sphere list in order; there is no spatial
 * acceleration.
 *
 * - {@link findNearestHit} picks the hit closest to the *camera position*
 *   (not to the ray origin), and keeps the first sphere on equal distance.
 * - {@link isOccluded} is a boolean shadow query that stops at the first
 *   sphere the ray touches.
 */

import { intersect, INTERSECT_EPSILON, type Ray } from './intersect';
import type { Material, Scene, Sphere } from './scene';
import { length, normalize, sub, type Vec3 } from './vec3';

export interface NearestHit {
  /** World-space hit point (first intersection of the winning sphere). */
  point: Vec3;
  /** Outward unit normal at `point`. */
  normal: Vec3;
  /** Normalized camera -> point vector. */
  eye: Vec3;
  /** Distance from the camera position, not from the ray origin. */
  distance: number;
  sphereIndex: number;
  material: Material;
}

/**
 * Cast a ray against every sphere and return the hit nearest to
 * `cameraPosition`, or null on miss.
 *
 * Only the first (nearest along the ray) intersection of each sphere is a
 * candidate. Distance is measured from the camera even when the ray is a
 * bounce leaving some other surface.
 */
export function findNearestHit(
  ray: Ray,
  scene: Scene,
  cameraPosition: Vec3,
  epsilon = INTERSECT_EPSILON,
): NearestHit | null {
  const { spheres, materials } = scene;

  let bestDist = Infinity;
  let bestIndex = -1;
  let bestPoint: Vec3 | null = null;
  let bestEyeVec: Vec3 | null = null;

  for (let i = 0; i < spheres.length; i++) {
    const hits = intersect(ray, spheres[i], epsilon);
    if (hits.length === 0) continue;

    const eyeVec = sub(hits[0], cameraPosition);
    const dist = length(eyeVec);
    if (dist < bestDist) {
      bestDist = dist;
      bestIndex = i;
      bestPoint = hits[0];
      bestEyeVec = eyeVec;
    }
  }

  if (bestPoint === null || bestEyeVec === null) return null;

  const sphere: Sphere = spheres[bestIndex];
  return {
    point: bestPoint,
    normal: normalize(sub(bestPoint, sphere.center)),
    eye: normalize(bestEyeVec),
    distance: bestDist,
    sphereIndex: bestIndex,
    material: materials[sphere.material],
  };
}

/**
 * True if the ray intersects any sphere at all. Returns on the first hit;
 * ordering and distance are irrelevant.
 */
export function isOccluded(
  ray: Ray,
  spheres: readonly Sphere[],
  epsilon = INTERSECT_EPSILON,
): boolean {
  for (const sphere of spheres) {
    if (intersect(ray, sphere, epsilon).length > 0) return true;
  }
  return false;
}

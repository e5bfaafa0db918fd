/**
 * Ray-sphere intersection.
 *
 * Solves |o + t*d - c|^2 = r^2 for t and returns the world-space points of
 * the non-negative roots, nearest first. The direction does not need to be
 * normalized: the quadratic carries `a = d . d` explicitly.
 */

import type { Sphere } from './scene';
import { add, dot, scale, sub, type Vec3 } from './vec3';

export interface Ray {
  origin: Vec3;
  direction: Vec3; // any non-zero length
}

/** Discriminant threshold below which a grazing ray yields a single point. */
export const INTERSECT_EPSILON = 0.00001;

/**
 * Intersect a ray with a sphere.
 *
 * Returns 0, 1 or 2 points ordered by ascending t. Roots behind the ray
 * origin (t < 0) are dropped. The second root is only computed when the
 * discriminant exceeds `epsilon`, so tangent rays report one point.
 */
export function intersect(ray: Ray, sphere: Sphere, epsilon = INTERSECT_EPSILON): Vec3[] {
  const { origin, direction } = ray;
  const oc = sub(origin, sphere.center);

  const a = dot(direction, direction);
  const b = 2 * dot(direction, oc);
  const c = dot(oc, oc) - sphere.radius * sphere.radius;
  const discriminant = b * b - 4 * a * c;

  const result: Vec3[] = [];
  if (discriminant < 0) return result;

  const sqrtDisc = Math.sqrt(discriminant);

  const t0 = (-b + sqrtDisc) / (2 * a);
  if (t0 >= 0) {
    result.push(add(origin, scale(direction, t0)));
  }

  if (discriminant > epsilon) {
    const t1 = (-b - sqrtDisc) / (2 * a);
    if (t1 >= 0) {
      const p1 = add(origin, scale(direction, t1));
      if (t0 >= 0 && t1 < t0) {
        result.unshift(p1);
      } else {
        result.push(p1);
      }
    }
  }

  return result;
}

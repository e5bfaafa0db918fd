/**
 * 3-component vector math.
 *
 * Vectors are readonly tuples `[x, y, z]`; every operation is pure and
 * returns a fresh tuple. Nothing here signals errors: normalizing a
 * zero-length vector yields NaN components.
 */

export type Vec3 = readonly [number, number, number];

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export const WHITE: Vec3 = [1, 1, 1];

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Component-wise product. */
export function mul(a: Vec3, b: Vec3): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/** `v * (1 / |v|)`. Callers guarantee a non-zero length. */
export function normalize(v: Vec3): Vec3 {
  return scale(v, 1 / length(v));
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

/** Unclamped linear interpolation: `a + (b - a) * t`. */
export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return add(a, scale(sub(b, a), t));
}

/** Clamp to [0, 1]. NaN passes through unchanged. */
export function saturate(x: number): number {
  return x < 0 ? 0 : x > 1 ? 1 : x;
}

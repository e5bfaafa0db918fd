import { describe, it, expect } from 'vitest';
import { intersect, type Ray } from './intersect';
import type { Sphere } from './scene';
import { distance, dot, sub } from './vec3';

const unitAtOrigin: Sphere = { center: [0, 0, 0], radius: 1, material: 0 };

describe('intersect', () => {
  it('returns two points nearest-first for a ray aimed at the center', () => {
    const ray: Ray = { origin: [0, 0, -5], direction: [0, 0, 1] };
    const hits = intersect(ray, unitAtOrigin);
    expect(hits).toHaveLength(2);
    expect(hits[0]).toEqual([0, 0, -1]);
    expect(hits[1]).toEqual([0, 0, 1]);
    // |origin to center| -/+ radius
    expect(distance(ray.origin, hits[0])).toBe(4);
    expect(distance(ray.origin, hits[1])).toBe(6);
  });

  it('accounts for a non-unit direction', () => {
    const ray: Ray = { origin: [0, 0, -5], direction: [0, 0, 2] };
    const hits = intersect(ray, unitAtOrigin);
    expect(hits).toEqual([[0, 0, -1], [0, 0, 1]]);
  });

  it('handles an off-center sphere hit from an oblique direction', () => {
    // Sphere at (10, 0, -10) r=2, ray from origin pointing (1, 0, -1)
    const sphere: Sphere = { center: [10, 0, -10], radius: 2, material: 0 };
    const ray: Ray = { origin: [0, 0, 0], direction: [1, 0, -1] };
    const hits = intersect(ray, sphere);
    expect(hits).toHaveLength(2);
    const centerDist = Math.sqrt(200);
    expect(distance(ray.origin, hits[0])).toBeCloseTo(centerDist - 2, 10);
    expect(distance(ray.origin, hits[1])).toBeCloseTo(centerDist + 2, 10);
  });

  it('returns empty when the ray misses', () => {
    const ray: Ray = { origin: [0, 2, -5], direction: [0, 0, 1] };
    expect(intersect(ray, unitAtOrigin)).toEqual([]);
  });

  it('returns exactly one point for a tangent ray', () => {
    const ray: Ray = { origin: [0, 1, -5], direction: [0, 0, 1] };
    expect(intersect(ray, unitAtOrigin)).toEqual([[0, 1, 0]]);
  });

  it('drops the root behind an origin inside the sphere', () => {
    const ray: Ray = { origin: [0, 0, 0], direction: [0, 0, 1] };
    expect(intersect(ray, unitAtOrigin)).toEqual([[0, 0, 1]]);
  });

  it('returns empty for a sphere entirely behind the ray', () => {
    const ray: Ray = { origin: [0, 0, 5], direction: [0, 0, 1] };
    expect(intersect(ray, unitAtOrigin)).toEqual([]);
  });

  it('never reports a point behind the origin', () => {
    const origins: Array<[number, number, number]> = [
      [0, 0, -3], [0.5, 0.2, 0], [0, 0, 3], [0.9, 0, -0.1], [2, 2, 2],
    ];
    const dirs: Array<[number, number, number]> = [
      [0, 0, 1], [0, 0, -1], [1, 1, 1], [-1, 0.5, 0.25], [0, -1, 0],
    ];
    for (const origin of origins) {
      for (const direction of dirs) {
        for (const p of intersect({ origin, direction }, unitAtOrigin)) {
          expect(dot(sub(p, origin), direction)).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });

  it('treats a zero-radius sphere as a point without throwing', () => {
    const point: Sphere = { center: [0, 0, 0], radius: 0, material: 0 };
    expect(intersect({ origin: [0, 0, -5], direction: [0, 0, 1] }, point)).toEqual([[0, 0, 0]]);
    expect(intersect({ origin: [0, 1, -5], direction: [0, 0, 1] }, point)).toEqual([]);
  });

  it('honours a custom epsilon for near-tangent rays', () => {
    // disc = b^2 - 4ac = 100 - 4 * 24.9999 = 0.0004
    const ray: Ray = { origin: [0, 0.99999, -5], direction: [0, 0, 1] };
    const sphere: Sphere = { center: [0, 0, 0], radius: Math.sqrt(0.99999 ** 2 + 0.0001), material: 0 };
    expect(intersect(ray, sphere)).toHaveLength(2);
    expect(intersect(ray, sphere, 0.01)).toHaveLength(1);
  });
});

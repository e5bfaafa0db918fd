import { describe, it, expect } from 'vitest';
import { buildDemoScene, DEMO_MATERIALS, GROUND_SPHERE } from './scene-builder';

describe('buildDemoScene', () => {
  it('builds 40 random spheres plus the ground by default', () => {
    const scene = buildDemoScene();
    expect(scene.spheres).toHaveLength(41);
    expect(scene.spheres[40]).toEqual(GROUND_SPHERE);
    expect(scene.materials).toHaveLength(14);
  });

  it('places the first sphere from the seeded sequence', () => {
    const [first] = buildDemoScene().spheres;
    expect(first.center[0]).toBeCloseTo(-3.21, 10);
    expect(first.center[1]).toBeCloseTo(1.49, 10);
    expect(first.center[2]).toBeCloseTo(9.65, 10);
    expect(first.radius).toBeCloseTo(0.43875, 10);
    expect(first.material).toBe(0);
  });

  it('cycles materials by index', () => {
    const scene = buildDemoScene();
    expect(scene.spheres[13].material).toBe(13);
    expect(scene.spheres[14].material).toBe(0);
    expect(scene.spheres[15].material).toBe(1);
    expect(scene.materials[1]).toEqual(DEMO_MATERIALS[1]);
  });

  it('keeps every random sphere inside the documented ranges', () => {
    const scene = buildDemoScene({ seed: 7, sphereCount: 200 });
    for (const s of scene.spheres.slice(0, -1)) {
      expect(s.center[0]).toBeGreaterThanOrEqual(-5);
      expect(s.center[0]).toBeLessThan(5);
      expect(s.center[1]).toBeGreaterThanOrEqual(0);
      expect(s.center[1]).toBeLessThan(5);
      expect(s.center[2]).toBeGreaterThanOrEqual(0);
      expect(s.center[2]).toBeLessThan(10);
      expect(s.radius).toBeGreaterThanOrEqual(0);
      expect(s.radius).toBeLessThan(1.25);
    }
  });

  it('is deterministic per seed', () => {
    expect(buildDemoScene({ seed: 99 })).toEqual(buildDemoScene({ seed: 99 }));
    expect(buildDemoScene({ seed: 99 }).spheres[0]).not.toEqual(buildDemoScene({ seed: 100 }).spheres[0]);
  });

  it('exposes frozen demo constants', () => {
    expect(Object.isFrozen(GROUND_SPHERE)).toBe(true);
    expect(Object.isFrozen(DEMO_MATERIALS)).toBe(true);
    expect(DEMO_MATERIALS.every((m) => Object.isFrozen(m) && Object.isFrozen(m.color))).toBe(true);
    expect(() => { GROUND_SPHERE.radius = 1; }).toThrow(TypeError);
    expect(buildDemoScene().spheres[40].radius).toBe(999);
  });

  it('supports a ground-only scene', () => {
    expect(buildDemoScene({ sphereCount: 0 }).spheres).toEqual([GROUND_SPHERE]);
  });

  it('throws on a negative sphere count', () => {
    expect(() => buildDemoScene({ sphereCount: -1 })).toThrow('sphereCount');
  });
});

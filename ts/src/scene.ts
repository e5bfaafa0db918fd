import type { Vec3 } from './vec3';

/** Surface response shared by any number of spheres. */
export interface Material {
  /** RGB reflectance, nominally [0, 1], not clamped. */
  color: Vec3;
  /** 0 = mirror-like (bounce dominates), 1 = fully diffuse. */
  roughness: number;
}

export interface Sphere {
  center: Vec3;
  radius: number;
  /** Index into {@link Scene.materials}. */
  material: number;
}

/** Read-only render input: an ordered sphere list plus the materials they index. */
export interface Scene {
  readonly materials: readonly Material[];
  readonly spheres: readonly Sphere[];
}

export const EMPTY_SCENE: Scene = Object.freeze({ materials: [], spheres: [] });

/**
 * Validate and deep-freeze a scene. Spheres and materials are copied, so
 * later edits to the input do not reach the scene. Sphere order is
 * preserved; it decides iteration order (and therefore tie-breaks).
 */
export function createScene(materials: readonly Material[], spheres: readonly Sphere[]): Scene {
  materials.forEach((m, i) => {
    if (!(m.roughness >= 0 && m.roughness <= 1)) {
      throw new Error(`material ${i} roughness must be in [0, 1]`);
    }
  });
  spheres.forEach((s, i) => {
    if (!Number.isFinite(s.radius) || s.radius < 0) {
      throw new Error(`sphere ${i} radius must be a finite number >= 0`);
    }
    if (!Number.isInteger(s.material) || s.material < 0 || s.material >= materials.length) {
      throw new Error(`sphere ${i} references unknown material ${s.material}`);
    }
  });
  return Object.freeze({
    materials: Object.freeze(materials.map(freezeMaterial)),
    spheres: Object.freeze(spheres.map(freezeSphere)),
  });
}

function freezeVec3(v: Vec3): Vec3 {
  return Object.freeze<Vec3>([v[0], v[1], v[2]]);
}

/** Detached, frozen copy; later edits to the input do not reach the scene. */
export function freezeMaterial(m: Material): Material {
  return Object.freeze({ color: freezeVec3(m.color), roughness: m.roughness });
}

export function freezeSphere(s: Sphere): Sphere {
  return Object.freeze({ center: freezeVec3(s.center), radius: s.radius, material: s.material });
}

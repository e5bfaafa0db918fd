// scene-builder.ts — Procedural demo scene: random spheres over a giant ground sphere

import { createRand } from './rand';
import { createScene, freezeMaterial, freezeSphere, type Material, type Scene, type Sphere } from './scene';

const PALETTE: Material[] = [
  { color: [0.75, 1.0, 0.75], roughness: 0.975 },
  { color: [0.0, 0.0, 1.0], roughness: 0.9 },
  { color: [1.0, 0.0, 0.0], roughness: 0.9 },
  { color: [0.0, 1.0, 0.0], roughness: 1.0 },
  { color: [1.0, 1.0, 0.0], roughness: 0.985 },
  { color: [0.0, 1.0, 1.0], roughness: 0.985 },
  { color: [1.0, 0.0, 1.0], roughness: 0.985 },
  { color: [1.0, 1.0, 1.0], roughness: 0.95 },
  { color: [0.25, 0.25, 1.0], roughness: 0.95 },
  { color: [1.0, 0.25, 0.25], roughness: 0.95 },
  { color: [0.5, 1.0, 0.25], roughness: 0.95 },
  { color: [1.0, 1.0, 0.25], roughness: 0.9 },
  { color: [0.25, 1.0, 1.0], roughness: 0.9 },
  { color: [1.0, 0.25, 1.0], roughness: 0.9 },
];

/** Palette cycled through by the demo spheres. Index 0 doubles as the ground. */
export const DEMO_MATERIALS: readonly Material[] = Object.freeze(PALETTE.map(freezeMaterial));

export interface DemoSceneOptions {
  /** Default 43. */
  seed?: number;
  /** Number of random spheres before the ground. Default 40. */
  sphereCount?: number;
}

export const GROUND_SPHERE: Sphere = freezeSphere({ center: [0, -1000, 5], radius: 999, material: 0 });

/**
 * Build the demo scene. Each sphere draws x, y, z, radius in that order:
 * x ∈ [-5, 5), y ∈ [0, 5), z ∈ [0, 10), radius ∈ [0, 1.25).
 * The ground sphere is always last.
 */
export function buildDemoScene(options: DemoSceneOptions = {}): Scene {
  const seed = options.seed ?? 43;
  const sphereCount = options.sphereCount ?? 40;
  if (!Number.isInteger(sphereCount) || sphereCount < 0) {
    throw new Error('sphereCount must be a non-negative integer');
  }

  const rand = createRand(seed);
  const spheres: Sphere[] = [];
  for (let i = 0; i < sphereCount; i++) {
    const x = ((rand() % 1000) - 500) * 0.01;
    const y = (rand() % 500) * 0.01;
    const z = (rand() % 1000) * 0.01;
    const radius = (rand() % 1000) * 0.00125;
    spheres.push({ center: [x, y, z], radius, material: i % DEMO_MATERIALS.length });
  }
  spheres.push(GROUND_SPHERE);

  return createScene(DEMO_MATERIALS, spheres);
}

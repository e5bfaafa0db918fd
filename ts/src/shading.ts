/**
 * Recursive shading integrator.
 *
 * Each call finds the nearest hit, shades it locally (diffuse with an
 * ambient floor, Blinn-Phong specular, hard shadow towards a directional
 * light) and, below the depth cap, traces one bounce along the surface
 * normal. Roughness blends local shading with the bounce; the specular
 * term is layered on last as a lerp towards white.
 *
 * Recursion depth is the only state threaded through calls. A miss and the
 * depth cap are the two terminal states.
 */

import { findNearestHit, isOccluded } from './hit-tester';
import type { Ray } from './intersect';
import type { Scene } from './scene';
import { DEFAULT_SHADING_CONFIG, type ResolvedShadingConfig } from './types';
import { add, dot, lerp, normalize, scale, WHITE, type Vec3 } from './vec3';

/**
 * Trace `ray` through `scene` and return its color.
 *
 * Hit selection measures distance from `cameraPosition` on every level of
 * the recursion, including bounces.
 */
export function shade(
  ray: Ray,
  scene: Scene,
  cameraPosition: Vec3,
  depth = 0,
  config: ResolvedShadingConfig = DEFAULT_SHADING_CONFIG,
): Vec3 {
  config.onShade?.(depth);

  const hit = findNearestHit(ray, scene, cameraPosition, config.epsilon);
  if (!hit) return config.skyColor;

  const { point, normal, eye, material } = hit;
  const light = config.lightDirection;

  let diffuse = Math.max(dot(normal, light), 0);

  const half = normalize(add(scale(eye, -1), light));
  let specular = Math.pow(Math.max(dot(normal, half), 0), config.specularExponent);

  const origin = add(point, scale(normal, config.shadowBias));
  if (isOccluded({ origin, direction: light }, scene.spheres, config.epsilon)) {
    diffuse = 0;
    specular = 0;
  }

  const diffuseColor = scale(material.color, Math.max(diffuse, config.ambient));

  if (depth < config.maxDepth) {
    const bounce = shade({ origin, direction: normal }, scene, cameraPosition, depth + 1, config);
    const r = material.roughness;
    return lerp(add(scale(diffuseColor, r), scale(bounce, 1 - r)), WHITE, specular);
  }

  return lerp(diffuseColor, WHITE, specular);
}

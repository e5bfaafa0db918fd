// Vector math
export type { Vec3 } from './vec3';
export {
  vec3, WHITE, dot, length, add, sub, mul, scale, normalize, distance, lerp, saturate,
} from './vec3';

// Scene model
export type { Material, Sphere, Scene } from './scene';
export { createScene, EMPTY_SCENE } from './scene';
export type { DemoSceneOptions } from './scene-builder';
export { buildDemoScene, DEMO_MATERIALS, GROUND_SPHERE } from './scene-builder';
export { createRand, RAND_MAX } from './rand';

// Core queries
export type { Ray } from './intersect';
export { intersect, INTERSECT_EPSILON } from './intersect';
export type { NearestHit } from './hit-tester';
export { findNearestHit, isOccluded } from './hit-tester';
export { shade } from './shading';

// Configuration
export type {
  ShadingConfig, ResolvedShadingConfig, RenderConfig, ResolvedRenderConfig, RenderStats,
} from './types';
export {
  resolveShadingConfig, resolveRenderConfig, DEFAULT_SHADING_CONFIG, DEFAULT_CAMERA_POSITION,
} from './types';

// Driver
export { nearPlanePoint, primaryRay } from './camera';
export type { Rgba8, RenderResult } from './renderer';
export { Framebuffer, render, toRgb8 } from './renderer';

import { INTERSECT_EPSILON } from './intersect';
import { length, normalize, type Vec3 } from './vec3';

/** Tuning parameters for {@link shade}. Every field is optional. */
export interface ShadingConfig {
  /** Direction towards the light. Normalized on resolve. Default (1, 1, -1). */
  lightDirection?: Vec3;
  /** Returned for rays that hit nothing. Default (0.75, 0.75, 1). */
  skyColor?: Vec3;
  /** Floor applied to the diffuse term. Default 0.15 */
  ambient?: number;
  /** Blinn-Phong exponent. Default 128 */
  specularExponent?: number;
  /** Recursion cap; a call at this depth does not bounce. Default 8 */
  maxDepth?: number;
  /** Offset along the normal for secondary rays. Default 0.001 */
  shadowBias?: number;
  /** Discriminant threshold passed to intersect(). Default 0.00001 */
  epsilon?: number;
  /** Called once per shade() invocation with its recursion depth. */
  onShade?: (depth: number) => void;
}

/** Shading config with all defaults applied. */
export interface ResolvedShadingConfig {
  lightDirection: Vec3;
  skyColor: Vec3;
  ambient: number;
  specularExponent: number;
  maxDepth: number;
  shadowBias: number;
  epsilon: number;
  onShade?: (depth: number) => void;
}

/** Options for {@link render}. */
export interface RenderConfig {
  width: number;
  height: number;
  /** Default (0, 0, -2). */
  cameraPosition?: Vec3;
  shading?: ShadingConfig;
  /** Called after each finished pixel column. */
  onProgress?: (columnsDone: number, width: number) => void;
}

export interface ResolvedRenderConfig {
  width: number;
  height: number;
  cameraPosition: Vec3;
  shading: ResolvedShadingConfig;
  onProgress?: (columnsDone: number, width: number) => void;
}

/** Live statistics from one {@link render} call. */
export interface RenderStats {
  pixelCount: number;
  shadeCalls: number;
  maxDepthReached: number;
  nonFinitePixels: number;
  elapsedMs: number;
}

export function resolveShadingConfig(config: ShadingConfig = {}): ResolvedShadingConfig {
  const light = config.lightDirection ?? [1, 1, -1];
  if (!(length(light) > 0)) {
    throw new Error('lightDirection must be a non-zero vector');
  }
  const maxDepth = config.maxDepth ?? 8;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new Error('maxDepth must be a non-negative integer');
  }
  const ambient = config.ambient ?? 0.15;
  if (ambient < 0) {
    throw new Error('ambient must be >= 0');
  }
  const specularExponent = config.specularExponent ?? 128;
  if (specularExponent < 0) {
    throw new Error('specularExponent must be >= 0');
  }
  return {
    lightDirection: normalize(light),
    skyColor: config.skyColor ?? [0.75, 0.75, 1],
    ambient,
    specularExponent,
    maxDepth,
    shadowBias: config.shadowBias ?? 0.001,
    epsilon: config.epsilon ?? INTERSECT_EPSILON,
    onShade: config.onShade,
  };
}

export const DEFAULT_SHADING_CONFIG: ResolvedShadingConfig = resolveShadingConfig();

export const DEFAULT_CAMERA_POSITION: Vec3 = [0, 0, -2];

export function resolveRenderConfig(config: RenderConfig): ResolvedRenderConfig {
  if (!Number.isInteger(config.width) || config.width <= 0) {
    throw new Error('width must be a positive integer');
  }
  if (!Number.isInteger(config.height) || config.height <= 0) {
    throw new Error('height must be a positive integer');
  }
  return {
    width: config.width,
    height: config.height,
    cameraPosition: config.cameraPosition ?? DEFAULT_CAMERA_POSITION,
    shading: resolveShadingConfig(config.shading),
    onProgress: config.onProgress,
  };
}

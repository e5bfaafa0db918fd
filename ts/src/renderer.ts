/**
 * CPU render driver.
 *
 * Walks every pixel (columns outer, rows inner), builds the primary ray,
 * shades it at depth 0 and stores the saturated color as 8-bit RGBA in an
 * in-memory {@link Framebuffer}. Nothing is written to disk or screen.
 */

import { primaryRay } from './camera';
import type { Scene } from './scene';
import { shade } from './shading';
import { resolveRenderConfig, type RenderConfig, type RenderStats, type ResolvedShadingConfig } from './types';
import { saturate, type Vec3 } from './vec3';

export type Rgba8 = [number, number, number, number];

/** Tightly packed RGBA8 image, row-major, origin top-left. */
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new Error(`invalid framebuffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);
  }

  setPixel(x: number, y: number, rgb: readonly [number, number, number]): void {
    const base = (y * this.width + x) * 4;
    this.data[base] = rgb[0];
    this.data[base + 1] = rgb[1];
    this.data[base + 2] = rgb[2];
    this.data[base + 3] = 255;
  }

  getPixel(x: number, y: number): Rgba8 {
    const base = (y * this.width + x) * 4;
    return [this.data[base], this.data[base + 1], this.data[base + 2], this.data[base + 3]];
  }
}

/**
 * Convert a linear color to 8-bit channels: saturate, scale by 255, truncate.
 * NaN channels become 0.
 */
export function toRgb8(color: Vec3): [number, number, number] {
  const channel = (c: number): number => {
    const v = Math.trunc(saturate(c) * 255);
    return Number.isFinite(v) ? v : 0;
  };
  return [channel(color[0]), channel(color[1]), channel(color[2])];
}

export interface RenderResult {
  framebuffer: Framebuffer;
  stats: RenderStats;
}

/** Render `scene` into a new framebuffer. Throws only on invalid config. */
export function render(scene: Scene, userConfig: RenderConfig): RenderResult {
  const config = resolveRenderConfig(userConfig);
  const { width, height, cameraPosition } = config;

  const stats: RenderStats = {
    pixelCount: 0,
    shadeCalls: 0,
    maxDepthReached: 0,
    nonFinitePixels: 0,
    elapsedMs: 0,
  };

  const userHook = config.shading.onShade;
  const shading: ResolvedShadingConfig = {
    ...config.shading,
    onShade: (depth) => {
      stats.shadeCalls++;
      if (depth > stats.maxDepthReached) stats.maxDepthReached = depth;
      userHook?.(depth);
    },
  };

  const framebuffer = new Framebuffer(width, height);
  const start = performance.now();

  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      const ray = primaryRay(x, y, width, height, cameraPosition);
      const color = shade(ray, scene, cameraPosition, 0, shading);
      if (!color.every(Number.isFinite)) stats.nonFinitePixels++;
      framebuffer.setPixel(x, y, toRgb8(color));
      stats.pixelCount++;
    }
    config.onProgress?.(x + 1, width);
  }

  stats.elapsedMs = performance.now() - start;

  if (stats.nonFinitePixels > 0) {
    console.warn(
      `[spheretrace] ${stats.nonFinitePixels} of ${stats.pixelCount} pixels produced a non-finite color; stored as black`,
    );
  }

  return { framebuffer, stats };
}

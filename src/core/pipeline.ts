// src/core/pipeline.ts — per-pixel evaluation of a frame snapshot on the CPU
import { cameraOrigin, lightPosition, pixelToScreen, rayDirection } from './camera';
import { createMarchResult, march } from './rayMarcher';
import { shade } from './shading';
import type { FrameSnapshot, MarchResult, RGB, Vec3 } from '@/state/types';

/** Values shared by every pixel of one frame, derived once from the snapshot. */
export interface FrameContext {
  readonly snapshot: FrameSnapshot;
  readonly origin: Readonly<Vec3>;
  readonly light: Readonly<Vec3>;
}

export interface PixelTarget {
  width: number;
  height: number;
  data: Uint8ClampedArray; // RGBA8, row 0 at the top
}

export function prepareFrame(snapshot: FrameSnapshot): FrameContext {
  return { snapshot, origin: cameraOrigin(snapshot.orientation), light: lightPosition(snapshot) };
}

/**
 * Color of pixel (px, py) at the snapshot's resolution. `scratch` is
 * overwritten; pass one per caller to reuse it across pixels.
 */
export function shadePixel(ctx: FrameContext, px: number, py: number, scratch: MarchResult = createMarchResult()): RGB {
  const { snapshot } = ctx;
  const [sx, sy] = pixelToScreen(px, py, snapshot.resolution.width, snapshot.resolution.height);
  const dir = rayDirection(sx, sy, snapshot);
  const result = march(ctx.origin, dir, snapshot, scratch);
  return shade(result, dir, ctx.light, snapshot);
}

/**
 * Renders rows [rowStart, rowEnd) of the target. The target may be smaller
 * than the snapshot's resolution; pixels are sampled at the matching
 * fraction of the frame.
 */
export function renderRows(ctx: FrameContext, target: PixelTarget, rowStart = 0, rowEnd = target.height): void {
  const { width: fw, height: fh } = ctx.snapshot.resolution;
  const sx = fw / Math.max(1, target.width);
  const sy = fh / Math.max(1, target.height);
  const scratch = createMarchResult();

  for (let y = rowStart; y < Math.min(rowEnd, target.height); y++) {
    for (let x = 0; x < target.width; x++) {
      // sample the center of the covered block
      const rgb = shadePixel(ctx, (x + 0.5) * sx - 0.5, (y + 0.5) * sy - 0.5, scratch);
      const j = (y * target.width + x) * 4;
      target.data[j] = Math.round(rgb[0] * 255);
      target.data[j + 1] = Math.round(rgb[1] * 255);
      target.data[j + 2] = Math.round(rgb[2] * 255);
      target.data[j + 3] = 255;
    }
  }
}

export function renderFrame(snapshot: FrameSnapshot, target: PixelTarget): void {
  renderRows(prepareFrame(snapshot), target);
}

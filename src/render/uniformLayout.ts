// src/render/uniformLayout.ts — fixed-layout per-frame parameter record (std140 `FrameParams`)
import type { FrameSnapshot } from '@/state/types';

/** Bump on any reordering or width change; the shader's block must match. */
export const FRAME_LAYOUT_VERSION = 1;
export const FRAME_UNIFORM_BYTES = 96;
export const FRAME_BLOCK_NAME = 'FrameParams';

type FieldKind = 'f32' | 'u32';

// byte offsets within the block
export const FRAME_LAYOUT = {
  resolution: { offset: 0, kind: 'f32', count: 2 },
  power: { offset: 8, kind: 'f32', count: 1 },
  rayStepCount: { offset: 12, kind: 'u32', count: 1 },
  mandelIterations: { offset: 16, kind: 'u32', count: 1 },
  maxMarchDistance: { offset: 20, kind: 'f32', count: 1 },
  hitThreshold: { offset: 24, kind: 'f32', count: 1 },
  cameraZoom: { offset: 28, kind: 'f32', count: 1 },
  paletteId: { offset: 32, kind: 'u32', count: 1 },
  lightX: { offset: 36, kind: 'f32', count: 1 },
  lightY: { offset: 40, kind: 'f32', count: 1 },
  backgroundGlowIntensity: { offset: 44, kind: 'f32', count: 1 },
  colorScale: { offset: 48, kind: 'f32', count: 1 },
  colorOffset: { offset: 52, kind: 'f32', count: 1 },
  aoStrength: { offset: 56, kind: 'f32', count: 1 },
  rimStrength: { offset: 60, kind: 'f32', count: 1 },
  orientation: { offset: 64, kind: 'f32', count: 4 },
  julia: { offset: 80, kind: 'f32', count: 4 },
} as const satisfies Record<string, { offset: number; kind: FieldKind; count: number }>;

/**
 * Writes the snapshot into `target` (allocated when omitted) in block order.
 * Multi-byte values are little-endian, as WebGL expects.
 */
export function packFrameUniforms(s: FrameSnapshot, target: ArrayBuffer = new ArrayBuffer(FRAME_UNIFORM_BYTES)): ArrayBuffer {
  if (target.byteLength < FRAME_UNIFORM_BYTES) {
    throw new RangeError(`uniform buffer needs ${FRAME_UNIFORM_BYTES} bytes, got ${target.byteLength}`);
  }
  const v = new DataView(target);
  const f = (offset: number, x: number) => v.setFloat32(offset, x, true);
  const u = (offset: number, x: number) => v.setUint32(offset, Math.max(0, Math.round(x)), true);
  const L = FRAME_LAYOUT;

  f(L.resolution.offset, s.resolution.width);
  f(L.resolution.offset + 4, s.resolution.height);
  f(L.power.offset, s.power);
  u(L.rayStepCount.offset, s.rayStepCount);
  u(L.mandelIterations.offset, s.mandelIterations);
  f(L.maxMarchDistance.offset, s.maxMarchDistance);
  f(L.hitThreshold.offset, s.hitThreshold);
  f(L.cameraZoom.offset, s.cameraZoom);
  u(L.paletteId.offset, s.paletteId);
  f(L.lightX.offset, s.lightX);
  f(L.lightY.offset, s.lightY);
  f(L.backgroundGlowIntensity.offset, s.backgroundGlowIntensity);
  f(L.colorScale.offset, s.colorScale);
  f(L.colorOffset.offset, s.colorOffset);
  f(L.aoStrength.offset, s.aoStrength);
  f(L.rimStrength.offset, s.rimStrength);

  const q = s.orientation;
  f(L.orientation.offset, q.x);
  f(L.orientation.offset + 4, q.y);
  f(L.orientation.offset + 8, q.z);
  f(L.orientation.offset + 12, q.w);

  const c = s.juliaConstant;
  f(L.julia.offset, c[0]);
  f(L.julia.offset + 4, c[1]);
  f(L.julia.offset + 8, c[2]);
  f(L.julia.offset + 12, s.juliaEnabled ? 1 : 0);
  return target;
}

/** Version the shader declares with `#define FRAME_LAYOUT_VERSION n`, or null. */
export function shaderLayoutVersion(source: string): number | null {
  const m = /^\s*#\s*define\s+FRAME_LAYOUT_VERSION\s+(\d+)\s*$/m.exec(source);
  return m ? Number(m[1]) : null;
}

export function assertLayoutVersion(source: string): void {
  const v = shaderLayoutVersion(source);
  if (v !== FRAME_LAYOUT_VERSION) {
    throw new Error(`Shader block ${FRAME_BLOCK_NAME} has layout version ${v ?? 'none'}, expected ${FRAME_LAYOUT_VERSION}.`);
  }
}

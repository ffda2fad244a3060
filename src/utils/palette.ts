// src/utils/palette.ts — palette ramps and the pure palette lookup
import { PaletteId } from '@/state/types';
import type { RGB } from '@/state/types';
import { clamp01, fract } from '@/math/vec3';

// Gradient stops for the piecewise ramps
type Stop = { t: number; rgb: [number, number, number] };

// a + b * cos(2π (c t + d)), per channel
type CosineRamp = { a: RGB; b: RGB; c: RGB; d: RGB };

const STANDARD: CosineRamp = { a: [0.5, 0.5, 0.5], b: [0.5, 0.5, 0.5], c: [1, 1, 1], d: [0.0, 0.33, 0.67] };

const cosineRamps: Partial<Record<PaletteId, CosineRamp>> = {
  [PaletteId.Standard]: STANDARD,
  [PaletteId.Neon]: { a: [0.5, 0.5, 0.5], b: [0.5, 0.5, 0.5], c: [2, 1, 1], d: [0.5, 0.2, 0.25] },
};

const stopRamps: Partial<Record<PaletteId, Stop[]>> = {
  [PaletteId.Fire]: [
    { t: 0, rgb: [0, 0, 0] },
    { t: 0.3, rgb: [180, 20, 0] },
    { t: 0.6, rgb: [255, 220, 0] },
    { t: 0.85, rgb: [255, 255, 255] },
    { t: 1, rgb: [0, 0, 0] }
  ],
  [PaletteId.Ice]: [
    { t: 0, rgb: [0, 7, 100] },
    { t: 0.35, rgb: [32, 107, 203] },
    { t: 0.7, rgb: [200, 240, 255] },
    { t: 0.9, rgb: [255, 255, 255] },
    { t: 1, rgb: [0, 7, 100] }
  ],
};

export function listPalettes(): PaletteId[] {
  return [PaletteId.Standard, PaletteId.Fire, PaletteId.Neon, PaletteId.Ice];
}

function cosineInterpolate(a: number, b: number, t: number) {
  const ct = (1 - Math.cos(Math.PI * t)) / 2;
  return a * (1 - ct) + b * ct;
}

function sampleStops(stops: Stop[], t: number): RGB {
  // find surrounding stops
  const idx = stops.findIndex(s => s.t >= t);
  const i1 = Math.min(stops.length - 1, Math.max(1, idx));
  const s0 = stops[i1 - 1];
  const s1 = stops[i1];
  const u = clamp01((t - s0.t) / Math.max(1e-6, s1.t - s0.t));
  const ch = (i: 0 | 1 | 2) => clamp01(cosineInterpolate(s0.rgb[i], s1.rgb[i], u) / 255);
  return [ch(0), ch(1), ch(2)];
}

function sampleCosine(r: CosineRamp, t: number): RGB {
  const ch = (i: 0 | 1 | 2) => clamp01(r.a[i] + r.b[i] * Math.cos(2 * Math.PI * (r.c[i] * t + r.d[i])));
  return [ch(0), ch(1), ch(2)];
}

/**
 * Maps a color index onto the selected ramp. The ramp position is
 * `fract(index * colorScale + colorOffset)`, so every ramp repeats.
 */
export function paletteColor(index: number, paletteId: PaletteId, colorScale: number, colorOffset: number): RGB {
  const t = fract(index * colorScale + colorOffset);
  const cosine = cosineRamps[paletteId];
  if (cosine) return sampleCosine(cosine, t);
  const stops = stopRamps[paletteId];
  if (stops) return sampleStops(stops, t);
  // unknown ids render with the standard ramp
  return sampleCosine(STANDARD, t);
}

/** RGBA8 strip of the ramp, used for the palette preview swatch. */
export function buildPaletteStrip(paletteId: PaletteId, size = 256): Uint8ClampedArray {
  const out = new Uint8ClampedArray(size * 4);
  for (let i = 0; i < size; i++) {
    const rgb = paletteColor(i / size, paletteId, 1, 0);
    const j = i * 4;
    out[j] = Math.round(rgb[0] * 255);
    out[j + 1] = Math.round(rgb[1] * 255);
    out[j + 2] = Math.round(rgb[2] * 255);
    out[j + 3] = 255;
  }
  return out;
}

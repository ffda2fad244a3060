import { describe, it, expect } from 'vitest';
import { ambientOcclusion, background, lambert, rimTerm, shade } from '@/core/shading';
import type { ShadingParameters } from '@/core/shading';
import { paletteColor } from '@/utils/palette';
import { PaletteId } from '@/state/types';
import type { MarchResult } from '@/state/types';

const style: ShadingParameters = {
  paletteId: PaletteId.Standard,
  colorScale: 1,
  colorOffset: 0,
  backgroundGlowIntensity: 0,
  aoStrength: 1,
  rimStrength: 0.5,
  rayStepCount: 100,
};

const hit = (over: Partial<MarchResult> = {}): MarchResult => ({
  hit: true,
  point: [0, 0, -1],
  normal: [0, 0, -1],
  steps: 0,
  distance: 4,
  trap: 0,
  ...over,
});

describe('background', () => {
  it('scales the base color by intensity', () => {
    expect(background(0)).toEqual([0, 0, 0]);
    const c = background(2);
    expect(c[0]).toBeCloseTo(0.16, 12);
    expect(c[1]).toBeCloseTo(0.2, 12);
    expect(c[2]).toBeCloseTo(0.32, 12);
  });

  it('clamps bright backgrounds', () => {
    expect(background(100)).toEqual([1, 1, 1]);
  });
});

describe('terms', () => {
  it('occludes in proportion to march steps', () => {
    expect(ambientOcclusion(50, 100, 1)).toBe(0.5);
    expect(ambientOcclusion(200, 100, 1)).toBe(0);
    expect(ambientOcclusion(80, 100, 0)).toBe(1);
  });

  it('puts rim light on silhouettes only', () => {
    expect(rimTerm([0, 0, -1], [0, 0, -1], 0.5)).toBe(0);
    expect(rimTerm([1, 0, 0], [0, 0, -1], 0.5)).toBe(0.5);
  });

  it('lights surfaces facing the light fully', () => {
    expect(lambert([0, 0, -1], [0, 0, -1], [0, 0, -5])).toBe(1);
    expect(lambert([0, 0, 1], [0, 0, -1], [0, 0, -5])).toBe(0);
  });
});

describe('shade', () => {
  it('returns the background for a miss', () => {
    expect(shade(hit({ hit: false }), [0, 0, 1], [0, 0, -5], { ...style, backgroundGlowIntensity: 2 })).toEqual(background(2));
  });

  it('returns the palette color for a fully lit, unoccluded, front-facing hit', () => {
    const rgb = shade(hit(), [0, 0, 1], [0, 0, -5], style);
    expect(rgb).toEqual(paletteColor(0, PaletteId.Standard, 1, 0));
    expect(rgb[0]).toBe(1);
  });

  it('keeps every channel in [0, 1]', () => {
    const extremes: ShadingParameters = { ...style, rimStrength: 2, aoStrength: 0 };
    for (const paletteId of [PaletteId.Standard, PaletteId.Fire, PaletteId.Neon, PaletteId.Ice]) {
      for (let trap = 0; trap < 2; trap += 0.05) {
        const rgb = shade(hit({ trap, normal: [0.6, 0, -0.8] }), [0, 0, 1], [0, 0, -5], { ...extremes, paletteId });
        for (const c of rgb) {
          expect(c).toBeGreaterThanOrEqual(0);
          expect(c).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it('is a pure function of its inputs', () => {
    const a = shade(hit({ trap: 0.42, steps: 7 }), [0, 0, 1], [2, 4, -5], style);
    const b = shade(hit({ trap: 0.42, steps: 7 }), [0, 0, 1], [2, 4, -5], style);
    expect(a).toEqual(b);
  });
});

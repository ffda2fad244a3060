import { describe, it, expect } from 'vitest';
import { buildPaletteStrip, listPalettes, paletteColor } from '@/utils/palette';
import { PaletteId } from '@/state/types';

describe('paletteColor', () => {
  it('starts the standard ramp at full red', () => {
    expect(paletteColor(0, PaletteId.Standard, 1, 0)[0]).toBe(1);
  });

  it('starts the fire ramp at black', () => {
    expect(paletteColor(0, PaletteId.Fire, 1, 0)).toEqual([0, 0, 0]);
  });

  it('reaches each gradient stop exactly', () => {
    const c = paletteColor(0.3, PaletteId.Fire, 1, 0);
    expect(c[0]).toBeCloseTo(180 / 255, 12);
    expect(c[1]).toBeCloseTo(20 / 255, 12);
    expect(c[2]).toBe(0);
  });

  it('applies scale and offset before wrapping', () => {
    for (const id of listPalettes()) {
      expect(paletteColor(0.25, id, 2, 0)).toEqual(paletteColor(0.5, id, 1, 0));
      expect(paletteColor(0, id, 1, 1)).toEqual(paletteColor(0, id, 1, 0));
      expect(paletteColor(3.2, id, 0.5, 0)).toEqual(paletteColor(1.6, id, 1, 0));
    }
  });

  it('does not overshoot white between equal stops', () => {
    expect(paletteColor(0.887, PaletteId.Fire, 1.7, 0.2)[0]).toBe(1);
    expect(paletteColor(0.926, PaletteId.Ice, 1.7, 0.2)[2]).toBe(1);
  });

  it('stays in [0, 1] and is repeatable', () => {
    for (const id of listPalettes()) {
      for (let i = -3; i < 3; i += 0.013) {
        const c = paletteColor(i, id, 1.7, 0.2);
        expect(c).toEqual(paletteColor(i, id, 1.7, 0.2));
        for (const ch of c) {
          expect(ch).toBeGreaterThanOrEqual(0);
          expect(ch).toBeLessThanOrEqual(1);
        }
      }
    }
  });
});

describe('buildPaletteStrip', () => {
  it('builds an opaque RGBA strip', () => {
    const strip = buildPaletteStrip(PaletteId.Ice, 16);
    expect(strip.length).toBe(64);
    expect(Array.from(strip.slice(0, 4))).toEqual([0, 7, 100, 255]);
    for (let i = 3; i < strip.length; i += 4) expect(strip[i]).toBe(255);
  });
});

import { describe, it, expect } from 'vitest';
import { march } from '@/core/rayMarcher';
import type { MarchParameters } from '@/core/rayMarcher';
import { normalize } from '@/math/vec3';
import type { Vec3 } from '@/state/types';

const params: MarchParameters = {
  power: 8,
  mandelIterations: 20,
  juliaEnabled: false,
  juliaConstant: [0.35, 0.35, -0.35],
  rayStepCount: 100,
  maxMarchDistance: 40,
  hitThreshold: 0.002,
};

const length = (v: Vec3) => Math.hypot(v[0], v[1], v[2]);

describe('march', () => {
  it('hits the bulb along the view axis', () => {
    const r = march([0, 0, -5], [0, 0, 1], params);
    expect(r.hit).toBe(true);
    expect(r.steps).toBe(2);
    expect(r.point[2]).toBeCloseTo(-5 + 0.5 * Math.log(5) * 5, 9);
    expect(length(r.normal)).toBeCloseTo(1, 9);
    expect(r.trap).toBeGreaterThan(0);
    expect(r.trap).toBeLessThan(1);
  });

  it('misses once the travelled distance passes the limit', () => {
    const r = march([0, 0, -5], [0, 0, -1], params);
    expect(r.hit).toBe(false);
    expect(r.steps).toBe(3);
    expect(r.distance).toBeGreaterThan(40);
  });

  it('never evaluates more than rayStepCount samples', () => {
    const dirs: Vec3[] = [];
    for (let i = 0; i < 24; i++) {
      const a = i * 0.37;
      dirs.push(normalize([Math.sin(a) * 0.4, Math.cos(a * 1.3) * 0.4, 1]));
    }
    for (const rayStepCount of [10, 37, 100]) {
      for (const power of [2, 8, 13.5]) {
        for (const dir of dirs) {
          const r = march([0, 0, -5], dir, { ...params, rayStepCount, power });
          expect(r.steps).toBeLessThanOrEqual(rayStepCount);
          expect(r.steps).toBeGreaterThan(0);
          if (!r.hit) expect(r.distance > params.maxMarchDistance || r.steps === rayStepCount).toBe(true);
        }
      }
    }
  });

  it('reuses the result object it is given', () => {
    const out = march([0, 0, -5], [0, 0, 1], params);
    const again = march([0, 0, -5], [0, 0, -1], params, out);
    expect(again).toBe(out);
    expect(again.hit).toBe(false);
  });
});

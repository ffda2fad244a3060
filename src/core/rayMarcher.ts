// src/core/rayMarcher.ts — sphere tracing over the distance field
import { createOrbitTrap, estimateDistance } from './distanceField';
import type { ShapeParameters } from './distanceField';
import type { FractalParameters, MarchResult, Vec3 } from '@/state/types';

export type MarchParameters = ShapeParameters &
  Pick<FractalParameters, 'rayStepCount' | 'maxMarchDistance' | 'hitThreshold'>;

export function createMarchResult(): MarchResult {
  return { hit: false, point: [0, 0, 0], normal: [0, 0, 0], steps: 0, distance: 0, trap: 0 };
}

/**
 * Central-difference gradient of the field at (x, y, z), normalized. Falls
 * back to `fallback` when the gradient vanishes.
 */
export function estimateNormal(x: number, y: number, z: number, eps: number, shape: ShapeParameters, fallback: Readonly<Vec3>, out: Vec3): Vec3 {
  const gx = estimateDistance(x + eps, y, z, shape) - estimateDistance(x - eps, y, z, shape);
  const gy = estimateDistance(x, y + eps, z, shape) - estimateDistance(x, y - eps, z, shape);
  const gz = estimateDistance(x, y, z + eps, shape) - estimateDistance(x, y, z - eps, shape);
  const len = Math.sqrt(gx * gx + gy * gy + gz * gz);
  if (len > 0 && Number.isFinite(len)) {
    out[0] = gx / len; out[1] = gy / len; out[2] = gz / len;
  } else {
    out[0] = fallback[0]; out[1] = fallback[1]; out[2] = fallback[2];
  }
  return out;
}

/**
 * Marches one ray through the field. Terminates after `rayStepCount`
 * evaluations or once the travelled distance exceeds `maxMarchDistance`;
 * both count as a miss. `direction` is expected to be unit length.
 */
export function march(origin: Readonly<Vec3>, direction: Readonly<Vec3>, params: MarchParameters, out: MarchResult = createMarchResult()): MarchResult {
  const trap = createOrbitTrap();
  let px = origin[0], py = origin[1], pz = origin[2];
  let traveled = 0;

  out.hit = false;
  out.trap = 0;

  for (let step = 0; step < params.rayStepCount; step++) {
    const d = estimateDistance(px, py, pz, params, trap);

    if (d < params.hitThreshold) {
      out.hit = true;
      out.steps = step + 1;
      out.distance = traveled;
      out.point[0] = px; out.point[1] = py; out.point[2] = pz;
      out.trap = trap.minRadius;
      const back: Vec3 = [-direction[0], -direction[1], -direction[2]];
      estimateNormal(px, py, pz, params.hitThreshold, params, back, out.normal);
      return out;
    }

    traveled += d;
    if (traveled > params.maxMarchDistance) {
      out.steps = step + 1;
      out.distance = traveled;
      return out;
    }

    px += direction[0] * d;
    py += direction[1] * d;
    pz += direction[2] * d;
  }

  out.steps = params.rayStepCount;
  out.distance = traveled;
  return out;
}

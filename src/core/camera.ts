// src/core/camera.ts — primary rays and light placement for a frame
import { normalize } from '@/math/vec3';
import type { FrameSnapshot, Quat, Vec3 } from '@/state/types';

/**
 * Rotates `v` by unit quaternion `q` without building a matrix. Runs once
 * per pixel, so it works on tuples instead of three's Vector3.
 */
export function rotateVec3(q: Readonly<Quat>, v: Readonly<Vec3>): Vec3 {
  // t = 2 * cross(q.xyz, v); v' = v + w * t + cross(q.xyz, t)
  const tx = 2 * (q.y * v[2] - q.z * v[1]);
  const ty = 2 * (q.z * v[0] - q.x * v[2]);
  const tz = 2 * (q.x * v[1] - q.y * v[0]);
  return [
    v[0] + q.w * tx + (q.y * tz - q.z * ty),
    v[1] + q.w * ty + (q.z * tx - q.x * tz),
    v[2] + q.w * tz + (q.x * ty - q.y * tx),
  ];
}

/** Camera sits this far from the fractal's center, looking at it. */
export const CAMERA_DISTANCE = 5;

/** Implicit depth of the point light on the camera side of the fractal. */
export const LIGHT_DEPTH = 5;

/**
 * Screen position of a pixel center, in units of the output height, with
 * +y up and (0, 0) in the middle. `py` counts rows from the top.
 */
export function pixelToScreen(px: number, py: number, width: number, height: number): [number, number] {
  const h = Math.max(1, height);
  return [(px + 0.5 - 0.5 * width) / h, (0.5 * height - (py + 0.5)) / h];
}

export function cameraOrigin(orientation: Readonly<Quat>): Vec3 {
  return rotateVec3(orientation, [0, 0, -CAMERA_DISTANCE]);
}

/** `cameraZoom` acts as focal length: larger values narrow the field of view. */
export function rayDirection(sx: number, sy: number, snapshot: Pick<FrameSnapshot, 'cameraZoom' | 'orientation'>): Vec3 {
  return rotateVec3(snapshot.orientation, normalize([sx, sy, snapshot.cameraZoom]));
}

export function lightPosition(snapshot: Pick<FrameSnapshot, 'lightX' | 'lightY' | 'orientation'>): Vec3 {
  return rotateVec3(snapshot.orientation, [snapshot.lightX, snapshot.lightY, -LIGHT_DEPTH]);
}

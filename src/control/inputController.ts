// src/control/inputController.ts — pointer drag to orientation
import { Quaternion } from 'three';
import { fromQuaternion, multiply, rotationX, rotationY, toQuaternion } from '@/math/quat';
import type { ParameterStore } from '@/state/parameterStore';
import type { Quat } from '@/state/types';

/** Radians per pixel of pointer motion. */
export const DRAG_SENSITIVITY = 0.005;

export function dragRotation(dx: number, dy: number): Quat {
  return multiply(rotationY(dx * DRAG_SENSITIVITY), rotationX(-dy * DRAG_SENSITIVITY));
}

/**
 * Collects pointer motion between control ticks. Motion only counts while
 * the drag button is held and the control panel is not capturing the pointer.
 */
export class InputController {
  private dragActive = false;
  private uiCapturing = false;
  private readonly pending = new Quaternion();
  private dirty = false;

  setDragActive(active: boolean) { this.dragActive = active; }

  setUiCapturing(capturing: boolean) {
    this.uiCapturing = capturing;
    if (capturing) this.dragActive = false;
  }

  get isDragging() { return this.dragActive && !this.uiCapturing; }

  /** Returns true when the motion was accepted. */
  pointerMoved(dx: number, dy: number): boolean {
    if (!this.isDragging) return false;
    if (!Number.isFinite(dx) || !Number.isFinite(dy) || (dx === 0 && dy === 0)) return false;
    this.pending.multiply(toQuaternion(dragRotation(dx, dy)));
    this.dirty = true;
    return true;
  }

  /** Composes the accumulated drag into the stored orientation. */
  flush(store: ParameterStore): boolean {
    if (!this.dirty) return false;
    store.getState().rotate(fromQuaternion(this.pending), 'local');
    this.pending.identity();
    this.dirty = false;
    return true;
  }
}

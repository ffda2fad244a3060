// src/render/frameLoop.ts — control tick, snapshot and dispatch once per frame
import { applyAnimation } from '@/control/animationDriver';
import type { InputController } from '@/control/inputController';
import type { ParameterStore } from '@/state/parameterStore';
import type { FrameSnapshot, Resolution } from '@/state/types';
import { renderCadence, takeSnapshot } from './frameSync';
import type { RenderCadence } from './frameSync';

/** Largest time step fed to the animation driver, so idle gaps do not jump the spin. */
export const MAX_FRAME_DT = 0.1;

export interface FrameScheduler {
  requestFrame(cb: (timeMs: number) => void): number;
  cancelFrame(id: number): void;
  setTimer(cb: () => void, ms: number): number;
  clearTimer(id: number): void;
}

export const browserScheduler: FrameScheduler = {
  requestFrame: cb => window.requestAnimationFrame(cb),
  cancelFrame: id => window.cancelAnimationFrame(id),
  setTimer: (cb, ms) => window.setTimeout(cb, ms),
  clearTimer: id => window.clearTimeout(id),
};

export type FrameLoopOpts = {
  store: ParameterStore;
  input: InputController;
  render: (snapshot: FrameSnapshot) => void;
  getResolution: () => Resolution;
  isFocused?: () => boolean;
  scheduler?: FrameScheduler;
  onError?: (e: unknown) => void;
};

/**
 * Drives the control path and hands the pixel stage exactly one snapshot per
 * frame. Store changes made outside a tick (control panel edits) mark the
 * loop dirty so reactive cadence picks them up on its next poll.
 */
export class FrameLoop {
  private readonly opts: FrameLoopOpts;
  private readonly scheduler: FrameScheduler;
  private running = false;
  private ticking = false;
  private dirty = true;
  private frameId: number | null = null;
  private timerId: number | null = null;
  private startMs: number | null = null;
  private lastMs: number | null = null;
  private unsubscribe: (() => void) | null = null;
  private frameCount = 0;
  private lastSnapshot: FrameSnapshot | null = null;

  constructor(opts: FrameLoopOpts) {
    this.opts = opts;
    this.scheduler = opts.scheduler ?? browserScheduler;
  }

  get frames() { return this.frameCount; }
  get snapshot() { return this.lastSnapshot; }
  get isRunning() { return this.running; }

  cadence(): RenderCadence {
    return renderCadence(this.opts.store.getState().animation, this.opts.isFocused?.() ?? true);
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.dirty = true;
    this.unsubscribe = this.opts.store.subscribe(() => this.invalidate());
    this.requestFrame();
  }

  stop() {
    this.running = false;
    if (this.frameId !== null) this.scheduler.cancelFrame(this.frameId);
    if (this.timerId !== null) this.scheduler.clearTimer(this.timerId);
    this.frameId = null;
    this.timerId = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Requests a render for a discrete external event (resize, input, focus). */
  invalidate() {
    if (this.ticking) return;
    this.dirty = true;
    if (!this.running) return;
    if (this.timerId !== null) {
      this.scheduler.clearTimer(this.timerId);
      this.timerId = null;
    }
    this.requestFrame();
  }

  private requestFrame() {
    if (this.frameId !== null) return;
    this.frameId = this.scheduler.requestFrame(t => {
      this.frameId = null;
      this.tick(t);
    });
  }

  private tick(nowMs: number) {
    if (!this.running) return;
    if (this.startMs === null) this.startMs = nowMs;
    const t = (nowMs - this.startMs) / 1000;
    const dt = this.lastMs === null ? 0 : Math.min(MAX_FRAME_DT, Math.max(0, (nowMs - this.lastMs) / 1000));
    this.lastMs = nowMs;

    const { store, input } = this.opts;
    this.ticking = true;
    try {
      input.flush(store);
      applyAnimation(store, t, dt);
    } finally {
      this.ticking = false;
    }

    const snapshot = takeSnapshot(store.getState().params, this.opts.getResolution());
    this.dirty = false;
    this.lastSnapshot = snapshot;
    try {
      this.opts.render(snapshot);
    } catch (e) {
      if (this.opts.onError) this.opts.onError(e);
      else console.error('[frame-loop] render failed', e);
    }
    this.frameCount++;
    this.scheduleNext();
  }

  private scheduleNext() {
    // a frame already requested (e.g. invalidated during render) covers this one
    if (!this.running || this.frameId !== null) return;
    if (this.timerId !== null) this.scheduler.clearTimer(this.timerId);
    this.timerId = null;
    const cadence = this.cadence();
    if (cadence.mode === 'continuous') {
      this.requestFrame();
      return;
    }
    this.timerId = this.scheduler.setTimer(() => {
      this.timerId = null;
      if (this.dirty) this.requestFrame();
      else this.scheduleNext();
    }, cadence.waitMs);
  }
}

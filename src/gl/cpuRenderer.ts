// src/gl/cpuRenderer.ts — 2D-canvas fallback that runs the TypeScript pipeline when WebGL2 is missing
import { renderFrame } from '@/core/pipeline';
import type { FrameSnapshot, Resolution } from '@/state/types';
import { canvasResolution } from './renderer';
import type { FrameRenderer } from './renderer';

// The CPU path is far slower than the shader; trade resolution for frame rate.
const CPU_SCALE = 0.25;
const CPU_PREVIEW_SCALE = 0.125;

export type CpuRendererOpts = {
  canvas: HTMLCanvasElement;
};

export class CpuRenderer implements FrameRenderer {
  readonly kind = 'cpu';
  readonly canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D;
  private image: ImageData | null = null;
  private scale = CPU_SCALE;
  private paused = false;

  constructor(opts: CpuRendererOpts) {
    const ctx = opts.canvas.getContext('2d');
    if (!ctx) throw new Error('Canvas 2D context unavailable.');
    this.canvas = opts.canvas;
    this.ctx = ctx;
    console.info('[renderer] Using CPU fallback');
  }

  targetResolution(): Resolution {
    // ignore device pixel ratio: the fallback renders well below CSS size anyway
    return canvasResolution(this.canvas, this.scale / Math.max(1, Math.min(3, window.devicePixelRatio || 1)));
  }

  render(snapshot: FrameSnapshot) {
    if (this.paused) return;
    const { width, height } = snapshot.resolution;
    if (this.canvas.width !== width || this.canvas.height !== height) {
      this.canvas.width = width;
      this.canvas.height = height;
      this.image = null;
    }
    if (!this.image) this.image = this.ctx.createImageData(width, height);
    renderFrame(snapshot, { width, height, data: this.image.data });
    this.ctx.putImageData(this.image, 0, 0);
  }

  withPreview(on: boolean) {
    this.scale = on ? CPU_PREVIEW_SCALE : CPU_SCALE;
  }

  pause(p: boolean) {
    this.paused = p;
  }

  dispose() {
    this.image = null;
  }
}

// src/gl/renderer.ts — WebGL2 renderer: one uniform-block upload and one full-screen draw per frame
import fragSource from './mandelbulb.frag?raw';
import { FRAME_BLOCK_NAME, FRAME_UNIFORM_BYTES, assertLayoutVersion, packFrameUniforms } from '@/render/uniformLayout';
import type { FrameSnapshot, Resolution } from '@/state/types';

export interface FrameRenderer {
  readonly kind: 'webgl2' | 'cpu';
  /** Pixel size the next frame should be rendered at. */
  targetResolution(): Resolution;
  render(snapshot: FrameSnapshot): void;
  withPreview(on: boolean): void;
  pause(p: boolean): void;
  dispose(): void;
}

const FRAME_BLOCK_BINDING = 0;

const vertexSource = `#version 300 es
precision highp float;
layout(location=0) in vec2 a_pos;
void main() {
  gl_Position = vec4(a_pos, 0.0, 1.0);
}`;

/** Backing-store size for the canvas's CSS box at the current device pixel ratio. */
export function canvasResolution(canvas: HTMLCanvasElement, scale = 1): Resolution {
  const dpr = Math.max(1, Math.min(3, window.devicePixelRatio || 1)) * scale;
  return {
    width: Math.max(1, Math.floor(canvas.clientWidth * dpr)),
    height: Math.max(1, Math.floor(canvas.clientHeight * dpr)),
  };
}

function normalizeShaderSource(src: string): string {
  // Move any #version line to the very top
  const lines = src.replace(/^\uFEFF/, '').split('\n');
  let versionLine = '';
  const rest: string[] = [];
  for (const line of lines) {
    if (!versionLine && /^\s*#\s*version\b/.test(line)) versionLine = line.trim();
    else rest.push(line);
  }
  if (!/^\s*#\s*version\s+300\s+es\b/.test(versionLine)) versionLine = '#version 300 es';
  return `${versionLine}\n${rest.join('\n')}`;
}

function createGL(canvas: HTMLCanvasElement): WebGL2RenderingContext {
  const gl2 = canvas.getContext('webgl2', { antialias: false, preserveDrawingBuffer: false });
  if (!gl2) throw new Error('WebGL2 is required for these shaders (#version 300 es).');
  return gl2;
}

function createShader(gl: WebGL2RenderingContext, type: number, source: string): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) throw new Error('Shader allocation failed.');
  const processed = normalizeShaderSource(source);
  gl.shaderSource(shader, processed);
  gl.compileShader(shader);
  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader) || 'unknown';
    console.error('[renderer] Shader compilation failed:\n', log, '\n--- Processed source ---\n', processed);
    gl.deleteShader(shader);
    throw new Error(`Shader compile error: ${log}`);
  }
  return shader;
}

function createProgram(gl: WebGL2RenderingContext, vsSource: string, fsSource: string): WebGLProgram {
  const program = gl.createProgram();
  if (!program) throw new Error('Program allocation failed.');
  const vs = createShader(gl, gl.VERTEX_SHADER, vsSource);
  const fs = createShader(gl, gl.FRAGMENT_SHADER, fsSource);
  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  gl.linkProgram(program);
  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program) || 'unknown';
    console.error('[renderer] Program link failed:\n', log);
    gl.deleteProgram(program);
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new Error(`Program link error: ${log}`);
  }
  gl.detachShader(program, vs);
  gl.detachShader(program, fs);
  gl.deleteShader(vs);
  gl.deleteShader(fs);
  return program;
}

export type GLRendererOpts = {
  canvas: HTMLCanvasElement;
};

export class GLRenderer implements FrameRenderer {
  readonly kind = 'webgl2';
  readonly canvas: HTMLCanvasElement;
  private gl: WebGL2RenderingContext;
  private program: WebGLProgram;
  private vao: WebGLVertexArrayObject;
  private ubo: WebGLBuffer;
  private quad: WebGLBuffer;
  // reused every frame; the record never changes size
  private uniformData = new ArrayBuffer(FRAME_UNIFORM_BYTES);
  private previewScale = 1.0;
  private paused = false;

  constructor(opts: GLRendererOpts) {
    this.canvas = opts.canvas;
    this.gl = createGL(opts.canvas);
    console.info('[renderer] Using WebGL2');
    const gl = this.gl;

    assertLayoutVersion(fragSource);
    this.program = createProgram(gl, vertexSource, fragSource);

    const blockIndex = gl.getUniformBlockIndex(this.program, FRAME_BLOCK_NAME);
    if (blockIndex === gl.INVALID_INDEX) throw new Error(`Uniform block ${FRAME_BLOCK_NAME} not found in shader.`);
    const blockSize: unknown = gl.getActiveUniformBlockParameter(this.program, blockIndex, gl.UNIFORM_BLOCK_DATA_SIZE);
    if (typeof blockSize === 'number' && blockSize < FRAME_UNIFORM_BYTES) {
      throw new Error(`Uniform block ${FRAME_BLOCK_NAME} is ${blockSize} bytes, expected ${FRAME_UNIFORM_BYTES}.`);
    }
    gl.uniformBlockBinding(this.program, blockIndex, FRAME_BLOCK_BINDING);

    const ubo = gl.createBuffer();
    if (!ubo) throw new Error('Uniform buffer allocation failed.');
    gl.bindBuffer(gl.UNIFORM_BUFFER, ubo);
    gl.bufferData(gl.UNIFORM_BUFFER, FRAME_UNIFORM_BYTES, gl.DYNAMIC_DRAW);
    gl.bindBufferBase(gl.UNIFORM_BUFFER, FRAME_BLOCK_BINDING, ubo);
    this.ubo = ubo;

    const vao = gl.createVertexArray();
    const vbo = gl.createBuffer();
    if (!vao || !vbo) throw new Error('Vertex buffer allocation failed.');
    gl.bindVertexArray(vao);
    const quad = new Float32Array([
      -1, -1,  1, -1, -1, 1,
      -1,  1,  1, -1,  1, 1
    ]);
    gl.bindBuffer(gl.ARRAY_BUFFER, vbo);
    gl.bufferData(gl.ARRAY_BUFFER, quad, gl.STATIC_DRAW);
    gl.enableVertexAttribArray(0);
    gl.vertexAttribPointer(0, 2, gl.FLOAT, false, 0, 0);
    this.vao = vao;
    this.quad = vbo;
  }

  targetResolution(): Resolution {
    return canvasResolution(this.canvas, this.previewScale);
  }

  setSize(width: number, height: number) {
    const { gl, canvas } = this;
    if (canvas.width !== width || canvas.height !== height) {
      canvas.width = width;
      canvas.height = height;
    }
    gl.viewport(0, 0, width, height);
  }

  render(snapshot: FrameSnapshot) {
    if (this.paused) return;
    const { gl } = this;
    this.setSize(snapshot.resolution.width, snapshot.resolution.height);

    gl.useProgram(this.program);
    packFrameUniforms(snapshot, this.uniformData);
    gl.bindBuffer(gl.UNIFORM_BUFFER, this.ubo);
    gl.bufferSubData(gl.UNIFORM_BUFFER, 0, this.uniformData);

    gl.bindVertexArray(this.vao);
    gl.drawArrays(gl.TRIANGLES, 0, 6);
  }

  withPreview(on: boolean) {
    this.previewScale = on ? 0.5 : 1.0;
  }

  pause(p: boolean) {
    this.paused = p;
  }

  dispose() {
    const { gl } = this;
    gl.deleteBuffer(this.ubo);
    gl.deleteBuffer(this.quad);
    gl.deleteVertexArray(this.vao);
    gl.deleteProgram(this.program);
  }
}

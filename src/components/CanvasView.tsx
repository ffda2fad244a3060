// src/components/CanvasView.tsx — canvas view, drag rotation and the frame loop
import React, { useEffect, useRef, useState } from 'react';
import { GLRenderer } from '@/gl/renderer';
import type { FrameRenderer } from '@/gl/renderer';
import { CpuRenderer } from '@/gl/cpuRenderer';
import { FrameLoop } from '@/render/frameLoop';
import type { InputController } from '@/control/inputController';
import { fractalStore, useFractalState } from '@/state/useFractalState';

type Backend = FrameRenderer['kind'];

// Error Boundary class
class CanvasErrorBoundary extends React.Component<React.PropsWithChildren, { hasError: boolean; message?: string }> {
	constructor(props: React.PropsWithChildren) {
		super(props);
		this.state = { hasError: false };
	}
	static getDerivedStateFromError(err: unknown) {
		return { hasError: true, message: err instanceof Error ? err.message : String(err) };
	}
	componentDidCatch(error: unknown, info: React.ErrorInfo) {
		console.error('[CanvasErrorBoundary]', error, info);
	}
	render() {
		if (this.state.hasError) {
			return (
				<div role="alert" style={{ padding: 12, color: '#b00020' }}>
					Something went wrong in the canvas{this.state.message ? `: ${this.state.message}` : '.'}
				</div>
			);
		}
		return this.props.children;
	}
}

function createRenderer(backend: Backend, canvas: HTMLCanvasElement): FrameRenderer {
  return backend === 'webgl2' ? new GLRenderer({ canvas }) : new CpuRenderer({ canvas });
}

type CanvasViewProps = {
  input: InputController;
  uiHidden: boolean;
  onShowUI: () => void;
};

function CanvasViewInner({ input, uiHidden, onShowUI }: CanvasViewProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const rendererRef = useRef<FrameRenderer | null>(null);
  const loopRef = useRef<FrameLoop | null>(null);
  const lastPointer = useRef<{ x: number; y: number } | null>(null);
  const [backend, setBackend] = useState<Backend>('webgl2');

  const power = useFractalState(s => s.params.power);
  const iterations = useFractalState(s => s.params.mandelIterations);
  const julia = useFractalState(s => s.params.juliaEnabled);

  // init renderer and frame loop; a fresh canvas is mounted per backend
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    let renderer: FrameRenderer;
    try {
      renderer = createRenderer(backend, canvas);
    } catch (e) {
      if (backend === 'webgl2') {
        console.error('[renderer] WebGL2 setup failed, falling back to CPU', e);
        setBackend('cpu');
        return;
      }
      throw e;
    }
    rendererRef.current = renderer;

    const loop = new FrameLoop({
      store: fractalStore,
      input,
      render: snapshot => renderer.render(snapshot),
      getResolution: () => renderer.targetResolution(),
      isFocused: () => document.hasFocus(),
    });
    loopRef.current = loop;
    loop.start();

    const invalidate = () => loop.invalidate();
    const onVisibility = () => {
      // hidden frames are skipped, not queued
      renderer.pause(document.visibilityState === 'hidden');
      loop.invalidate();
    };
    const ro = new ResizeObserver(invalidate);
    ro.observe(canvas);
    window.addEventListener('focus', invalidate);
    window.addEventListener('blur', invalidate);
    document.addEventListener('visibilitychange', onVisibility);

    return () => {
      loop.stop();
      ro.disconnect();
      window.removeEventListener('focus', invalidate);
      window.removeEventListener('blur', invalidate);
      document.removeEventListener('visibilitychange', onVisibility);
      renderer.dispose();
      rendererRef.current = null;
      loopRef.current = null;
    };
  }, [backend, input]);

  // layout changes when the panel is toggled
  useEffect(() => {
    loopRef.current?.invalidate();
  }, [uiHidden]);

  const onPointerDown = (e: React.PointerEvent<HTMLCanvasElement>) => {
    if (e.button !== 0) return;
    e.currentTarget.setPointerCapture(e.pointerId);
    lastPointer.current = { x: e.clientX, y: e.clientY };
    input.setDragActive(true);
    rendererRef.current?.withPreview(true);
  };

  const onPointerMove = (e: React.PointerEvent<HTMLCanvasElement>) => {
    const last = lastPointer.current;
    if (!last) return;
    const dx = e.clientX - last.x;
    const dy = e.clientY - last.y;
    lastPointer.current = { x: e.clientX, y: e.clientY };
    if (input.pointerMoved(dx, dy)) loopRef.current?.invalidate();
  };

  const onPointerUp = (e: React.PointerEvent<HTMLCanvasElement>) => {
    if (e.currentTarget.hasPointerCapture(e.pointerId)) e.currentTarget.releasePointerCapture(e.pointerId);
    lastPointer.current = null;
    input.setDragActive(false);
    rendererRef.current?.withPreview(false);
    loopRef.current?.invalidate();
  };

  return (
    <div
      className="canvas-wrap"
      aria-label="Fractal viewport"
      style={{
        // When UI is hidden, let the canvas take the whole screen
        position: uiHidden ? 'fixed' : 'relative',
        inset: uiHidden ? 0 : undefined,
        zIndex: uiHidden ? 0 : undefined,
      }}
    >
      <canvas
        key={backend}
        ref={canvasRef}
        onPointerDown={onPointerDown}
        onPointerMove={onPointerMove}
        onPointerUp={onPointerUp}
        onPointerCancel={onPointerUp}
        style={{
          display: 'block',
          width: '100%',
          height: '100%',
          touchAction: 'none',
          imageRendering: backend === 'cpu' ? 'pixelated' : undefined,
        }}
      />
      {uiHidden && (
        <button
          onClick={onShowUI}
          title="Show UI (press H)"
          style={{
            position: 'absolute',
            top: 12,
            right: 12,
            zIndex: 1000,
            padding: '6px 10px',
            borderRadius: 6,
            border: '1px solid rgba(255,255,255,0.3)',
            background: 'rgba(0,0,0,0.5)',
            color: '#fff',
            cursor: 'pointer'
          }}
        >
          Show UI (H)
        </button>
      )}
      <div className="overlay">
        <div className="badge">
          {julia ? 'julia' : 'bulb'} | iter {iterations} | p={power.toFixed(2)} | {backend}
        </div>
      </div>
    </div>
  );
}

export default function CanvasView(props: CanvasViewProps) {
	return (
		<CanvasErrorBoundary>
			<CanvasViewInner {...props} />
		</CanvasErrorBoundary>
	);
}

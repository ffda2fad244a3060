// src/App.tsx — application root; composes CanvasView and Sidebar around one input controller
import React, { useEffect, useMemo, useState } from 'react';
import CanvasView from './components/CanvasView';
import Sidebar from './components/Sidebar';
import { InputController } from './control/inputController';
import { fractalStore } from './state/useFractalState';

export default function App() {
  // shared so the panel can tell the canvas when it holds the pointer
  const input = useMemo(() => new InputController(), []);
  const [showUI, setShowUI] = useState(true);

  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      if (['INPUT', 'TEXTAREA', 'SELECT'].includes(document.activeElement?.tagName || '')) return;
      if (e.key === 'h' || e.key === 'H') setShowUI(v => !v);
      if (e.key === 'r' || e.key === 'R') fractalStore.getState().reset();
      if (e.key === 'f' || e.key === 'F') {
        const toggle = document.fullscreenElement ? document.exitFullscreen() : document.documentElement.requestFullscreen();
        toggle.catch((err: unknown) => console.warn('[app] fullscreen toggle failed', err));
      }
    };
    window.addEventListener('keydown', onKey, { passive: true });
    return () => window.removeEventListener('keydown', onKey);
  }, []);

  return (
    <div className="app">
      <CanvasView input={input} uiHidden={!showUI} onShowUI={() => setShowUI(true)} />
      {showUI ? <Sidebar input={input} onHide={() => setShowUI(false)} /> : null}
    </div>
  );
}

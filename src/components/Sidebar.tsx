// src/components/Sidebar.tsx — control panel grouped as Shape / Quality / Camera / Animation / Visual Style / Lighting / Julia Folding
import React, { useEffect, useMemo, useRef } from 'react';
import { fractalStore, useFractalState } from '@/state/useFractalState';
import { animatedFields } from '@/state/parameterStore';
import type { ScalarParam } from '@/state/parameterStore';
import { ANIMATION_RANGES, JULIA_RANGE, PALETTE_NAMES, PARAMETER_RANGES, isPaletteId } from '@/state/ranges';
import type { PaletteId } from '@/state/types';
import { buildPaletteStrip, listPalettes } from '@/utils/palette';
import type { InputController } from '@/control/inputController';

type SliderProps = {
  label: string;
  min: number;
  max: number;
  step: number;
  value: number;
  disabled?: boolean;
  logarithmic?: boolean;
  onChange: (v: number) => void;
};

function Slider({ label, min, max, step, value, disabled, logarithmic, onChange }: SliderProps) {
  // log sliders move along log10(value)
  const toSlider = (v: number) => logarithmic ? Math.log10(v) : v;
  const fromSlider = (v: number) => logarithmic ? Math.pow(10, v) : v;
  const digits = step >= 1 ? 0 : Math.min(4, Math.ceil(-Math.log10(step)));
  return (
    <div className="row">
      <label>{label}</label>
      <input
        type="range"
        min={toSlider(min)}
        max={toSlider(max)}
        step={logarithmic ? 0.01 : step}
        value={toSlider(value)}
        disabled={disabled}
        onChange={e => onChange(fromSlider(parseFloat(e.target.value)))}
      />
      <span className="coords">{value.toFixed(digits)}</span>
    </div>
  );
}

function ParamSlider({ name }: { name: ScalarParam }) {
  const value = useFractalState(s => s.params[name]);
  const locked = useFractalState(s => animatedFields(s.animation).has(name));
  const r = PARAMETER_RANGES[name];
  return (
    <Slider
      label={r.label}
      min={r.min}
      max={r.max}
      step={r.step}
      value={value}
      logarithmic={r.logarithmic}
      disabled={locked}
      onChange={v => fractalStore.getState().setParam(name, v)}
    />
  );
}

function PaletteSwatch({ paletteId }: { paletteId: PaletteId }) {
  const ref = useRef<HTMLCanvasElement | null>(null);
  const strip = useMemo(() => buildPaletteStrip(paletteId), [paletteId]);
  useEffect(() => {
    const ctx = ref.current?.getContext('2d');
    if (!ctx) return;
    const img = ctx.createImageData(strip.length / 4, 1);
    img.data.set(strip);
    ctx.putImageData(img, 0, 0);
  }, [strip]);
  return <canvas ref={ref} width={strip.length / 4} height={1} style={{ width: '100%', height: 10 }} />;
}

export default function Sidebar({ input, onHide }: { input: InputController; onHide: () => void }) {
  const animation = useFractalState(s => s.animation);
  const paletteId = useFractalState(s => s.params.paletteId);
  const juliaEnabled = useFractalState(s => s.params.juliaEnabled);
  const juliaConstant = useFractalState(s => s.params.juliaConstant);
  const setAnimation = useFractalState(s => s.setAnimation);
  const setPalette = useFractalState(s => s.setPalette);
  const setJuliaEnabled = useFractalState(s => s.setJuliaEnabled);
  const setJuliaConstant = useFractalState(s => s.setJuliaConstant);
  const palettes = useMemo(listPalettes, []);

  // the panel no longer holds the pointer once it is gone
  useEffect(() => () => input.setUiCapturing(false), [input]);

  const setJuliaAxis = (i: 0 | 1 | 2, v: number) => {
    const next: [number, number, number] = [juliaConstant[0], juliaConstant[1], juliaConstant[2]];
    next[i] = v;
    setJuliaConstant(next);
  };

  const copyPermalink = () => {
    navigator.clipboard.writeText(location.href).catch((e: unknown) => console.warn('[sidebar] clipboard write failed', e));
  };

  return (
    <aside
      className="sidebar"
      aria-label="Controls"
      onPointerEnter={() => input.setUiCapturing(true)}
      onPointerLeave={() => input.setUiCapturing(false)}
    >
      <div className="header">
        <strong>Bulb Explorer</strong>
        <div>
          <button onClick={onHide}>Hide UI</button>
        </div>
      </div>

      <div className="helper" role="note">
        Drag: rotate. H: toggle UI. R: reset. F: fullscreen.
      </div>

      <div className="section">
        <h3>Shape</h3>
        <ParamSlider name="power" />
        <ParamSlider name="mandelIterations" />
      </div>

      <div className="section">
        <h3>Rendering Quality</h3>
        <ParamSlider name="rayStepCount" />
        <ParamSlider name="hitThreshold" />
        <ParamSlider name="maxMarchDistance" />
      </div>

      <div className="section">
        <h3>Camera</h3>
        <ParamSlider name="cameraZoom" />
        <Slider
          label="Rotation Speed"
          {...ANIMATION_RANGES.rotationSpeed}
          value={animation.rotationSpeed}
          onChange={v => setAnimation({ rotationSpeed: v })}
        />
      </div>

      <div className="section">
        <h3>Animations</h3>
        <div className="row">
          <label><input type="checkbox" checked={animation.animatePower} onChange={e => setAnimation({ animatePower: e.target.checked })} /> Auto-Animate Power</label>
          <span />
        </div>
        {animation.animatePower && (
          <Slider label="Power Speed" {...ANIMATION_RANGES.powerSpeed} value={animation.powerSpeed} onChange={v => setAnimation({ powerSpeed: v })} />
        )}
        <div className="row">
          <label><input type="checkbox" checked={animation.animateZoom} onChange={e => setAnimation({ animateZoom: e.target.checked })} /> Auto-Animate Zoom</label>
          <span />
        </div>
        {animation.animateZoom && (
          <Slider label="Zoom Speed" {...ANIMATION_RANGES.zoomSpeed} value={animation.zoomSpeed} onChange={v => setAnimation({ zoomSpeed: v })} />
        )}
      </div>

      <div className="section">
        <h3>Visual Style</h3>
        <ParamSlider name="backgroundGlowIntensity" />
        <div className="row">
          <label>Color Palette</label>
          <select value={paletteId} onChange={e => {
            const id = parseInt(e.target.value, 10);
            if (isPaletteId(id)) setPalette(id);
          }}>
            {palettes.map(p => <option key={p} value={p}>{PALETTE_NAMES[p]}</option>)}
          </select>
        </div>
        <PaletteSwatch paletteId={paletteId} />
        <ParamSlider name="colorScale" />
        <ParamSlider name="colorOffset" />
      </div>

      <div className="section">
        <h3>Lighting</h3>
        <ParamSlider name="lightX" />
        <ParamSlider name="lightY" />
        <ParamSlider name="aoStrength" />
        <ParamSlider name="rimStrength" />
      </div>

      <div className="section">
        <h3>Julia Folding</h3>
        <div className="row">
          <label><input type="checkbox" checked={juliaEnabled} onChange={e => setJuliaEnabled(e.target.checked)} /> Enable Julia Mode</label>
          <span />
        </div>
        {juliaEnabled && (['X', 'Y', 'Z'] as const).map((axis, i) => (
          <Slider
            key={axis}
            label={`Constant K ${axis}`}
            {...JULIA_RANGE}
            value={juliaConstant[i]}
            onChange={v => setJuliaAxis(i === 0 ? 0 : i === 1 ? 1 : 2, v)}
          />
        ))}
      </div>

      <div className="section">
        <div className="footer">
          <button onClick={() => fractalStore.getState().reset()}>Reset</button>
          <button onClick={copyPermalink}>Copy permalink</button>
        </div>
      </div>
    </aside>
  );
}

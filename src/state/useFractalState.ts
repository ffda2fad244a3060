// src/state/useFractalState.ts — the app's single parameter store, its React hook and URL sync
import { useStore } from 'zustand';
import { createParameterStore } from './parameterStore';
import type { FractalStoreState } from './parameterStore';
import { parseUrlState, pushUrlState, serializeState } from '@/utils/urlState';

const URL_SYNC_MS = 500;

export const fractalStore = createParameterStore(parseUrlState(location.search));

export function useFractalState<T>(selector: (s: FractalStoreState) => T): T {
  return useStore(fractalStore, selector);
}

// Orientation changes every frame while spinning; write the URL at most twice a second.
let lastQuery = '';
let urlTimer: number | null = null;
fractalStore.subscribe(() => {
  if (urlTimer !== null) return;
  urlTimer = window.setTimeout(() => {
    urlTimer = null;
    const { params, animation } = fractalStore.getState();
    const qs = serializeState(params, animation);
    if (qs === lastQuery) return;
    lastQuery = qs;
    try {
      pushUrlState(qs);
    } catch (e) {
      console.warn('[url-state] could not update the address bar', e);
    }
  }, URL_SYNC_MS);
});

import { describe, it, expect, beforeEach } from 'vitest';
import type { StoreApi } from 'zustand/vanilla';
import { createWindingStore } from './useWindingStore';
import type { WindingStore } from './useWindingStore';
import { DEFAULT_PARAMS } from '../config/defaults';
import { KicadSink } from '../utils/kicadExport';

describe('useWindingStore', () => {
  let store: StoreApi<WindingStore>;

  beforeEach(() => {
    store = createWindingStore();
  });

  it('starts with a preview of the defaults', () => {
    const { params, layer, preview, error } = store.getState();

    expect(params).toEqual(DEFAULT_PARAMS);
    expect(layer).toBe('F.Cu');
    expect(preview?.laps).toHaveLength(DEFAULT_PARAMS.turns);
    expect(error).toBeNull();
  });

  describe('params', () => {
    it('recomputes the preview on every edit', () => {
      store.getState().setParams({ turns: 2 });

      expect(store.getState().params.turns).toBe(2);
      expect(store.getState().preview?.laps).toHaveLength(2);
    });

    it('turns winding errors into an error instead of a preview', () => {
      store.getState().setParams({ turns: 100 });

      expect(store.getState().preview).toBeNull();
      expect(store.getState().error?.kind).toBe('invalid-geometry');
    });

    it('clears the error once the parameters fit again', () => {
      store.getState().setParams({ turns: 100 });
      store.getState().setParams({ turns: 3 });

      expect(store.getState().error).toBeNull();
      expect(store.getState().preview?.laps).toHaveLength(3);
    });

    it('edits the window field by field', () => {
      store.getState().setWindow({ cornerRadius: 0 });
      expect(store.getState().params.window).toEqual({ width: 20, height: 16, cornerRadius: 0 });
    });

    it('places the center from a board pointer position', () => {
      store.getState().capturePointer({ x: 10, y: 5 });

      expect(store.getState().params.center).toEqual({ x: 10, y: -5 });
      expect(store.getState().preview?.outerTerminal.x).toBeCloseTo(0, 9);
    });

    it('moves the center directly', () => {
      store.getState().setCenter({ x: 3, y: 4 });
      expect(store.getState().params.center).toEqual({ x: 3, y: 4 });
    });

    it('keeps layer names on copper', () => {
      store.getState().setLayer('B.Cu');
      expect(store.getState().layer).toBe('B.Cu');

      store.getState().setLayer('Edge.Cuts');
      expect(store.getState().layer).toBe('F.Cu');
    });

    it('resets to the defaults', () => {
      store.getState().setParams({ turns: 100 });
      store.getState().setLayer('B.Cu');
      store.getState().reset();

      expect(store.getState().params).toEqual(DEFAULT_PARAMS);
      expect(store.getState().layer).toBe('F.Cu');
      expect(store.getState().error).toBeNull();
    });
  });

  describe('render', () => {
    it('sends the preview to a sink on the current layer', () => {
      const sink = new KicadSink({ trackWidth: 0.25 });
      store.getState().setLayer('In1.Cu');

      expect(store.getState().render(sink)).toBe(true);
      expect(sink.itemCount).toBe(store.getState().preview?.segments.length);
      expect(sink.toString()).toContain('(layer "In1.Cu")');
    });

    it('renders nothing while the parameters are rejected', () => {
      const sink = new KicadSink({ trackWidth: 0.25 });
      store.getState().setParams({ turns: 100 });

      expect(store.getState().render(sink)).toBe(false);
      expect(sink.itemCount).toBe(0);
    });
  });

  describe('share', () => {
    it('loads a share code from another store', () => {
      const other = createWindingStore();
      other.getState().setParams({ turns: 4, direction: 'cw' });
      other.getState().setLayer('B.Cu');

      expect(store.getState().loadShareCode(other.getState().getShareCode())).toBe(true);
      expect(store.getState().params).toEqual(other.getState().params);
      expect(store.getState().layer).toBe('B.Cu');
      expect(store.getState().preview?.laps).toHaveLength(4);
    });

    it('ignores a code that does not decode', () => {
      expect(store.getState().loadShareCode('')).toBe(false);
      expect(store.getState().params).toEqual(DEFAULT_PARAMS);
    });

    it('builds a shareable URL', () => {
      const url = store.getState().getShareableUrl('https://example.com/winding');
      expect(url.startsWith('https://example.com/winding?w=')).toBe(true);
      expect(new URL(url).searchParams.get('w')).toBe(store.getState().getShareCode());
    });
  });

  it('keeps separate stores independent', () => {
    const other = createWindingStore();
    other.getState().setParams({ turns: 1 });
    expect(store.getState().params.turns).toBe(DEFAULT_PARAMS.turns);
  });
});

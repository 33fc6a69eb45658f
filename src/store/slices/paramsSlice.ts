import type { StateCreator } from 'zustand/vanilla';
import type { WindingStore } from './types';
import type { LayerId, Point, WindingParams, WindowSpec } from '../../types';
import { DEFAULT_LAYER, DEFAULT_PARAMS } from '../../config/defaults';
import { fromBoardPoint, resolveLayer } from '../../utils/kicadExport';
import { evaluatePreview } from './previewSlice';

// =============================================================================
// Params Slice - Form state; every edit re-runs the preview
// =============================================================================

export interface ParamsSlice {
  // State
  params: WindingParams;
  layer: LayerId;

  // Actions
  setParams: (changes: Partial<WindingParams>) => void;
  setWindow: (changes: Partial<WindowSpec>) => void;
  setCenter: (center: Point) => void;
  capturePointer: (boardPoint: Point) => void;
  setLayer: (layer: LayerId) => void;
  reset: () => void;
}

export const createParamsSlice: StateCreator<
  WindingStore,
  [],
  [],
  ParamsSlice
> = (set, get) => {
  const apply = (params: WindingParams): void => {
    set({ params, ...evaluatePreview(params) });
  };

  return {
    params: DEFAULT_PARAMS,
    layer: DEFAULT_LAYER,

    // Actions
    setParams: (changes) => apply({ ...get().params, ...changes }),

    setWindow: (changes) => {
      const { params } = get();
      apply({ ...params, window: { ...params.window, ...changes } });
    },

    setCenter: (center) => apply({ ...get().params, center }),

    // Pointer positions arrive in board coordinates (y down)
    capturePointer: (boardPoint) => apply({ ...get().params, center: fromBoardPoint(boardPoint) }),

    setLayer: (layer) => set({ layer: resolveLayer(layer) }),

    reset: () => {
      set({ layer: DEFAULT_LAYER });
      apply(DEFAULT_PARAMS);
    },
  };
};

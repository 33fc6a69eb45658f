import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { DEFAULT_PARAMS } from '../config/defaults';
import { createParamsSlice, createPreviewSlice, createShareSlice, evaluatePreview } from './slices';
import type { WindingStore } from './slices';

export type { WindingStore };

/**
 * Form state for placing a winding. The preview is recomputed on every edit,
 * so `preview` and `error` always describe the current `params`.
 */
export const createWindingStore = (): StoreApi<WindingStore> =>
  createStore<WindingStore>()((...a) => ({
    ...createParamsSlice(...a),
    ...createPreviewSlice(...a),
    ...createShareSlice(...a),
    // Initial preview for the defaults
    ...evaluatePreview(DEFAULT_PARAMS),
  }));

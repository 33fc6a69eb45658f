import type { StateCreator } from 'zustand/vanilla';
import type { WindingStore } from './types';
import { deserializeParams, getShareableUrl, serializeParams } from '../../utils/urlState';
import { resolveLayer } from '../../utils/kicadExport';
import { evaluatePreview } from './previewSlice';

// =============================================================================
// Share Slice - Load/save parameters as share codes
// =============================================================================

export interface ShareSlice {
  // Actions
  loadShareCode: (code: string) => boolean;
  getShareCode: () => string;
  getShareableUrl: (baseUrl: string) => string;
}

export const createShareSlice: StateCreator<
  WindingStore,
  [],
  [],
  ShareSlice
> = (set, get) => ({
  // Actions
  loadShareCode: (code) => {
    const loaded = deserializeParams(code);
    if (!loaded) return false;

    set({
      params: loaded.params,
      layer: resolveLayer(loaded.layer),
      ...evaluatePreview(loaded.params),
    });
    return true;
  },

  getShareCode: () => {
    const { params, layer } = get();
    return serializeParams(params, layer);
  },

  getShareableUrl: (baseUrl) => {
    const { params, layer } = get();
    return getShareableUrl(params, layer, baseUrl);
  },
});

import type { StateCreator } from 'zustand/vanilla';
import type { WindingStore } from './types';
import type { RenderingSink, SpiralResult, WindingParams } from '../../types';
import type { WindingErrorKind } from '../../engine/errors';
import { tryComputeSpiral } from '../../engine/computeSpiral';
import { debug } from '../../utils/debug';

// =============================================================================
// Preview Slice - Live spiral for the current parameters
// =============================================================================

export interface PreviewError {
  kind: WindingErrorKind;
  message: string;
}

export interface PreviewSlice {
  // State
  preview: SpiralResult | null;
  error: PreviewError | null;

  // Actions
  render: (sink: RenderingSink) => boolean;
}

/**
 * Preview fields for a parameter set. Winding errors become `error`;
 * anything else propagates to the caller of the action.
 */
export const evaluatePreview = (params: WindingParams): Pick<PreviewSlice, 'preview' | 'error'> => {
  const outcome = tryComputeSpiral(params);
  if (outcome.ok) {
    debug('store', `preview: ${outcome.spiral.segments.length} segments`);
    return { preview: outcome.spiral, error: null };
  }
  debug('store', `preview rejected: ${outcome.error.message}`);
  return { preview: null, error: { kind: outcome.error.kind, message: outcome.error.message } };
};

export const createPreviewSlice: StateCreator<
  WindingStore,
  [],
  [],
  PreviewSlice
> = (_set, get) => ({
  preview: null,
  error: null,

  // Actions
  render: (sink) => {
    const { preview, layer } = get();
    if (!preview) return false;
    sink.consume(preview.segments, layer);
    return true;
  },
});

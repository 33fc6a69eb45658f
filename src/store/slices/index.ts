export { createParamsSlice } from './paramsSlice';
export type { ParamsSlice } from './paramsSlice';
export { createPreviewSlice, evaluatePreview } from './previewSlice';
export type { PreviewSlice, PreviewError } from './previewSlice';
export { createShareSlice } from './shareSlice';
export type { ShareSlice } from './shareSlice';
export type { WindingStore } from './types';

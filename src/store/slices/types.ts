import type { ParamsSlice } from './paramsSlice';
import type { PreviewSlice } from './previewSlice';
import type { ShareSlice } from './shareSlice';

export type WindingStore = ParamsSlice & PreviewSlice & ShareSlice;

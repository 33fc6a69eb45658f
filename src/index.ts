export * from './types';
export * from './engine';
export { DEFAULT_PARAMS, DEFAULT_LAYER, COPPER_LAYERS, isCopperLayer } from './config/defaults';
export type { CopperLayer } from './config/defaults';
export { SvgSink, generateSpiralSVG, segmentsToSvgPath } from './utils/svgExport';
export type { SpiralSvgOptions, SvgLayer } from './utils/svgExport';
export { KicadSink, segmentToKicad, resolveLayer, toBoardPoint, fromBoardPoint } from './utils/kicadExport';
export type { KicadExportOptions } from './utils/kicadExport';
export { serializeParams, deserializeParams, getShareableUrl, parseShareableUrl } from './utils/urlState';
export type { ShareState } from './utils/urlState';
export { WindingBuilder, validateWindingRecipe, executeRecipe, RecipeError } from './builder';
export type { WindingRecipe, WindingFixture, WindingPreset } from './builder';
export { createWindingStore } from './store/useWindingStore';
export type { WindingStore } from './store/useWindingStore';
export { enableDebugTag, disableDebugTag, setDebugTags, parseDebugTags, getDebug, clearDebug, takeDebug } from './utils/debug';
export type { DebugTag } from './utils/debug';

/**
 * Default winding parameters, copper layers and geometric tolerances.
 *
 * The parameter defaults match the values a fresh placement dialog starts with.
 */

import type { WindingParams } from '../types';

// mm - two points closer than this are the same point
export const GEOMETRY_EPSILON = 1e-9;

// mm - largest chord used when an arc is tessellated into a polygon
export const ARC_TESSELLATION_STEP = 0.05;

export const DEFAULT_PARAMS: WindingParams = {
  center: { x: 0, y: 0 },
  window: { width: 20, height: 16, cornerRadius: 2 },
  trackWidth: 0.25,
  guard: 0.25,
  innerGap: 0.3,
  turns: 6,
  startPosition: 'left-center',
  direction: 'ccw',
};

// Copper layers offered for placement, outermost first
export const COPPER_LAYERS = ['F.Cu', 'B.Cu', 'In1.Cu', 'In2.Cu', 'In3.Cu', 'In4.Cu'] as const;

export type CopperLayer = (typeof COPPER_LAYERS)[number];

export const DEFAULT_LAYER: CopperLayer = 'F.Cu';

export const isCopperLayer = (name: string): name is CopperLayer =>
  COPPER_LAYERS.some((layer) => layer === name);

// Bounds applied to externally supplied recipes
export const LIMITS = {
  maxDimension: 1000,   // mm
  maxTurns: 200,
  maxTrackWidth: 50,    // mm
} as const;

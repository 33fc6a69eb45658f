/**
 * Types for the winding builder.
 */

import type { LayerId, SpiralResult, WindingParams } from '../types';

/**
 * Result of building a winding.
 */
export interface WindingFixture {
  /** Parameters exactly as configured (before validation) */
  params: WindingParams;
  /** The synthesized spiral */
  spiral: SpiralResult;
  /** Copper layer the winding is meant for */
  layer: LayerId;
}

/** Named starting points for common windings */
export type WindingPreset = 'default' | 'compact' | 'power' | 'fine';

import type { SpiralResult, WindingParams } from '../types';
import { WindingError } from './errors';
import { assembleSpiral } from './spiralAssembler';
import { validateWindingParams } from './validateParams';

export type SpiralOutcome =
  | { ok: true; spiral: SpiralResult }
  | { ok: false; error: WindingError };

/**
 * Validate the parameters and synthesize the winding.
 *
 * @throws InvalidGeometry when the parameters cannot hold the requested winding
 * @throws GeometryExhausted when the window runs out part way through
 */
export const computeSpiral = (params: WindingParams): SpiralResult =>
  assembleSpiral(validateWindingParams(params));

/**
 * Same as computeSpiral, with winding errors returned instead of thrown.
 * Anything that is not a WindingError still propagates.
 */
export const tryComputeSpiral = (params: WindingParams): SpiralOutcome => {
  try {
    return { ok: true, spiral: computeSpiral(params) };
  } catch (error) {
    if (error instanceof WindingError) {
      return { ok: false, error };
    }
    throw error;
  }
};

/**
 * Test Validators
 *
 * Validators are modules (not tests) that perform specific validation checks.
 * They are used by integration tests to validate synthesized windings.
 *
 * The validator implementation lives in src/engine/validators/.
 */

export { SpiralChecker, checkSpiral, formatSpiralCheckResult } from '../../src/engine/validators/SpiralChecker';
export type { SpiralCheckResult, SpiralValidationError, SpiralRuleId } from '../../src/engine/validators/SpiralChecker';

import type { WindingParams, SpiralResult } from '../../src/types';
import { checkSpiral } from '../../src/engine/validators/SpiralChecker';
import type { SpiralCheckResult } from '../../src/engine/validators/SpiralChecker';

export interface SpiralValidationOptions {
  /** Also check copper overlap between laps (slower) */
  clearance?: boolean;
}

/**
 * Check a spiral against the parameters it was built from
 */
export function validateSpiral(
  spiral: SpiralResult,
  params: WindingParams,
  options: SpiralValidationOptions = {}
): SpiralCheckResult {
  return checkSpiral(spiral, {
    turns: params.turns,
    trackWidth: options.clearance ? params.trackWidth : undefined,
  });
}

/**
 * Winding engine - validation, lap building and spiral assembly.
 */

export { computeSpiral, tryComputeSpiral } from './computeSpiral';
export type { SpiralOutcome } from './computeSpiral';
export { validateWindingParams } from './validateParams';
export { assembleSpiral, insetWindow, lapOpening, openingMisfit, stitchStyle } from './spiralAssembler';
export type { StitchStyle } from './spiralAssembler';
export { buildLap, traceLap, anchorPoint, lapFrame } from './pathBuilder';
export type { LapFrame, LapOpening, LapStop } from './pathBuilder';
export {
  WindingError,
  InvalidGeometry,
  PreconditionViolated,
  GeometryExhausted,
  isWindingError,
} from './errors';
export type { WindingErrorKind } from './errors';
export { SpiralChecker, checkSpiral, formatSpiralCheckResult, isPathSimple } from './validators/SpiralChecker';
export type { SpiralCheckResult, SpiralCheckOptions, SpiralRuleId, SpiralValidationError } from './validators/SpiralChecker';

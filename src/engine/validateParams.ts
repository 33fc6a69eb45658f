/**
 * Parameter validation for a winding request.
 *
 * Rules run in order and the first failure wins, so a caller always sees the
 * most basic problem with their input first.
 */

import type { NormalizedWindingParams, WindingParams, WindowSpec } from '../types';
import { START_POSITIONS, WINDING_DIRECTIONS } from '../types';
import { debug } from '../utils/debug';
import { InvalidGeometry } from './errors';
import { openingMisfit } from './spiralAssembler';

const requireFinite = (value: number, field: string): void => {
  if (!Number.isFinite(value)) {
    throw new InvalidGeometry(`${field} must be a finite number, got ${value}`, field);
  }
};

const requirePositive = (value: number, field: string): void => {
  requireFinite(value, field);
  if (value <= 0) {
    throw new InvalidGeometry(`${field} must be positive, got ${value}`, field);
  }
};

const requireNonNegative = (value: number, field: string): void => {
  requireFinite(value, field);
  if (value < 0) {
    throw new InvalidGeometry(`${field} must not be negative, got ${value}`, field);
  }
};

/**
 * Validate raw parameters and return them normalized: corner radius clamped,
 * direction resolved, pitch derived.
 *
 * @throws InvalidGeometry naming the offending field
 */
export const validateWindingParams = (raw: WindingParams): NormalizedWindingParams => {
  const { center, window } = raw;

  // 1. Field ranges
  requireFinite(center.x, 'center.x');
  requireFinite(center.y, 'center.y');
  requirePositive(window.width, 'window.width');
  requirePositive(window.height, 'window.height');
  requirePositive(raw.trackWidth, 'trackWidth');
  requirePositive(raw.guard, 'guard');
  requireNonNegative(raw.innerGap, 'innerGap');

  if (!Number.isInteger(raw.turns) || raw.turns < 1) {
    throw new InvalidGeometry(`turns must be an integer of at least 1, got ${raw.turns}`, 'turns');
  }
  if (!START_POSITIONS.includes(raw.startPosition)) {
    throw new InvalidGeometry(`Unknown start position "${raw.startPosition}"`, 'startPosition');
  }
  const direction = raw.direction ?? 'ccw';
  if (!WINDING_DIRECTIONS.includes(direction)) {
    throw new InvalidGeometry(`Unknown winding direction "${direction}"`, 'direction');
  }

  // 2. Corner radius
  requireNonNegative(window.cornerRadius, 'window.cornerRadius');
  const maxRadius = Math.min(window.width, window.height) / 2;
  let cornerRadius = window.cornerRadius;
  if (cornerRadius > maxRadius) {
    debug('validate', `corner radius ${cornerRadius} clamped to ${maxRadius}`);
    cornerRadius = maxRadius;
  }
  const clamped: WindowSpec = { width: window.width, height: window.height, cornerRadius };

  // 3. Room for every turn inside the inner gap
  const pitch = raw.trackWidth + raw.guard;
  const remaining = maxRadius - raw.innerGap - raw.turns * pitch;
  if (remaining <= 0) {
    throw new InvalidGeometry(
      `${raw.turns} turns at pitch ${pitch} with inner gap ${raw.innerGap} need more than ` +
        `${maxRadius} mm of half-width (short by ${-remaining})`,
      'turns'
    );
  }

  // 4. Room for every lap's opening and stitch
  for (let turn = 1; turn <= raw.turns; turn++) {
    const misfit = openingMisfit({ center, window: clamped, pitch, startPosition: raw.startPosition, direction }, turn);
    if (misfit !== undefined) {
      throw new InvalidGeometry(`No room for the crossover: ${misfit}`, 'turns');
    }
  }

  debug('validate', `ok: ${raw.turns} turns, pitch ${pitch}, ${remaining} mm spare`);

  return {
    center,
    window: clamped,
    trackWidth: raw.trackWidth,
    guard: raw.guard,
    innerGap: raw.innerGap,
    turns: raw.turns,
    startPosition: raw.startPosition,
    direction,
    pitch,
  };
};

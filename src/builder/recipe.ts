/**
 * JSON Recipe Schema, Validator, and Interpreter.
 *
 * A recipe is a plain JSON description of a winding (typed by hand, stored in
 * a file, or produced by another tool). This module validates it and
 * translates it into WindingBuilder calls.
 */

import { WindingBuilder, WINDING_PRESETS } from './WindingBuilder';
import type { WindingFixture, WindingPreset } from './types';
import type { StartPosition, WindingDirection } from '../types';
import { START_POSITIONS, WINDING_DIRECTIONS } from '../types';
import { COPPER_LAYERS, LIMITS, isCopperLayer } from '../config/defaults';
import type { CopperLayer } from '../config/defaults';

// =============================================================================
// Recipe Types
// =============================================================================

export interface WindingRecipe {
  preset?: WindingPreset;
  center?: { x: number; y: number };
  width?: number;
  height?: number;
  cornerRadius?: number;
  trackWidth?: number;
  guard?: number;
  innerGap?: number;
  turns?: number;
  start?: StartPosition;
  direction?: WindingDirection;
  layer?: CopperLayer;
}

// =============================================================================
// Validation
// =============================================================================

export class RecipeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecipeError';
  }
}

function assertNumber(value: unknown, field: string): asserts value is number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new RecipeError(`${field} must be a finite number, got ${typeof value}`);
  }
}

function assertPositiveNumber(value: unknown, field: string): asserts value is number {
  assertNumber(value, field);
  if (value <= 0) {
    throw new RecipeError(`${field} must be positive, got ${value}`);
  }
}

function assertMaximum(value: number, max: number, field: string): void {
  if (value > max) {
    throw new RecipeError(`${field} ${value} exceeds the maximum of ${max}.`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((option) => option === value);
}

/** Known top-level keys in WindingRecipe */
const KNOWN_TOP_LEVEL_KEYS = new Set([
  'preset', 'center', 'width', 'height', 'cornerRadius', 'trackWidth',
  'guard', 'innerGap', 'turns', 'start', 'direction', 'layer',
]);

/** Fields a recipe must give when it does not name a preset */
const REQUIRED_WITHOUT_PRESET = ['width', 'height', 'trackWidth', 'guard', 'turns'] as const;

export function validateWindingRecipe(raw: unknown): WindingRecipe {
  if (!isRecord(raw)) {
    throw new RecipeError('Recipe must be a JSON object');
  }

  // Reject unknown top-level fields
  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      throw new RecipeError(`Unknown recipe field: "${key}"`);
    }
  }

  const recipe: WindingRecipe = {};

  // preset
  if (raw.preset !== undefined) {
    if (!oneOf(WINDING_PRESETS, raw.preset)) {
      throw new RecipeError(`Invalid preset "${String(raw.preset)}". Valid: ${WINDING_PRESETS.join(', ')}`);
    }
    recipe.preset = raw.preset;
  } else {
    for (const field of REQUIRED_WITHOUT_PRESET) {
      if (raw[field] === undefined) {
        throw new RecipeError(`${field} is required when no preset is given`);
      }
    }
  }

  // center
  if (raw.center !== undefined) {
    if (!isRecord(raw.center)) {
      throw new RecipeError('center must be an object with x and y');
    }
    for (const key of Object.keys(raw.center)) {
      if (key !== 'x' && key !== 'y') {
        throw new RecipeError(`Unknown center field: "${key}"`);
      }
    }
    const { x, y } = raw.center;
    assertNumber(x, 'center.x');
    assertNumber(y, 'center.y');
    recipe.center = { x, y };
  }

  // dimensions
  if (raw.width !== undefined) {
    assertPositiveNumber(raw.width, 'width');
    assertMaximum(raw.width, LIMITS.maxDimension, 'width');
    recipe.width = raw.width;
  }
  if (raw.height !== undefined) {
    assertPositiveNumber(raw.height, 'height');
    assertMaximum(raw.height, LIMITS.maxDimension, 'height');
    recipe.height = raw.height;
  }
  if (raw.cornerRadius !== undefined) {
    assertNumber(raw.cornerRadius, 'cornerRadius');
    if (raw.cornerRadius < 0) {
      throw new RecipeError(`cornerRadius must not be negative, got ${raw.cornerRadius}`);
    }
    recipe.cornerRadius = raw.cornerRadius;
  }

  // track
  if (raw.trackWidth !== undefined) {
    assertPositiveNumber(raw.trackWidth, 'trackWidth');
    assertMaximum(raw.trackWidth, LIMITS.maxTrackWidth, 'trackWidth');
    recipe.trackWidth = raw.trackWidth;
  }
  if (raw.guard !== undefined) {
    assertPositiveNumber(raw.guard, 'guard');
    recipe.guard = raw.guard;
  }
  if (raw.innerGap !== undefined) {
    assertNumber(raw.innerGap, 'innerGap');
    if (raw.innerGap < 0) {
      throw new RecipeError(`innerGap must not be negative, got ${raw.innerGap}`);
    }
    recipe.innerGap = raw.innerGap;
  }

  // turns
  if (raw.turns !== undefined) {
    assertPositiveNumber(raw.turns, 'turns');
    if (!Number.isInteger(raw.turns)) {
      throw new RecipeError(`turns must be a whole number, got ${raw.turns}`);
    }
    assertMaximum(raw.turns, LIMITS.maxTurns, 'turns');
    recipe.turns = raw.turns;
  }

  // start / direction / layer
  if (raw.start !== undefined) {
    if (!oneOf(START_POSITIONS, raw.start)) {
      throw new RecipeError(`Invalid start "${String(raw.start)}". Valid: ${START_POSITIONS.join(', ')}`);
    }
    recipe.start = raw.start;
  }
  if (raw.direction !== undefined) {
    if (!oneOf(WINDING_DIRECTIONS, raw.direction)) {
      throw new RecipeError(`Invalid direction "${String(raw.direction)}". Valid: ${WINDING_DIRECTIONS.join(', ')}`);
    }
    recipe.direction = raw.direction;
  }
  if (raw.layer !== undefined) {
    if (typeof raw.layer !== 'string' || !isCopperLayer(raw.layer)) {
      throw new RecipeError(`Invalid layer "${String(raw.layer)}". Valid: ${COPPER_LAYERS.join(', ')}`);
    }
    recipe.layer = raw.layer;
  }

  return recipe;
}

// =============================================================================
// Interpreter
// =============================================================================

/**
 * Builder configured from a validated recipe
 */
export function recipeToBuilder(recipe: WindingRecipe): WindingBuilder {
  const builder = recipe.preset ? WindingBuilder.preset(recipe.preset) : WindingBuilder.defaults();
  const current = builder.toParams();

  if (recipe.center) builder.at(recipe.center.x, recipe.center.y);
  if (recipe.width !== undefined || recipe.height !== undefined || recipe.cornerRadius !== undefined) {
    builder.withWindow({
      width: recipe.width ?? current.window.width,
      height: recipe.height ?? current.window.height,
      cornerRadius: recipe.cornerRadius ?? current.window.cornerRadius,
    });
  }
  if (recipe.trackWidth !== undefined || recipe.guard !== undefined) {
    builder.track(recipe.trackWidth ?? current.trackWidth, recipe.guard ?? current.guard);
  }
  if (recipe.innerGap !== undefined) builder.innerGap(recipe.innerGap);
  if (recipe.turns !== undefined) builder.turns(recipe.turns);
  if (recipe.start) builder.startAt(recipe.start);
  if (recipe.direction) builder.direction(recipe.direction);
  if (recipe.layer) builder.onLayer(recipe.layer);

  return builder;
}

/**
 * Synthesize the winding a recipe describes.
 *
 * @throws InvalidGeometry or GeometryExhausted when the recipe is well-formed
 *   but the winding does not fit
 */
export function executeRecipe(recipe: WindingRecipe): WindingFixture {
  return recipeToBuilder(recipe).build();
}

/**
 * Winding builder - parameter sources for the spiral synthesizer.
 *
 * Provides a fluent API for describing windings, a JSON recipe interpreter,
 * and permutation utilities for matrix-driven testing.
 *
 * @example
 * ```typescript
 * import { WindingBuilder, permute } from '../builder';
 *
 * const { spiral } = WindingBuilder.preset('compact').turns(4).build();
 *
 * const matrix = permute({ turns: [1, 3], direction: ['ccw', 'cw'] });
 * describe.each(matrix)('%s', (_name, config) => {
 *   it('winds', () => {
 *     WindingBuilder.defaults().turns(config.turns).direction(config.direction).build();
 *   });
 * });
 * ```
 */

// Core builder class
export { WindingBuilder, WINDING_PRESETS } from './WindingBuilder';

// JSON recipes
export { validateWindingRecipe, executeRecipe, recipeToBuilder, RecipeError } from './recipe';
export type { WindingRecipe } from './recipe';

// Permutation utilities
export { permute, permuteNamed, countPermutations } from './permute';
export type { PermutationConfig, PermutationResult, Permutation } from './permute';

// Types
export type { WindingFixture, WindingPreset } from './types';

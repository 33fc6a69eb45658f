/**
 * Permutation utilities for matrix-driven testing.
 *
 * Generates every combination of parameter options for vitest's
 * `describe.each()` and `it.each()`.
 *
 * @example
 * ```typescript
 * const matrix = permute({
 *   startPosition: START_POSITIONS,
 *   direction: ['ccw', 'cw'],
 *   cornerRadius: [0, 2],
 * });
 * // 12 combinations (3 x 2 x 2)
 *
 * describe.each(matrix)('%s', (_name, config) => {
 *   it('winds', () => {
 *     WindingBuilder.defaults().startAt(config.startPosition).build();
 *   });
 * });
 * ```
 */

/**
 * Configuration object where each key maps to the values it can take.
 */
export type PermutationConfig = Record<string, readonly unknown[]>;

export type Permutation<T extends PermutationConfig> = { [K in keyof T]: T[K][number] };

/**
 * Array of [name, config] tuples for use with describe.each()
 */
export type PermutationResult<T extends PermutationConfig> = Array<[string, Permutation<T>]>;

const describeValue = (value: unknown): string => {
  if (Array.isArray(value)) {
    return value.length === 0 ? '[]' : `[${value.length} items]`;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
};

// Cartesian product, first key varying slowest
function cartesian<T extends PermutationConfig>(config: T): Permutation<T>[] {
  const keys = Object.keys(config) as (keyof T)[];
  let combos: Partial<Permutation<T>>[] = [{}];

  for (const key of keys) {
    combos = combos.flatMap((combo) => config[key].map((value) => ({ ...combo, [key]: value })));
  }

  return combos as Permutation<T>[];
}

/**
 * Generate all permutations of configuration options, named "key=value, ...".
 */
export function permute<T extends PermutationConfig>(config: T): PermutationResult<T> {
  return permuteNamed(config, (combo) =>
    Object.entries(combo)
      .map(([key, value]) => `${key}=${describeValue(value)}`)
      .join(', ')
  );
}

/**
 * Generate permutations with a custom name function.
 *
 * @example
 * const matrix = permuteNamed({ turns: [1, 3, 6] }, (c) => `${c.turns} turns`);
 */
export function permuteNamed<T extends PermutationConfig>(
  config: T,
  nameFn: (config: Permutation<T>) => string
): PermutationResult<T> {
  return cartesian(config).map((combo) => [nameFn(combo), combo]);
}

/**
 * Count total permutations without generating them.
 */
export function countPermutations(config: PermutationConfig): number {
  return Object.values(config).reduce((total, values) => total * values.length, 1);
}

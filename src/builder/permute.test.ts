import { describe, it, expect } from 'vitest';
import { permute, permuteNamed, countPermutations } from './permute';

describe('permute', () => {
  it('generates every combination, first key varying slowest', () => {
    const matrix = permute({ turns: [1, 2], direction: ['ccw', 'cw'] });

    expect(matrix).toEqual([
      ['turns=1, direction=ccw', { turns: 1, direction: 'ccw' }],
      ['turns=1, direction=cw', { turns: 1, direction: 'cw' }],
      ['turns=2, direction=ccw', { turns: 2, direction: 'ccw' }],
      ['turns=2, direction=cw', { turns: 2, direction: 'cw' }],
    ]);
  });

  it('describes arrays and objects compactly', () => {
    const [[name]] = permute({ points: [[1, 2, 3]], center: [{ x: 0, y: 0 }] });
    expect(name).toBe('points=[3 items], center={"x":0,"y":0}');
  });

  it('yields nothing when a key has no values', () => {
    expect(permute({ turns: [1, 2], direction: [] })).toEqual([]);
  });
});

describe('permuteNamed', () => {
  it('uses the custom name', () => {
    const matrix = permuteNamed({ turns: [1, 3] }, (c) => `${c.turns} turns`);
    expect(matrix.map(([name]) => name)).toEqual(['1 turns', '3 turns']);
  });
});

describe('countPermutations', () => {
  it('multiplies the option counts', () => {
    expect(countPermutations({ a: [1, 2, 3], b: ['x', 'y'], c: [true] })).toBe(6);
  });

  it('counts one combination for an empty config', () => {
    expect(countPermutations({})).toBe(1);
  });
});

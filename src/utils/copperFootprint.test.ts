import { describe, it, expect } from 'vitest';
import type { MultiPolygon } from 'polygon-clipping';
import type { ArcSegment, LineSegment } from '../types';
import { HALF_PI } from './geometry';
import {
  footprintOverlapArea,
  multiPolygonArea,
  segmentFootprint,
  unionFootprints,
} from './copperFootprint';

const line = (x1: number, y1: number, x2: number, y2: number): LineSegment => ({
  kind: 'line',
  from: { x: x1, y: y1 },
  to: { x: x2, y: y2 },
});

const corner: ArcSegment = {
  kind: 'arc',
  center: { x: 0, y: 0 },
  radius: 2,
  startAngle: 0,
  endAngle: HALF_PI,
  direction: 'ccw',
};

describe('segmentFootprint', () => {
  it('turns a line into a rectangle of the track width', () => {
    expect(segmentFootprint(line(0, 0, 4, 0), 1)).toEqual([
      [[0, 0.5], [4, 0.5], [4, -0.5], [0, -0.5]],
    ]);
  });

  it('gives nothing for a zero-length line', () => {
    expect(segmentFootprint(line(1, 1, 1, 1), 1)).toEqual([]);
  });

  it('turns an arc into an annular sector', () => {
    // π/4 · (2.5² − 1.5²)
    expect(multiPolygonArea([segmentFootprint(corner, 1)])).toBeCloseTo(Math.PI, 2);
  });

  it('closes a sector at the center when the track is wider than the radius', () => {
    const tight: ArcSegment = { ...corner, radius: 0.3 };
    const [ring] = segmentFootprint(tight, 1);

    expect(ring[ring.length - 1]).toEqual([0, 0]);
    // π/4 · 0.8²
    expect(multiPolygonArea([[ring]])).toBeCloseTo(Math.PI * 0.16, 2);
  });
});

describe('multiPolygonArea', () => {
  it('subtracts holes', () => {
    const framed: MultiPolygon = [[
      [[0, 0], [4, 0], [4, 4], [0, 4]],
      [[1, 1], [3, 1], [3, 3], [1, 3]],
    ]];
    expect(multiPolygonArea(framed)).toBe(12);
  });

  it('ignores ring orientation', () => {
    expect(multiPolygonArea([[[[0, 0], [0, 2], [2, 2], [2, 0]]]])).toBe(4);
  });
});

describe('footprintOverlapArea', () => {
  it('measures the shared copper of two close tracks', () => {
    expect(footprintOverlapArea(line(0, 0, 5, 0), line(5, 0.1, 0, 0.1), 0.2)).toBeCloseTo(0.5, 6);
  });

  it('is zero for tracks a guard apart', () => {
    expect(footprintOverlapArea(line(0, 0, 5, 0), line(0, 0.4, 5, 0.4), 0.2)).toBe(0);
  });
});

describe('unionFootprints', () => {
  it('merges abutting tracks into one outline', () => {
    const merged = unionFootprints([line(0, 0, 1, 0), line(1, 0, 2, 0)], 0.2);

    expect(merged).toHaveLength(1);
    expect(multiPolygonArea(merged)).toBeCloseTo(0.4, 9);
  });

  it('returns nothing for no segments', () => {
    expect(unionFootprints([], 0.2)).toEqual([]);
  });
});

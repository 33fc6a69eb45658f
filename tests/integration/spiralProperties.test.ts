/**
 * Winding properties across start positions, directions, corner radii and
 * turn counts. Every combination must pass the geometry checker, copper
 * clearance included.
 */

import { describe, it, expect } from 'vitest';
import { WindingBuilder, permute } from '../../src/builder';
import { START_POSITIONS } from '../../src/types';
import type { WindingDirection } from '../../src/types';
import { computeSpiral, tryComputeSpiral } from '../../src/engine/computeSpiral';
import { InvalidGeometry } from '../../src/engine/errors';
import { anchorPoint } from '../../src/engine/pathBuilder';
import { stitchStyle } from '../../src/engine/spiralAssembler';
import { pathLength, segmentEnd, segmentStart } from '../../src/utils/geometry';
import { expectPointClose, expectValidSpiral } from '../fixtures/assertions';

const DIRECTIONS: readonly WindingDirection[] = ['ccw', 'cw'];

const matrix = permute({
  startPosition: START_POSITIONS,
  direction: DIRECTIONS,
  cornerRadius: [0, 1.5, 5],
  turns: [1, 4],
});

const base = () =>
  WindingBuilder.window(20, 15)
    .track(0.25, 0.25)
    .innerGap(0.5);

describe('spiral properties', () => {
  describe.each(matrix)('%s', (_name, config) => {
    const { params, spiral } = base()
      .cornerRadius(config.cornerRadius)
      .turns(config.turns)
      .startAt(config.startPosition)
      .direction(config.direction)
      .build();

    it('passes every geometry check', () => {
      expectValidSpiral(spiral, params, { clearance: true });
    });

    it('has one lap per turn', () => {
      expect(spiral.laps).toHaveLength(config.turns);
      expect(spiral.laps.map((lap) => lap.turn)).toEqual(
        Array.from({ length: config.turns }, (_, i) => i + 1)
      );
    });

    const corner = stitchStyle(config.startPosition, config.direction) === 'corner';

    it('starts on the first lap\'s anchor', () => {
      expectPointClose(spiral.outerTerminal, anchorPoint(params.window, params.center, params.startPosition));
    });

    it('ends on the innermost lap', () => {
      const inset = (config.turns - 1) * 0.5;
      if (corner) {
        expect(Math.abs(spiral.innerTerminal.y)).toBeCloseTo(7.5 - inset, 9);
      } else {
        expect(spiral.innerTerminal.x).toBeCloseTo(-10 + inset, 9);
      }
    });

    it('starts and ends the segment sequence at the terminals', () => {
      expectPointClose(segmentStart(spiral.segments[0]), spiral.outerTerminal);
      expectPointClose(segmentEnd(spiral.segments[spiral.segments.length - 1]), spiral.innerTerminal);
    });

    it('keeps every arc on its lap\'s corner radius', () => {
      for (const lap of spiral.laps) {
        const arcs = spiral.segments
          .slice(lap.firstSegment, lap.firstSegment + lap.segmentCount)
          .filter((s) => s.kind === 'arc');
        // corner stitches leave the top-left (or bottom-left) arc untraced
        expect(arcs).toHaveLength(lap.window.cornerRadius > 0 ? (corner ? 3 : 4) : 0);
        for (const arc of arcs) {
          if (arc.kind === 'arc') expect(arc.radius).toBeCloseTo(lap.window.cornerRadius, 9);
        }
      }
    });

    it('is reproducible', () => {
      expect(computeSpiral(params)).toEqual(spiral);
    });
  });

  describe('direction', () => {
    it.each([
      ['left-top', 'left-bottom'],
      ['left-bottom', 'left-top'],
      ['left-center', 'left-center'],
    ] as const)('winds %s counter-clockwise as the mirror of %s clockwise', (ccwStart, cwStart) => {
      const ccw = base().cornerRadius(1.5).turns(4).startAt(ccwStart).build().spiral;
      const cw = base().cornerRadius(1.5).turns(4).startAt(cwStart).direction('cw').build().spiral;

      expect(pathLength(cw.segments)).toBeCloseTo(pathLength(ccw.segments), 9);
      expectPointClose(cw.outerTerminal, { x: ccw.outerTerminal.x, y: -ccw.outerTerminal.y });
      expectPointClose(cw.innerTerminal, { x: ccw.innerTerminal.x, y: -ccw.innerTerminal.y });
    });
  });

  describe('start position', () => {
    it('starts Left-Center windings at the middle of the left edge', () => {
      const { spiral } = base().turns(4).startAt('left-center').build();

      expectPointClose(spiral.outerTerminal, { x: -10, y: 0 });
      // each lap opens one pitch higher than the last
      expectPointClose(spiral.innerTerminal, { x: -8.5, y: 2 });
    });

    it('puts Left-Top terminals above Left-Bottom terminals', () => {
      const top = base().turns(4).startAt('left-top').build().spiral;
      const bottom = base().turns(4).startAt('left-bottom').build().spiral;

      expect(top.outerTerminal.y).toBeGreaterThan(0);
      expect(bottom.outerTerminal.y).toBeLessThan(0);
      expect(top.outerTerminal.y).toBeCloseTo(-bottom.outerTerminal.y, 9);
    });

    it('keeps the outer terminal just below the top-left arc however many turns', () => {
      const { params, spiral } = base().cornerRadius(2).turns(10).startAt('left-top').build();

      expect(spiral.outerTerminal).toEqual({ x: -10, y: 5.5 });
      expectValidSpiral(spiral, params, { clearance: true });
    });
  });

  describe('sharp corners', () => {
    it.each(matrix.filter(([, config]) => config.cornerRadius === 0 && config.turns === 4))(
      'draws each lap of %s with the fewest edges',
      (_name, config) => {
        const { spiral } = base()
          .cornerRadius(0)
          .turns(4)
          .startAt(config.startPosition)
          .direction(config.direction)
          .build();

        // the Left-Center opening splits the left edge in two
        const edges = config.startPosition === 'left-center' ? 5 : 4;
        expect(spiral.laps.map((lap) => lap.segmentCount)).toEqual([edges, edges, edges, edges]);
      }
    );
  });

  describe('rejection', () => {
    it('rejects a window too small for the turns before building anything', () => {
      const outcome = tryComputeSpiral({
        center: { x: 0, y: 0 },
        window: { width: 1, height: 1, cornerRadius: 0.6 },
        trackWidth: 0.5,
        guard: 0.5,
        innerGap: 0,
        turns: 5,
        startPosition: 'left-center',
      });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(InvalidGeometry);
        if (outcome.error instanceof InvalidGeometry) expect(outcome.error.field).toBe('turns');
      }
    });
  });
});

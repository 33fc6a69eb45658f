import { describe, it, expect, afterEach } from 'vitest';
import type { ArcSegment, LineSegment } from '../types';
import { computeSpiral } from '../engine/computeSpiral';
import { DEFAULT_PARAMS } from '../config/defaults';
import { HALF_PI } from './geometry';
import { clearDebug, getDebug, setDebugTags } from './debug';
import {
  KicadSink,
  formatMm,
  fromBoardPoint,
  resolveLayer,
  segmentToKicad,
  toBoardPoint,
} from './kicadExport';

const line: LineSegment = { kind: 'line', from: { x: 0, y: 0 }, to: { x: 1, y: 2 } };

const quarter: ArcSegment = {
  kind: 'arc',
  center: { x: 0, y: 0 },
  radius: 2,
  startAngle: 0,
  endAngle: HALF_PI,
  direction: 'ccw',
};

describe('formatMm', () => {
  it('keeps six decimals and drops trailing zeros', () => {
    expect(formatMm(1.23456789)).toBe('1.234568');
    expect(formatMm(2)).toBe('2');
    expect(formatMm(0.25)).toBe('0.25');
  });

  it('never writes negative zero', () => {
    expect(formatMm(-0.0000001)).toBe('0');
    expect(formatMm(-0)).toBe('0');
  });
});

describe('board coordinates', () => {
  it('mirrors y', () => {
    expect(toBoardPoint({ x: 3, y: 4 })).toEqual({ x: 3, y: -4 });
    expect(fromBoardPoint(toBoardPoint({ x: 3, y: 4 }))).toEqual({ x: 3, y: 4 });
  });

  it('passes points through when flipping is off', () => {
    expect(toBoardPoint({ x: 3, y: 4 }, false)).toEqual({ x: 3, y: 4 });
  });
});

describe('resolveLayer', () => {
  afterEach(() => {
    setDebugTags([]);
    clearDebug();
  });

  it('accepts copper layers', () => {
    expect(resolveLayer('B.Cu')).toBe('B.Cu');
    expect(resolveLayer('In2.Cu')).toBe('In2.Cu');
  });

  it('falls back to the front layer and logs it', () => {
    setDebugTags(['export']);
    expect(resolveLayer('F.SilkS')).toBe('F.Cu');
    expect(getDebug()).toContain('[export] unknown layer "F.SilkS", using F.Cu');
  });
});

describe('segmentToKicad', () => {
  it('writes a line as a track segment', () => {
    expect(segmentToKicad(line, 'F.Cu', { trackWidth: 0.25 })).toBe(
      '(segment (start 0 0) (end 1 -2) (width 0.25) (layer "F.Cu") (net 0))'
    );
  });

  it('writes an arc through its midpoint', () => {
    expect(segmentToKicad(quarter, 'B.Cu', { trackWidth: 0.25, net: 3 })).toBe(
      '(arc (start 2 0) (mid 1.414214 -1.414214) (end 0 -2) (width 0.25) (layer "B.Cu") (net 3))'
    );
  });

  it('keeps y when flipping is off', () => {
    expect(segmentToKicad(line, 'F.Cu', { trackWidth: 0.25, flipY: false })).toBe(
      '(segment (start 0 0) (end 1 2) (width 0.25) (layer "F.Cu") (net 0))'
    );
  });
});

describe('KicadSink', () => {
  const spiral = computeSpiral(DEFAULT_PARAMS);

  it('writes one item per segment', () => {
    const sink = new KicadSink({ trackWidth: DEFAULT_PARAMS.trackWidth });
    sink.consume(spiral.segments, 'B.Cu');

    const lines = sink.toString().split('\n');
    expect(sink.itemCount).toBe(spiral.segments.length);
    expect(lines).toHaveLength(spiral.segments.length);
    expect(lines.every((l) => l.includes('(layer "B.Cu")'))).toBe(true);
    expect(lines.filter((l) => l.startsWith('(arc ')).length)
      .toBe(spiral.segments.filter((s) => s.kind === 'arc').length);
  });

  it('accumulates across calls until cleared', () => {
    const sink = new KicadSink({ trackWidth: 0.25 });
    sink.consume([line], 'F.Cu');
    sink.consume([quarter], 'Nope');

    expect(sink.itemCount).toBe(2);
    expect(sink.toString().split('\n')[1]).toContain('(layer "F.Cu")');

    sink.clear();
    expect(sink.itemCount).toBe(0);
    expect(sink.toString()).toBe('');
  });
});

import { describe, it, expect } from 'vitest';
import type { ArcSegment, LineSegment } from '../types';
import { HALF_PI } from './geometry';
import { SvgSink, generateSpiralSVG, segmentsToSvgPath } from './svgExport';

const line = (x1: number, y1: number, x2: number, y2: number): LineSegment => ({
  kind: 'line',
  from: { x: x1, y: y1 },
  to: { x: x2, y: y2 },
});

const quarter: ArcSegment = {
  kind: 'arc',
  center: { x: 0, y: 0 },
  radius: 2,
  startAngle: 0,
  endAngle: HALF_PI,
  direction: 'ccw',
};

const count = (text: string, needle: string): number => text.split(needle).length - 1;

describe('segmentsToSvgPath', () => {
  it('negates y', () => {
    expect(segmentsToSvgPath([line(0, 0, 1, 2)])).toBe('M 0.000 0.000 L 1.000 -2.000');
  });

  it('gives counter-clockwise arcs sweep flag 1', () => {
    expect(segmentsToSvgPath([quarter])).toBe('M 2.000 0.000 A 2.000 2.000 0 0 1 0.000 -2.000');
  });

  it('gives clockwise arcs sweep flag 0', () => {
    const cw: ArcSegment = { ...quarter, startAngle: HALF_PI, endAngle: 0, direction: 'cw' };
    expect(segmentsToSvgPath([cw])).toBe('M 0.000 -2.000 A 2.000 2.000 0 0 0 2.000 0.000');
  });

  it('lifts the pen only across gaps', () => {
    expect(segmentsToSvgPath([line(0, 0, 1, 0), line(1, 0, 1, 1), line(2, 0, 3, 0)])).toBe(
      'M 0.000 0.000 L 1.000 0.000 L 1.000 -1.000 M 2.000 0.000 L 3.000 0.000'
    );
  });

  it('applies the offset after negating y', () => {
    expect(segmentsToSvgPath([line(0, 0, 1, 2)], 5, 10)).toBe('M 5.000 10.000 L 6.000 8.000');
  });
});

describe('generateSpiralSVG', () => {
  const layer = { layer: 'F.Cu', segments: [line(0, 0, 2, 1)] };

  it('sizes the document to the drawing plus padding', () => {
    const svg = generateSpiralSVG([layer], { trackWidth: 0.5, padding: 1 });

    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(svg).toContain('width="4.000mm"');
    expect(svg).toContain('height="3.000mm"');
    expect(svg).toContain('viewBox="0 0 4.000 3.000"');
    expect(svg.endsWith('</svg>')).toBe(true);
  });

  it('strokes each layer as a centerline', () => {
    const svg = generateSpiralSVG([layer], { trackWidth: 0.5, padding: 1 });

    expect(svg).toContain('<g id="F.Cu" opacity="0.9">');
    expect(svg).toContain(
      '<path d="M 1.000 2.000 L 3.000 1.000" stroke="#c87533" stroke-width="0.500" stroke-linecap="round" stroke-linejoin="round" fill="none" />'
    );
  });

  it('draws further layers in the highlight color', () => {
    const svg = generateSpiralSVG([layer, { layer: 'B.Cu', segments: [line(0, 1, 2, 0)] }]);

    expect(svg).toContain('<g id="B.Cu"');
    expect(svg).toContain('stroke="#5a8fe3"');
  });

  it('fills copper outlines on request', () => {
    const svg = generateSpiralSVG([layer], { trackWidth: 0.5, copperFill: true });

    expect(svg).toContain('fill-rule="evenodd"');
    expect(svg).not.toContain('stroke-linecap');
  });

  it('adds the optional title, background, outline and terminals', () => {
    const svg = generateSpiralSVG([layer], {
      title: 'Test winding',
      background: true,
      outline: { center: { x: 1, y: 0.5 }, window: { width: 4, height: 3, cornerRadius: 0.5 } },
      terminals: { outer: { x: 0, y: 0 }, inner: { x: 2, y: 1 } },
    });

    expect(svg).toContain('<title>Test winding</title>');
    expect(svg).toContain('<rect width="100%" height="100%" fill="#1a1a2e" />');
    expect(svg).toContain('stroke-dasharray="0.5 0.3"');
    expect(count(svg, '<circle ')).toBe(2);
    expect(svg).toContain('fill="#e74c3c"');
    expect(svg).toContain('fill="#3498db"');
  });

  it('escapes markup in the title', () => {
    const svg = generateSpiralSVG([layer], { title: 'L < 5 & W > 2' });
    expect(svg).toContain('<title>L &lt; 5 &amp; W &gt; 2</title>');
  });

  it('clamps an outline radius larger than the window allows', () => {
    const svg = generateSpiralSVG([layer], {
      outline: { center: { x: 0, y: 0 }, window: { width: 4, height: 3, cornerRadius: 5 } },
    });

    expect(svg).toContain('stroke-dasharray="0.5 0.3"');
    expect(svg).toContain('A 1.500 1.500 0 0 1');
  });
});

describe('SvgSink', () => {
  it('merges segments sent to the same layer', () => {
    const sink = new SvgSink({ padding: 0 });
    sink.consume([line(0, 0, 1, 0)], 'F.Cu');
    sink.consume([line(1, 0, 1, 1)], 'F.Cu');
    sink.consume([line(0, 0, 0, 1)], 'B.Cu');

    expect(sink.layerIds).toEqual(['F.Cu', 'B.Cu']);
    expect(sink.toSVG()).toContain('d="M 0.000 1.000 L 1.000 1.000 L 1.000 0.000"');
  });

  it('starts over when cleared', () => {
    const sink = new SvgSink();
    sink.consume([quarter], 'F.Cu');
    sink.clear();

    expect(sink.layerIds).toEqual([]);
    expect(count(sink.toSVG(), '<g ')).toBe(0);
  });
});

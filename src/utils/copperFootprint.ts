/**
 * Copper footprints of centerline segments
 *
 * Wraps the polygon-clipping library: a line becomes a rectangle of the track
 * width, an arc an annular sector tessellated into short chords. Used for
 * clearance checks between turns and for filled copper in the SVG preview.
 */

import polygonClipping from 'polygon-clipping';
import type { Pair, Ring, Polygon, MultiPolygon } from 'polygon-clipping';
import type { ArcSegment, LineSegment, Point, Segment } from '../types';
import { ARC_TESSELLATION_STEP } from '../config/defaults';
import { pointOnCircle, sampleSegment } from './geometry';

const toPair = (p: Point): Pair => [p.x, p.y];

function lineFootprint(line: LineSegment, width: number): Polygon {
  const dx = line.to.x - line.from.x;
  const dy = line.to.y - line.from.y;
  const len = Math.hypot(dx, dy);
  if (len === 0) return [];

  // Perpendicular offset of half the track width
  const ox = (-dy / len) * (width / 2);
  const oy = (dx / len) * (width / 2);

  const ring: Ring = [
    [line.from.x + ox, line.from.y + oy],
    [line.to.x + ox, line.to.y + oy],
    [line.to.x - ox, line.to.y - oy],
    [line.from.x - ox, line.from.y - oy],
  ];
  return [ring];
}

function arcFootprint(arc: ArcSegment, width: number, step: number): Polygon {
  const outerRadius = arc.radius + width / 2;
  const innerRadius = Math.max(arc.radius - width / 2, 0);

  const outer = sampleSegment({ ...arc, radius: outerRadius }, step).map(toPair);
  // Sampling is taken from the outer arc's angles so both edges line up
  const angles = outer.map(([x, y]) => Math.atan2(y - arc.center.y, x - arc.center.x));

  const inner: Pair[] = innerRadius > 0
    ? angles.map((angle) => toPair(pointOnCircle(arc.center, innerRadius, angle))).reverse()
    : [toPair(arc.center)];

  return [[...outer, ...inner]];
}

/**
 * Polygon covered by a track of the given width along one segment
 */
export function segmentFootprint(
  segment: Segment,
  width: number,
  step: number = ARC_TESSELLATION_STEP
): Polygon {
  return segment.kind === 'line'
    ? lineFootprint(segment, width)
    : arcFootprint(segment, width, step);
}

/**
 * Compute signed area of a ring using the shoelace formula.
 * Positive for counter-clockwise, negative for clockwise.
 */
function computeRingArea(ring: Ring): number {
  let area = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += ring[i][0] * ring[j][1];
    area -= ring[j][0] * ring[i][1];
  }
  return area / 2;
}

/**
 * Area of a MultiPolygon, holes subtracted
 */
export function multiPolygonArea(multiPolygon: MultiPolygon): number {
  let total = 0;
  for (const polygon of multiPolygon) {
    polygon.forEach((ring, index) => {
      const area = Math.abs(computeRingArea(ring));
      total += index === 0 ? area : -area;
    });
  }
  return total;
}

/**
 * Area where the copper of two tracks overlaps
 */
export function footprintOverlapArea(a: Segment, b: Segment, width: number): number {
  const polyA = segmentFootprint(a, width);
  const polyB = segmentFootprint(b, width);
  if (polyA.length === 0 || polyB.length === 0) return 0;

  return multiPolygonArea(polygonClipping.intersection(polyA, polyB));
}

/**
 * Merged copper outline of a whole track
 */
export function unionFootprints(segments: readonly Segment[], width: number): MultiPolygon {
  const polygons = segments
    .map((segment) => segmentFootprint(segment, width))
    .filter((polygon) => polygon.length > 0);

  if (polygons.length === 0) return [];
  const [first, ...rest] = polygons;
  return polygonClipping.union(first, ...rest);
}

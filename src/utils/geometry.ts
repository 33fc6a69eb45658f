/**
 * Point, line and quarter-arc helpers shared by the builder, the checker and the sinks.
 */

import type { ArcSegment, LineSegment, Point, Segment } from '../types';
import { GEOMETRY_EPSILON } from '../config/defaults';

export const HALF_PI = Math.PI / 2;
export const TWO_PI = Math.PI * 2;

export interface Bounds2D {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

// Unit vectors at 0, π/2, π, 3π/2
const QUARTER_UNITS: readonly Point[] = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
];

// radians - angles this close to a multiple of π/2 use the exact unit vector
const QUARTER_SNAP = 1e-12;

/**
 * Normalize an angle to [0, 2π)
 */
export const normalizeAngle = (angle: number): number => {
  const a = angle % TWO_PI;
  const wrapped = a < 0 ? a + TWO_PI : a;
  return wrapped >= TWO_PI ? 0 : wrapped;
};

/**
 * Unit vector for an angle. Multiples of π/2 come out exact so that corner
 * arcs land precisely on the axis-aligned edges they join.
 */
export const unitVector = (angle: number): Point => {
  const quarters = angle / HALF_PI;
  const k = Math.round(quarters);
  if (Math.abs(quarters - k) < QUARTER_SNAP) {
    return QUARTER_UNITS[((k % 4) + 4) % 4];
  }
  return { x: Math.cos(angle), y: Math.sin(angle) };
};

export const pointOnCircle = (center: Point, radius: number, angle: number): Point => {
  const u = unitVector(angle);
  return { x: center.x + radius * u.x, y: center.y + radius * u.y };
};

export const distance = (a: Point, b: Point): number => Math.hypot(b.x - a.x, b.y - a.y);

export const pointsEqual = (a: Point, b: Point, tolerance: number = GEOMETRY_EPSILON): boolean =>
  Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;

export const arcSweep = (arc: ArcSegment): number => arc.endAngle - arc.startAngle;

export const segmentStart = (segment: Segment): Point =>
  segment.kind === 'line'
    ? segment.from
    : pointOnCircle(segment.center, segment.radius, segment.startAngle);

export const segmentEnd = (segment: Segment): Point =>
  segment.kind === 'line'
    ? segment.to
    : pointOnCircle(segment.center, segment.radius, segment.endAngle);

export const segmentLength = (segment: Segment): number =>
  segment.kind === 'line'
    ? distance(segment.from, segment.to)
    : segment.radius * Math.abs(arcSweep(segment));

// Direction of travel along an arc at the given angle
const arcTangent = (arc: ArcSegment, angle: number): Point => {
  const u = unitVector(angle);
  return arc.direction === 'ccw' ? { x: -u.y, y: u.x } : { x: u.y, y: -u.x };
};

const lineDirection = (line: LineSegment): Point => {
  const len = distance(line.from, line.to);
  if (len === 0) return { x: 0, y: 0 };
  return { x: (line.to.x - line.from.x) / len, y: (line.to.y - line.from.y) / len };
};

/**
 * Unit direction of travel where the segment begins
 */
export const startDirection = (segment: Segment): Point =>
  segment.kind === 'line' ? lineDirection(segment) : arcTangent(segment, segment.startAngle);

/**
 * Unit direction of travel where the segment ends
 */
export const endDirection = (segment: Segment): Point =>
  segment.kind === 'line' ? lineDirection(segment) : arcTangent(segment, segment.endAngle);

/**
 * The same segment traversed the other way
 */
export const reverseSegment = (segment: Segment): Segment => {
  if (segment.kind === 'line') {
    return { kind: 'line', from: segment.to, to: segment.from };
  }
  const startAngle = normalizeAngle(segment.endAngle);
  return {
    kind: 'arc',
    center: segment.center,
    radius: segment.radius,
    startAngle,
    endAngle: startAngle - arcSweep(segment),
    direction: segment.direction === 'ccw' ? 'cw' : 'ccw',
  };
};

/**
 * Whether an angle falls on the arc's sweep, with an angular tolerance at both ends
 */
export const isAngleOnArc = (arc: ArcSegment, angle: number, tolerance: number = 0): boolean => {
  const sweep = Math.abs(arcSweep(arc));
  const offset = arc.direction === 'ccw'
    ? normalizeAngle(angle - arc.startAngle)
    : normalizeAngle(arc.startAngle - angle);
  return offset <= sweep + tolerance || offset >= TWO_PI - tolerance;
};

export const pointToSegmentDistance = (p: Point, line: LineSegment): number => {
  const dx = line.to.x - line.from.x;
  const dy = line.to.y - line.from.y;
  const lenSq = dx * dx + dy * dy;
  if (lenSq === 0) return distance(p, line.from);

  const t = Math.max(0, Math.min(1, ((p.x - line.from.x) * dx + (p.y - line.from.y) * dy) / lenSq));
  return distance(p, { x: line.from.x + t * dx, y: line.from.y + t * dy });
};

export const pointToArcDistance = (p: Point, arc: ArcSegment): number => {
  const angle = Math.atan2(p.y - arc.center.y, p.x - arc.center.x);
  if (isAngleOnArc(arc, angle)) {
    return Math.abs(distance(p, arc.center) - arc.radius);
  }
  return Math.min(distance(p, segmentStart(arc)), distance(p, segmentEnd(arc)));
};

export const pointToPathDistance = (p: Point, segment: Segment): number =>
  segment.kind === 'line' ? pointToSegmentDistance(p, segment) : pointToArcDistance(p, segment);

/**
 * Axis-aligned bounds of a segment (arcs include any axis extremes they pass)
 */
export const segmentBounds = (segment: Segment): Bounds2D => {
  const points: Point[] = [segmentStart(segment), segmentEnd(segment)];

  if (segment.kind === 'arc') {
    for (let k = 0; k < 4; k++) {
      const angle = k * HALF_PI;
      if (isAngleOnArc(segment, angle)) {
        points.push(pointOnCircle(segment.center, segment.radius, angle));
      }
    }
  }

  return {
    minX: Math.min(...points.map((p) => p.x)),
    maxX: Math.max(...points.map((p) => p.x)),
    minY: Math.min(...points.map((p) => p.y)),
    maxY: Math.max(...points.map((p) => p.y)),
  };
};

export const boundsOverlap = (a: Bounds2D, b: Bounds2D, margin: number = 0): boolean =>
  a.minX <= b.maxX + margin &&
  b.minX <= a.maxX + margin &&
  a.minY <= b.maxY + margin &&
  b.minY <= a.maxY + margin;

/**
 * Points along a segment, no further apart than `step` on arcs
 */
export const sampleSegment = (segment: Segment, step: number): Point[] => {
  if (segment.kind === 'line') return [segment.from, segment.to];

  const sweep = arcSweep(segment);
  const count = Math.max(2, Math.ceil(Math.abs(sweep) * segment.radius / step));
  const points: Point[] = [];
  for (let i = 0; i <= count; i++) {
    points.push(pointOnCircle(segment.center, segment.radius, segment.startAngle + (sweep * i) / count));
  }
  return points;
};

/**
 * Total centerline length of a segment sequence
 */
export const pathLength = (segments: readonly Segment[]): number =>
  segments.reduce((sum, segment) => sum + segmentLength(segment), 0);

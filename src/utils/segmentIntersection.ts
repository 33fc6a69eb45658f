/**
 * Intersection tests between centerline segments (lines and arcs).
 *
 * Two segments "intersect" when they come within `tolerance` of each other,
 * so touching counts. Callers skip neighbours that legitimately share an
 * endpoint.
 */

import type { ArcSegment, LineSegment, Point, Segment } from '../types';
import { GEOMETRY_EPSILON } from '../config/defaults';
import {
  boundsOverlap,
  distance,
  isAngleOnArc,
  pointToArcDistance,
  pointToPathDistance,
  pointToSegmentDistance,
  segmentBounds,
  segmentEnd,
  segmentStart,
} from './geometry';

const cross = (o: Point, a: Point, b: Point): number =>
  (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);

const onArc = (arc: ArcSegment, p: Point, tolerance: number): boolean => {
  const angle = Math.atan2(p.y - arc.center.y, p.x - arc.center.x);
  return isAngleOnArc(arc, angle, tolerance / arc.radius);
};

// Any endpoint of either segment lying on the other
const endpointsTouch = (a: Segment, b: Segment, tolerance: number): boolean =>
  pointToPathDistance(segmentStart(a), b) <= tolerance ||
  pointToPathDistance(segmentEnd(a), b) <= tolerance ||
  pointToPathDistance(segmentStart(b), a) <= tolerance ||
  pointToPathDistance(segmentEnd(b), a) <= tolerance;

export const linesIntersect = (a: LineSegment, b: LineSegment, tolerance: number = GEOMETRY_EPSILON): boolean => {
  const d1 = cross(b.from, b.to, a.from);
  const d2 = cross(b.from, b.to, a.to);
  const d3 = cross(a.from, a.to, b.from);
  const d4 = cross(a.from, a.to, b.to);

  if (((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) && ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0))) {
    return true;
  }

  return (
    pointToSegmentDistance(a.from, b) <= tolerance ||
    pointToSegmentDistance(a.to, b) <= tolerance ||
    pointToSegmentDistance(b.from, a) <= tolerance ||
    pointToSegmentDistance(b.to, a) <= tolerance
  );
};

export const lineArcIntersect = (line: LineSegment, arc: ArcSegment, tolerance: number = GEOMETRY_EPSILON): boolean => {
  const dx = line.to.x - line.from.x;
  const dy = line.to.y - line.from.y;
  const fx = line.from.x - arc.center.x;
  const fy = line.from.y - arc.center.y;

  const a = dx * dx + dy * dy;
  if (a === 0) return pointToArcDistance(line.from, arc) <= tolerance;

  const b = 2 * (fx * dx + fy * dy);
  const c = fx * fx + fy * fy - arc.radius * arc.radius;
  const disc = b * b - 4 * a * c;
  const slack = tolerance / Math.sqrt(a);

  if (disc >= 0) {
    const root = Math.sqrt(disc);
    for (const t of [(-b - root) / (2 * a), (-b + root) / (2 * a)]) {
      if (t >= -slack && t <= 1 + slack) {
        if (onArc(arc, { x: line.from.x + t * dx, y: line.from.y + t * dy }, tolerance)) return true;
      }
    }
  }

  // Near-tangent: the closest point on the line grazes the circle
  const tClosest = Math.max(0, Math.min(1, -b / (2 * a)));
  const closest = { x: line.from.x + tClosest * dx, y: line.from.y + tClosest * dy };
  if (Math.abs(distance(closest, arc.center) - arc.radius) <= tolerance && onArc(arc, closest, tolerance)) {
    return true;
  }

  return endpointsTouch(line, arc, tolerance);
};

export const arcsIntersect = (a: ArcSegment, b: ArcSegment, tolerance: number = GEOMETRY_EPSILON): boolean => {
  const d = distance(a.center, b.center);

  if (d <= tolerance) {
    // Concentric: only the same circle can overlap beyond shared endpoints
    if (Math.abs(a.radius - b.radius) > tolerance) return false;
    return endpointsTouch(a, b, tolerance);
  }

  if (d <= a.radius + b.radius + tolerance && d >= Math.abs(a.radius - b.radius) - tolerance) {
    const along = (a.radius * a.radius - b.radius * b.radius + d * d) / (2 * d);
    const h = Math.sqrt(Math.max(0, a.radius * a.radius - along * along));
    const ux = (b.center.x - a.center.x) / d;
    const uy = (b.center.y - a.center.y) / d;
    const base = { x: a.center.x + along * ux, y: a.center.y + along * uy };

    for (const sign of [1, -1]) {
      const p = { x: base.x - sign * h * uy, y: base.y + sign * h * ux };
      if (onArc(a, p, tolerance) && onArc(b, p, tolerance)) return true;
    }
  }

  return endpointsTouch(a, b, tolerance);
};

/**
 * Whether two segments cross or touch
 */
export const segmentsIntersect = (a: Segment, b: Segment, tolerance: number = GEOMETRY_EPSILON): boolean => {
  if (!boundsOverlap(segmentBounds(a), segmentBounds(b), tolerance)) return false;

  if (a.kind === 'line' && b.kind === 'line') return linesIntersect(a, b, tolerance);
  if (a.kind === 'line' && b.kind === 'arc') return lineArcIntersect(a, b, tolerance);
  if (a.kind === 'arc' && b.kind === 'line') return lineArcIntersect(b, a, tolerance);
  if (a.kind === 'arc' && b.kind === 'arc') return arcsIntersect(a, b, tolerance);
  return false;
};

export interface IntersectionOptions {
  closed?: boolean;     // first and last segments are neighbours
  tolerance?: number;
}

/**
 * Index pairs of non-neighbouring segments that cross or touch
 */
export const findSelfIntersections = (
  segments: readonly Segment[],
  options: IntersectionOptions = {}
): [number, number][] => {
  const { closed = false, tolerance = GEOMETRY_EPSILON } = options;
  const pairs: [number, number][] = [];
  const last = segments.length - 1;

  for (let i = 0; i < segments.length; i++) {
    for (let j = i + 2; j < segments.length; j++) {
      if (closed && i === 0 && j === last) continue;
      if (segmentsIntersect(segments[i], segments[j], tolerance)) {
        pairs.push([i, j]);
      }
    }
  }

  return pairs;
};

// Points of an arc lying on the line through its center along `direction`
const arcPointsAlong = (arc: ArcSegment, direction: Point): Point[] => {
  const length = Math.hypot(direction.x, direction.y);
  if (length === 0) return [];
  return [1, -1]
    .map((sign) => ({
      x: arc.center.x + (sign * arc.radius * direction.x) / length,
      y: arc.center.y + (sign * arc.radius * direction.y) / length,
    }))
    .filter((p) => onArc(arc, p, GEOMETRY_EPSILON));
};

/**
 * Shortest distance between the centerlines of two segments, 0 when they touch
 */
export const segmentDistance = (a: Segment, b: Segment): number => {
  if (segmentsIntersect(a, b)) return 0;

  const candidates = [
    pointToPathDistance(segmentStart(a), b),
    pointToPathDistance(segmentEnd(a), b),
    pointToPathDistance(segmentStart(b), a),
    pointToPathDistance(segmentEnd(b), a),
  ];

  // Interior closest points: arc points whose normal is parallel to the line's
  // normal, or that lie on the line through both centers
  const interior = (p: Segment, q: Segment): void => {
    if (p.kind !== 'arc') return;
    const direction = q.kind === 'line'
      ? { x: q.from.y - q.to.y, y: q.to.x - q.from.x }
      : { x: q.center.x - p.center.x, y: q.center.y - p.center.y };
    for (const point of arcPointsAlong(p, direction)) {
      candidates.push(pointToPathDistance(point, q));
    }
  };
  interior(a, b);
  interior(b, a);

  return Math.min(...candidates);
};

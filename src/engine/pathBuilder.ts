/**
 * Rounded-rectangle path builder
 *
 * Produces one lap around a rounded rectangle as straight edges and exact
 * quarter-circle corner arcs. Straight edges end where the corner arcs start,
 * so every line/arc junction is tangent. A lap may be left open between two
 * stops on its straight edges, which is where the winding's crossovers live.
 */

import type { Point, Segment, StartPosition, WindingDirection, WindowSpec } from '../types';
import { GEOMETRY_EPSILON } from '../config/defaults';
import { HALF_PI, distance, pointOnCircle, reverseSegment } from '../utils/geometry';
import { debug } from '../utils/debug';
import { PreconditionViolated } from './errors';

/**
 * Edge coordinates of a window placed around a center
 */
export interface LapFrame {
  left: number;
  right: number;
  top: number;
  bottom: number;
  radius: number;
  upperStraight: number;  // y where the left edge meets the top-left arc
  lowerStraight: number;  // y where the left edge meets the bottom-left arc
}

/**
 * A point on one of the straight edges a lap can start or stop on
 */
export type LapStop =
  | { edge: 'left'; y: number }
  | { edge: 'top'; x: number }
  | { edge: 'bottom'; x: number };

/**
 * Where a lap starts and where it stops. Equal stops make a closed lap.
 */
export interface LapOpening {
  start: LapStop;
  end: LapStop;
  direction: WindingDirection;
}

interface Corner {
  center: Point;
  startAngle: number;  // counter-clockwise start
}

const isFiniteNumber = (value: number): boolean => Number.isFinite(value);

/**
 * Reject windows the validator would never have let through
 */
export const assertLapWindow = (window: WindowSpec, center: Point): void => {
  const { width, height, cornerRadius } = window;

  if (![width, height, cornerRadius, center.x, center.y].every(isFiniteNumber)) {
    throw new PreconditionViolated('Lap window and center must be finite numbers');
  }
  if (width <= GEOMETRY_EPSILON || height <= GEOMETRY_EPSILON) {
    throw new PreconditionViolated(`Lap window ${width}×${height} has no area`);
  }
  if (cornerRadius < 0) {
    throw new PreconditionViolated(`Corner radius ${cornerRadius} is negative`);
  }
  if (cornerRadius > Math.min(width, height) / 2 + GEOMETRY_EPSILON) {
    throw new PreconditionViolated(
      `Corner radius ${cornerRadius} exceeds half the smaller side of a ${width}×${height} window`
    );
  }
};

export const lapFrame = (window: WindowSpec, center: Point): LapFrame => {
  const halfW = window.width / 2;
  const halfH = window.height / 2;
  // Anything within epsilon of the limit is the limit
  const radius = Math.min(window.cornerRadius, halfW, halfH);

  return {
    left: center.x - halfW,
    right: center.x + halfW,
    top: center.y + halfH,
    bottom: center.y - halfH,
    radius,
    upperStraight: center.y + halfH - radius,
    lowerStraight: center.y - halfH + radius,
  };
};

/**
 * Y coordinate of a start position's anchor on the left edge of a frame
 */
export const anchorY = (frame: LapFrame, startPosition: StartPosition, centerY: number): number => {
  switch (startPosition) {
    case 'left-top':
      return frame.upperStraight;
    case 'left-center':
      return centerY;
    case 'left-bottom':
      return frame.lowerStraight;
  }
};

/**
 * Anchor point of a start position: Left-Top sits just below the top-left arc,
 * Left-Center at the middle of the left edge, Left-Bottom just above the
 * bottom-left arc.
 */
export const anchorPoint = (window: WindowSpec, center: Point, startPosition: StartPosition): Point => {
  assertLapWindow(window, center);
  const frame = lapFrame(window, center);
  return { x: frame.left, y: anchorY(frame, startPosition, center.y) };
};

// Corners in counter-clockwise order starting from the bottom of the left edge
const frameCorners = (frame: LapFrame): Corner[] => {
  const { left, right, top, bottom, radius: r } = frame;
  return [
    { center: { x: left + r, y: bottom + r }, startAngle: Math.PI },       // bottom-left
    { center: { x: right - r, y: bottom + r }, startAngle: 3 * HALF_PI },  // bottom-right
    { center: { x: right - r, y: top - r }, startAngle: 0 },               // top-right
    { center: { x: left + r, y: top - r }, startAngle: HALF_PI },          // top-left
  ];
};

const pushLine = (segments: Segment[], from: Point, to: Point): void => {
  if (distance(from, to) > GEOMETRY_EPSILON) {
    segments.push({ kind: 'line', from, to });
  }
};

// The eight pieces of a lap in counter-clockwise order, starting with the left
// straight at its top end. Even pieces are straights, odd pieces corner arcs.
interface FramePieces {
  starts: Point[];
  ends: Point[];
  corners: Corner[];
}

const framePieces = (frame: LapFrame): FramePieces => {
  const corners = frameCorners(frame);
  const entries = corners.map((c) => pointOnCircle(c.center, frame.radius, c.startAngle));
  const exits = corners.map((c) => pointOnCircle(c.center, frame.radius, c.startAngle + HALF_PI));

  return {
    starts: [exits[3], entries[0], exits[0], entries[1], exits[1], entries[2], exits[2], entries[3]],
    ends: [entries[0], exits[0], entries[1], exits[1], entries[2], exits[2], entries[3], exits[3]],
    corners,
  };
};

const pieceOf = (stop: LapStop): number => {
  switch (stop.edge) {
    case 'left':
      return 0;
    case 'bottom':
      return 2;
    case 'top':
      return 6;
  }
};

// Corner points are the exact expressions each straight is computed with, so
// stops land precisely on the edge
const stopPoint = (pieces: FramePieces, stop: LapStop): Point => {
  switch (stop.edge) {
    case 'left':
      return { x: pieces.ends[0].x, y: stop.y };
    case 'bottom':
      return { x: stop.x, y: pieces.starts[2].y };
    case 'top':
      return { x: stop.x, y: pieces.starts[6].y };
  }
};

// Distance travelled along the stop's straight in counter-clockwise order
const progress = (pieces: FramePieces, stop: LapStop): number => {
  const k = pieceOf(stop);
  const p = stopPoint(pieces, stop);
  return distance(pieces.starts[k], p);
};

/**
 * Range a stop may take on its straight
 */
export const stopRange = (frame: LapFrame, edge: LapStop['edge']): [number, number] =>
  edge === 'left'
    ? [frame.lowerStraight, frame.upperStraight]
    : [frame.left + frame.radius, frame.right - frame.radius];

const stopValue = (stop: LapStop): number => (stop.edge === 'left' ? stop.y : stop.x);

const describeStop = (stop: LapStop): string =>
  stop.edge === 'left' ? `left edge y=${stop.y}` : `${stop.edge} edge x=${stop.x}`;

// Counter-clockwise from `from` to `to`, all the way round when both share a straight
const traceCounterClockwise = (frame: LapFrame, from: LapStop, to: LapStop): Segment[] => {
  const r = frame.radius;
  const pieces = framePieces(frame);
  const first = pieceOf(from);
  const last = pieceOf(to);
  const segments: Segment[] = [];

  pushLine(segments, stopPoint(pieces, from), pieces.ends[first]);

  for (let k = (first + 1) % 8; k !== last; k = (k + 1) % 8) {
    if (k % 2 === 0) {
      pushLine(segments, pieces.starts[k], pieces.ends[k]);
    } else if (r > 0) {
      const corner = pieces.corners[(k - 1) / 2];
      segments.push({
        kind: 'arc',
        center: corner.center,
        radius: r,
        startAngle: corner.startAngle,
        endAngle: corner.startAngle + HALF_PI,
        direction: 'ccw',
      });
    }
  }

  pushLine(segments, pieces.starts[last], stopPoint(pieces, to));

  return segments;
};

/**
 * Trace a lap from `opening.start` round to `opening.end`, leaving the stretch
 * between them untraced. Stops on the same straight go all the way round, so
 * the end must not lie ahead of the start in the direction of travel.
 */
export const traceLap = (window: WindowSpec, center: Point, opening: LapOpening): Segment[] => {
  assertLapWindow(window, center);
  const frame = lapFrame(window, center);
  const { start, end, direction } = opening;

  for (const stop of [start, end]) {
    const value = stopValue(stop);
    const [low, high] = stopRange(frame, stop.edge);
    if (!isFiniteNumber(value) || value < low - GEOMETRY_EPSILON || value > high + GEOMETRY_EPSILON) {
      throw new PreconditionViolated(`Lap stop at ${describeStop(stop)} is off its straight [${low}, ${high}]`);
    }
  }

  // Counter-clockwise order of travel, whichever way the lap runs
  const [from, to] = direction === 'ccw' ? [start, end] : [end, start];
  if (start.edge === end.edge) {
    const pieces = framePieces(frame);
    if (progress(pieces, to) > progress(pieces, from) + GEOMETRY_EPSILON) {
      throw new PreconditionViolated(
        `A ${direction} lap cannot run from ${describeStop(start)} to ${describeStop(end)} without overlapping itself`
      );
    }
  }

  const segments = direction === 'ccw'
    ? traceCounterClockwise(frame, from, to)
    : traceCounterClockwise(frame, from, to).reverse().map(reverseSegment);

  debug(
    'builder',
    `lap ${window.width}×${window.height} r=${frame.radius} ${direction} ${describeStop(start)} → ${describeStop(end)}: ${segments.length} segments`
  );

  return segments;
};

/**
 * One full closed lap around the rounded rectangle, starting and ending at the
 * start position's anchor.
 */
export const buildLap = (
  window: WindowSpec,
  center: Point,
  startPosition: StartPosition,
  direction: WindingDirection
): Segment[] => {
  const { y } = anchorPoint(window, center, startPosition);
  const stop: LapStop = { edge: 'left', y };
  return traceLap(window, center, { start: stop, end: stop, direction });
};

// Core geometry uses a y-up frame in millimetres: counter-clockwise is positive.

export interface Point {
  readonly x: number;
  readonly y: number;
}

// Rotational sense of a lap (and of each corner arc within it)
export type WindingDirection = 'ccw' | 'cw';

// Where on the left edge the winding's terminals sit
export type StartPosition = 'left-top' | 'left-center' | 'left-bottom';

export const START_POSITIONS: readonly StartPosition[] = ['left-top', 'left-center', 'left-bottom'];
export const WINDING_DIRECTIONS: readonly WindingDirection[] = ['ccw', 'cw'];

export interface LineSegment {
  readonly kind: 'line';
  readonly from: Point;
  readonly to: Point;
}

// Always an exact quarter circle: endAngle = startAngle ± π/2
export interface ArcSegment {
  readonly kind: 'arc';
  readonly center: Point;
  readonly radius: number;
  readonly startAngle: number;   // radians, normalized to [0, 2π)
  readonly endAngle: number;     // radians, startAngle + π/2 (ccw) or − π/2 (cw)
  readonly direction: WindingDirection;
}

export type Segment = LineSegment | ArcSegment;

export interface WindowSpec {
  readonly width: number;
  readonly height: number;
  readonly cornerRadius: number;  // ≤ min(width, height) / 2 once validated
}

export interface WindingParams {
  readonly center: Point;
  readonly window: WindowSpec;
  readonly trackWidth: number;
  readonly guard: number;         // copper-to-copper spacing between adjacent turns
  readonly innerGap: number;      // clearance reserved inside the window, never consumed by a turn
  readonly turns: number;
  readonly startPosition: StartPosition;
  readonly direction?: WindingDirection;  // defaults to 'ccw'
}

// Output of the validator: radius clamped, direction resolved, pitch derived
export interface NormalizedWindingParams extends WindingParams {
  readonly direction: WindingDirection;
  readonly pitch: number;         // trackWidth + guard
}

export interface LapRecord {
  readonly turn: number;          // 1 = outermost
  readonly window: WindowSpec;
  readonly firstSegment: number;  // index into SpiralResult.segments
  readonly segmentCount: number;
}

export interface SpiralResult {
  readonly segments: readonly Segment[];
  readonly innerTerminal: Point;
  readonly outerTerminal: Point;
  readonly laps: readonly LapRecord[];
  readonly pitch: number;
}

// Copper layer name as the board understands it, e.g. "F.Cu"
export type LayerId = string;

/**
 * Consumer of a synthesized segment sequence: turns each Line into a straight
 * trace and each Arc into a curved trace on some board representation.
 */
export interface RenderingSink {
  consume(segments: readonly Segment[], layer: LayerId): void;
}

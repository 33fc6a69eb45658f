/**
 * Spiral assembler
 *
 * Stacks laps from the outermost window inward, one pitch per side at a time,
 * and joins consecutive laps with a straight stitch. Each lap is left open
 * where the next one begins, and the stitch from lap i lands exactly where
 * lap i+1 starts. Every opening is placed on its own lap's frame.
 *
 * Radial stitches step one pitch across the left edge. Each lap opens over
 * one pitch of that edge, a pitch further along than the lap before:
 *
 *   lap i ends (L_i, e) ──── (L_i + p, e) lap i+1 starts
 *
 * Counter-clockwise from Left-Top (and its mirror, clockwise from Left-Bottom)
 * the lap would have to end above the top of the edge it starts on, so laps
 * open over the top-left corner instead. With m = max(r_1, p):
 *
 *   lap i ends (L_i + m, T_i) ─┐
 *                               ╲   stitch i
 *                                ╲
 *    (L_i + p, T_i − m) lap i+1 ─┘
 *
 * Successive stitches are translates by (p, −p), so they stay at least one
 * pitch apart, and a sharp lap keeps exactly four edges.
 */

import type {
  LapRecord,
  NormalizedWindingParams,
  Point,
  Segment,
  SpiralResult,
  StartPosition,
  WindingDirection,
  WindowSpec,
} from '../types';
import { GEOMETRY_EPSILON } from '../config/defaults';
import { segmentEnd, segmentStart } from '../utils/geometry';
import { debug } from '../utils/debug';
import { GeometryExhausted, PreconditionViolated } from './errors';
import { anchorY, lapFrame, stopRange, traceLap } from './pathBuilder';
import type { LapOpening, LapStop } from './pathBuilder';

export type StitchStyle = 'radial' | 'corner';

type OpeningParams = Pick<
  NormalizedWindingParams,
  'center' | 'window' | 'pitch' | 'startPosition' | 'direction'
>;

/**
 * Window of turn `turn` (1 = outermost): inset by (turn − 1)·pitch on every side
 */
export const insetWindow = (window: WindowSpec, pitch: number, turn: number): WindowSpec => {
  const inset = (turn - 1) * pitch;
  return {
    width: window.width - 2 * inset,
    height: window.height - 2 * inset,
    cornerRadius: Math.max(window.cornerRadius - inset, 0),
  };
};

/**
 * Corner stitches where a radial one would run against the direction of travel
 */
export const stitchStyle = (startPosition: StartPosition, direction: WindingDirection): StitchStyle =>
  (startPosition === 'left-top' && direction === 'ccw') || (startPosition === 'left-bottom' && direction === 'cw')
    ? 'corner'
    : 'radial';

/**
 * Where turn `turn` starts and stops. The first lap starts on the start
 * position's anchor; each later lap starts where the previous one's stitch lands.
 */
export const lapOpening = (params: OpeningParams, turn: number): LapOpening => {
  const { center, window, pitch, startPosition, direction } = params;
  const outer = lapFrame(insetWindow(window, pitch, 1), center);
  const frame = lapFrame(insetWindow(window, pitch, turn), center);
  const anchor = anchorY(outer, startPosition, center.y);

  if (stitchStyle(startPosition, direction) === 'radial') {
    const step = direction === 'ccw' ? pitch : -pitch;
    return {
      start: { edge: 'left', y: anchor + (turn - 1) * step },
      end: { edge: 'left', y: anchor + turn * step },
      direction,
    };
  }

  const reach = Math.max(outer.radius, pitch);
  if (startPosition === 'left-top') {
    return {
      start: { edge: 'left', y: turn === 1 ? anchor : frame.top + pitch - reach },
      end: { edge: 'top', x: frame.left + reach },
      direction,
    };
  }
  return {
    start: { edge: 'left', y: turn === 1 ? anchor : frame.bottom - pitch + reach },
    end: { edge: 'bottom', x: frame.left + reach },
    direction,
  };
};

const stopValue = (stop: LapStop): number => (stop.edge === 'left' ? stop.y : stop.x);

// The lap reaches its end stop travelling from the high end of that straight
const arrivesFromHigh = (stop: LapStop, direction: WindingDirection): boolean =>
  stop.edge === 'bottom' ? direction === 'cw' : direction === 'ccw';

/**
 * Why a turn's opening does not fit its lap, or undefined when it does. Both
 * stops must lie on their straights, and the end must stop short of the
 * corner it arrives from.
 */
export const openingMisfit = (params: OpeningParams, turn: number): string | undefined => {
  const frame = lapFrame(insetWindow(params.window, params.pitch, turn), params.center);
  const { start, end, direction } = lapOpening(params, turn);

  for (const stop of [start, end]) {
    const [low, high] = stopRange(frame, stop.edge);
    const value = stopValue(stop);
    if (value < low - GEOMETRY_EPSILON || value > high + GEOMETRY_EPSILON) {
      return `turn ${turn} needs its ${stop.edge} edge at ${value}, outside its straight [${low}, ${high}]`;
    }
  }

  const [low, high] = stopRange(frame, end.edge);
  const value = stopValue(end);
  const clear = arrivesFromHigh(end, direction) ? value < high - GEOMETRY_EPSILON : value > low + GEOMETRY_EPSILON;
  if (!clear) {
    return `turn ${turn} would end on the corner of its ${end.edge} edge at ${value}`;
  }

  return undefined;
};

const assertAssemblerInput = (params: NormalizedWindingParams): void => {
  const { trackWidth, guard, pitch, turns, window } = params;

  if (!(trackWidth > 0) || !(guard > 0)) {
    throw new PreconditionViolated(`Track width ${trackWidth} and guard ${guard} must be positive`);
  }
  if (Math.abs(pitch - (trackWidth + guard)) > GEOMETRY_EPSILON) {
    throw new PreconditionViolated(`Pitch ${pitch} is not track width + guard (${trackWidth + guard})`);
  }
  if (!Number.isInteger(turns) || turns < 1) {
    throw new PreconditionViolated(`Turn count ${turns} is not a positive integer`);
  }
  if (!(window.width > 0) || !(window.height > 0)) {
    throw new PreconditionViolated(`Window ${window.width}×${window.height} has no area`);
  }
};

const firstPoint = (segments: readonly Segment[], turn: number): Point => {
  const first = segments[0];
  if (!first) throw new PreconditionViolated(`Lap ${turn} produced no segments`);
  return segmentStart(first);
};

const lastPoint = (segments: readonly Segment[], turn: number): Point => {
  const last = segments[segments.length - 1];
  if (!last) throw new PreconditionViolated(`Lap ${turn} produced no segments`);
  return segmentEnd(last);
};

/**
 * Assemble all turns of a validated winding into one continuous segment sequence
 */
export const assembleSpiral = (params: NormalizedWindingParams): SpiralResult => {
  assertAssemblerInput(params);
  const { center, window, pitch, turns, direction } = params;

  // ==========================================================================
  // Lap windows
  // ==========================================================================

  const windows: WindowSpec[] = [];
  for (let turn = 1; turn <= turns; turn++) {
    const lapWindow = insetWindow(window, pitch, turn);
    if (lapWindow.width <= GEOMETRY_EPSILON || lapWindow.height <= GEOMETRY_EPSILON) {
      throw new GeometryExhausted(
        turn - 1,
        turns,
        `turn ${turn} would be ${lapWindow.width}×${lapWindow.height}`
      );
    }
    windows.push(lapWindow);
  }

  // ==========================================================================
  // Openings
  // ==========================================================================

  windows.forEach((_, index) => {
    const misfit = openingMisfit(params, index + 1);
    if (misfit !== undefined) {
      throw new GeometryExhausted(index, turns, misfit);
    }
  });

  debug('assembler', `${turns} turns, pitch ${pitch}, ${stitchStyle(params.startPosition, direction)} stitches`);

  // ==========================================================================
  // Laps and stitches
  // ==========================================================================

  const laps = windows.map((lapWindow, index) => traceLap(lapWindow, center, lapOpening(params, index + 1)));

  const segments: Segment[] = [];
  const records: LapRecord[] = [];

  laps.forEach((lap, index) => {
    const turn = index + 1;
    if (index > 0) {
      const stitch: Segment = {
        kind: 'line',
        from: lastPoint(laps[index - 1], turn - 1),
        to: firstPoint(lap, turn),
      };
      segments.push(stitch);
    }
    records.push({
      turn,
      window: windows[index],
      firstSegment: segments.length,
      segmentCount: lap.length,
    });
    segments.push(...lap);
    debug('assembler', `turn ${turn}: ${windows[index].width}×${windows[index].height} r=${windows[index].cornerRadius}, ${lap.length} segments`);
  });

  return {
    segments,
    outerTerminal: firstPoint(laps[0], 1),
    innerTerminal: lastPoint(laps[laps.length - 1], turns),
    laps: records,
    pitch,
  };
};

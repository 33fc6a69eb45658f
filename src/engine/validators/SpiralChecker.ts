/**
 * Spiral Checker - Validates the geometry of a synthesized winding
 *
 * Rules validated:
 * 1. spiral:continuity - Each segment starts where the previous one ends
 * 2. spiral:tangency - Junctions involving an arc keep the direction of travel
 * 3. spiral:quarter-arcs - Every arc sweeps exactly 90° in its stated direction
 * 4. spiral:no-self-intersection - No two non-neighbouring segments touch
 * 5. spiral:turn-count - One lap per requested turn, one stitch between laps
 * 6. spiral:monotonic-shrink - Each lap is exactly one pitch smaller per side
 * 7. spiral:no-zero-length - No degenerate segments (warning)
 * 8. spiral:copper-clearance - Copper of different turns keeps the guard (needs track width)
 */

import type { Point, Segment, SpiralResult } from '../../types';
import { GEOMETRY_EPSILON } from '../../config/defaults';
import {
  HALF_PI,
  TWO_PI,
  arcSweep,
  boundsOverlap,
  endDirection,
  segmentBounds,
  segmentEnd,
  segmentLength,
  segmentStart,
  startDirection,
} from '../../utils/geometry';
import { findSelfIntersections, segmentDistance } from '../../utils/segmentIntersection';
import { footprintOverlapArea } from '../../utils/copperFootprint';
import { debug } from '../../utils/debug';

// =============================================================================
// Types
// =============================================================================

export type SpiralRuleId =
  | 'spiral:continuity'
  | 'spiral:tangency'
  | 'spiral:quarter-arcs'
  | 'spiral:no-self-intersection'
  | 'spiral:turn-count'
  | 'spiral:monotonic-shrink'
  | 'spiral:no-zero-length'
  | 'spiral:copper-clearance';

export interface SpiralValidationError {
  rule: SpiralRuleId;
  severity: 'error' | 'warning';
  message: string;
  details: {
    segmentIndex?: number;
    otherIndex?: number;
    turn?: number;
    at?: Point;
    [key: string]: unknown;
  };
}

export interface SpiralCheckResult {
  valid: boolean;
  errors: SpiralValidationError[];
  warnings: SpiralValidationError[];
  summary: {
    rulesChecked: SpiralRuleId[];
    errorCount: number;
    warningCount: number;
  };
}

export interface SpiralCheckOptions {
  turns?: number;        // expected lap count
  trackWidth?: number;   // enables spiral:copper-clearance
}

// =============================================================================
// Constants
// =============================================================================

const JOIN_TOLERANCE = 1e-6;       // mm - endpoints closer than this are joined
const TANGENT_TOLERANCE = 1e-6;    // cross product of unit directions
const SWEEP_TOLERANCE = 1e-9;      // radians
const CLEARANCE_TOLERANCE = 1e-6;  // mm

// =============================================================================
// Spiral Checker Class
// =============================================================================

export class SpiralChecker {
  private errors: SpiralValidationError[] = [];
  private warnings: SpiralValidationError[] = [];
  private rulesChecked = new Set<SpiralRuleId>();

  constructor(
    private spiral: SpiralResult,
    private options: SpiralCheckOptions = {}
  ) {}

  /**
   * Run all spiral checks and return results
   */
  check(): SpiralCheckResult {
    this.errors = [];
    this.warnings = [];
    this.rulesChecked.clear();

    this.checkContinuity();
    this.checkTangency();
    this.checkQuarterArcs();
    this.checkNoSelfIntersection();
    this.checkTurnCount();
    this.checkMonotonicShrink();
    this.checkNoZeroLength();
    if (this.options.trackWidth !== undefined) {
      this.checkCopperClearance(this.options.trackWidth);
    }

    debug('checker', `${this.errors.length} errors, ${this.warnings.length} warnings over ${this.spiral.segments.length} segments`);

    return this.buildResult();
  }

  private buildResult(): SpiralCheckResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        warningCount: this.warnings.length,
      },
    };
  }

  private addError(
    rule: SpiralRuleId,
    message: string,
    details: SpiralValidationError['details']
  ): void {
    this.rulesChecked.add(rule);
    this.errors.push({ rule, severity: 'error', message, details });
  }

  private addWarning(
    rule: SpiralRuleId,
    message: string,
    details: SpiralValidationError['details']
  ): void {
    this.rulesChecked.add(rule);
    this.warnings.push({ rule, severity: 'warning', message, details });
  }

  private markRuleChecked(rule: SpiralRuleId): void {
    this.rulesChecked.add(rule);
  }

  // ===========================================================================
  // Rule: spiral:continuity
  // ===========================================================================

  private checkContinuity(): void {
    this.markRuleChecked('spiral:continuity');
    const { segments } = this.spiral;

    for (let i = 0; i + 1 < segments.length; i++) {
      const end = segmentEnd(segments[i]);
      const start = segmentStart(segments[i + 1]);
      const gap = Math.hypot(start.x - end.x, start.y - end.y);
      if (gap > JOIN_TOLERANCE) {
        this.addError('spiral:continuity',
          `Gap of ${gap} mm between segments ${i} and ${i + 1}`,
          { segmentIndex: i, otherIndex: i + 1, at: end, gap }
        );
      }
    }
  }

  // ===========================================================================
  // Rule: spiral:tangency
  // Line-to-line junctions are corners by construction and are not checked
  // ===========================================================================

  private checkTangency(): void {
    this.markRuleChecked('spiral:tangency');
    const { segments } = this.spiral;

    for (let i = 0; i + 1 < segments.length; i++) {
      const a = segments[i];
      const b = segments[i + 1];
      if (a.kind === 'line' && b.kind === 'line') continue;

      const u = endDirection(a);
      const v = startDirection(b);
      const cross = u.x * v.y - u.y * v.x;
      const dot = u.x * v.x + u.y * v.y;
      if (Math.abs(cross) > TANGENT_TOLERANCE || dot <= 0) {
        this.addError('spiral:tangency',
          `Direction changes between ${a.kind} ${i} and ${b.kind} ${i + 1}`,
          { segmentIndex: i, otherIndex: i + 1, at: segmentEnd(a), cross, dot }
        );
      }
    }
  }

  // ===========================================================================
  // Rule: spiral:quarter-arcs
  // ===========================================================================

  private checkQuarterArcs(): void {
    this.markRuleChecked('spiral:quarter-arcs');

    this.spiral.segments.forEach((segment, index) => {
      if (segment.kind !== 'arc') return;

      const expected = segment.direction === 'ccw' ? HALF_PI : -HALF_PI;
      const sweep = arcSweep(segment);
      if (Math.abs(sweep - expected) > SWEEP_TOLERANCE) {
        this.addError('spiral:quarter-arcs',
          `Arc ${index} sweeps ${sweep} rad, expected ${expected}`,
          { segmentIndex: index, sweep }
        );
      }
      if (segment.startAngle < 0 || segment.startAngle >= TWO_PI) {
        this.addError('spiral:quarter-arcs',
          `Arc ${index} start angle ${segment.startAngle} is outside [0, 2π)`,
          { segmentIndex: index, startAngle: segment.startAngle }
        );
      }
      if (!(segment.radius > 0)) {
        this.addError('spiral:quarter-arcs',
          `Arc ${index} has radius ${segment.radius}`,
          { segmentIndex: index, radius: segment.radius }
        );
      }
    });
  }

  // ===========================================================================
  // Rule: spiral:no-self-intersection
  // ===========================================================================

  private checkNoSelfIntersection(): void {
    this.markRuleChecked('spiral:no-self-intersection');

    for (const [i, j] of findSelfIntersections(this.spiral.segments)) {
      this.addError('spiral:no-self-intersection',
        `Segments ${i} and ${j} cross or touch`,
        { segmentIndex: i, otherIndex: j }
      );
    }
  }

  // ===========================================================================
  // Rule: spiral:turn-count
  // ===========================================================================

  private checkTurnCount(): void {
    this.markRuleChecked('spiral:turn-count');
    const { laps, segments } = this.spiral;

    if (this.options.turns !== undefined && laps.length !== this.options.turns) {
      this.addError('spiral:turn-count',
        `Spiral has ${laps.length} laps, expected ${this.options.turns}`,
        { laps: laps.length, expected: this.options.turns }
      );
    }

    const lapSegments = laps.reduce((sum, lap) => sum + lap.segmentCount, 0);
    const stitches = Math.max(laps.length - 1, 0);
    if (lapSegments + stitches !== segments.length) {
      this.addError('spiral:turn-count',
        `${segments.length} segments do not split into ${laps.length} laps and ${stitches} stitches`,
        { segments: segments.length, lapSegments, stitches }
      );
    }
  }

  // ===========================================================================
  // Rule: spiral:monotonic-shrink
  // ===========================================================================

  private checkMonotonicShrink(): void {
    this.markRuleChecked('spiral:monotonic-shrink');
    const { laps, pitch } = this.spiral;

    for (let i = 0; i + 1 < laps.length; i++) {
      const outer = laps[i].window;
      const inner = laps[i + 1].window;
      const widthStep = outer.width - inner.width;
      const heightStep = outer.height - inner.height;
      const radius = Math.max(outer.cornerRadius - pitch, 0);

      if (
        Math.abs(widthStep - 2 * pitch) > JOIN_TOLERANCE ||
        Math.abs(heightStep - 2 * pitch) > JOIN_TOLERANCE ||
        Math.abs(inner.cornerRadius - radius) > JOIN_TOLERANCE
      ) {
        this.addError('spiral:monotonic-shrink',
          `Turn ${laps[i + 1].turn} is not one pitch inside turn ${laps[i].turn}`,
          { turn: laps[i + 1].turn, widthStep, heightStep, cornerRadius: inner.cornerRadius }
        );
      }
    }
  }

  // ===========================================================================
  // Rule: spiral:no-zero-length
  // ===========================================================================

  private checkNoZeroLength(): void {
    this.markRuleChecked('spiral:no-zero-length');

    this.spiral.segments.forEach((segment, index) => {
      if (segmentLength(segment) <= GEOMETRY_EPSILON) {
        this.addWarning('spiral:no-zero-length',
          `Segment ${index} has no length`,
          { segmentIndex: index, at: segmentStart(segment) }
        );
      }
    });
  }

  // ===========================================================================
  // Rule: spiral:copper-clearance
  // Segments of the same lap share copper, and so do segments joined along
  // the path by less than one pitch (a stitch and the lap ends it bridges)
  // ===========================================================================

  private checkCopperClearance(trackWidth: number): void {
    this.markRuleChecked('spiral:copper-clearance');
    const { segments, pitch } = this.spiral;
    const guard = pitch - trackWidth;
    const runs = this.runIds();
    const bounds = segments.map(segmentBounds);

    // along[k] is the path length before segment k
    const along = [0];
    segments.forEach((segment, k) => along.push(along[k] + segmentLength(segment)));

    for (let i = 0; i < segments.length; i++) {
      for (let j = i + 2; j < segments.length; j++) {
        if (runs[i] === runs[j]) continue;
        if (along[j] - along[i + 1] < pitch) continue;
        if (!boundsOverlap(bounds[i], bounds[j], pitch)) continue;

        const gap = segmentDistance(segments[i], segments[j]) - trackWidth;
        if (gap < guard - CLEARANCE_TOLERANCE) {
          const area = footprintOverlapArea(segments[i], segments[j], trackWidth);
          this.addError('spiral:copper-clearance',
            `Copper of segments ${i} and ${j} is ${gap} mm apart, closer than the ${guard} mm guard`,
            { segmentIndex: i, otherIndex: j, gap, area }
          );
        }
      }
    }
  }

  // Lap number for lap segments, a unique negative id for each stitch
  private runIds(): number[] {
    const runs: number[] = this.spiral.segments.map((_, index) => -(index + 1));
    for (const lap of this.spiral.laps) {
      for (let k = 0; k < lap.segmentCount; k++) {
        runs[lap.firstSegment + k] = lap.turn;
      }
    }
    return runs;
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Check the geometry of a spiral
 */
export function checkSpiral(spiral: SpiralResult, options: SpiralCheckOptions = {}): SpiralCheckResult {
  const checker = new SpiralChecker(spiral, options);
  return checker.check();
}

/**
 * Whether a segment sequence is free of self-intersections
 */
export function isPathSimple(segments: readonly Segment[]): boolean {
  return findSelfIntersections(segments).length === 0;
}

/**
 * Format check results for display
 */
export function formatSpiralCheckResult(result: SpiralCheckResult): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('SPIRAL GEOMETRY CHECK RESULTS');
  lines.push('='.repeat(60));
  lines.push('');
  lines.push(`Status: ${result.valid ? '✓ VALID' : '✗ INVALID'}`);
  lines.push(`Errors: ${result.summary.errorCount}`);
  lines.push(`Warnings: ${result.summary.warningCount}`);
  lines.push(`Rules Checked: ${result.summary.rulesChecked.length}`);
  lines.push('');

  const section = (title: string, marker: string, entries: SpiralValidationError[]): void => {
    if (entries.length === 0) return;
    lines.push('-'.repeat(60));
    lines.push(title);
    lines.push('-'.repeat(60));

    for (const entry of entries) {
      lines.push('');
      lines.push(`${marker} [${entry.rule}]`);
      lines.push(`  ${entry.message}`);
      for (const [key, value] of Object.entries(entry.details)) {
        if (value !== undefined) {
          lines.push(`  ${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        }
      }
    }
    lines.push('');
  };

  section('ERRORS', '✗', result.errors);
  section('WARNINGS', '⚠', result.warnings);

  lines.push('='.repeat(60));

  return lines.join('\n');
}

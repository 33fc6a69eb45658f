/**
 * KiCad board export
 *
 * Writes segments as the s-expressions a .kicad_pcb file uses for copper:
 *   (segment (start x y) (end x y) (width w) (layer "F.Cu") (net 0))
 *   (arc (start x y) (mid x y) (end x y) (width w) (layer "F.Cu") (net 0))
 *
 * Board coordinates grow downward, so points are mirrored across the x axis
 * unless `flipY` is off.
 */

import type { LayerId, Point, RenderingSink, Segment } from '../types';
import { DEFAULT_LAYER, isCopperLayer } from '../config/defaults';
import type { CopperLayer } from '../config/defaults';
import { pointOnCircle, segmentEnd, segmentStart } from './geometry';
import { debug } from './debug';

export interface KicadExportOptions {
  trackWidth: number;
  net?: number;
  flipY?: boolean;
}

// Board files carry nanometre resolution: six decimals of a millimetre
export const formatMm = (value: number): string => {
  const rounded = Number(value.toFixed(6));
  return String(rounded === 0 ? 0 : rounded);
};

/**
 * Unknown layer names fall back to the front copper layer
 */
export const resolveLayer = (name: LayerId): CopperLayer => {
  if (isCopperLayer(name)) return name;
  debug('export', `unknown layer "${name}", using ${DEFAULT_LAYER}`);
  return DEFAULT_LAYER;
};

export const toBoardPoint = (p: Point, flipY: boolean = true): Point =>
  flipY ? { x: p.x, y: -p.y } : p;

export const fromBoardPoint = (p: Point, flipY: boolean = true): Point =>
  flipY ? { x: p.x, y: -p.y } : p;

const xy = (tag: string, p: Point): string => `(${tag} ${formatMm(p.x)} ${formatMm(p.y)})`;

/**
 * One board item per segment
 */
export const segmentToKicad = (
  segment: Segment,
  layer: CopperLayer,
  options: KicadExportOptions
): string => {
  const { trackWidth, net = 0, flipY = true } = options;
  const board = (p: Point): Point => toBoardPoint(p, flipY);
  const tail = `(width ${formatMm(trackWidth)}) (layer "${layer}") (net ${net})`;

  const start = board(segmentStart(segment));
  const end = board(segmentEnd(segment));

  if (segment.kind === 'line') {
    return `(segment ${xy('start', start)} ${xy('end', end)} ${tail})`;
  }

  const mid = board(pointOnCircle(segment.center, segment.radius, (segment.startAngle + segment.endAngle) / 2));
  return `(arc ${xy('start', start)} ${xy('mid', mid)} ${xy('end', end)} ${tail})`;
};

/**
 * Rendering sink that accumulates KiCad board items
 */
export class KicadSink implements RenderingSink {
  private items: string[] = [];

  constructor(private options: KicadExportOptions) {}

  consume(segments: readonly Segment[], layer: LayerId): void {
    const copper = resolveLayer(layer);
    for (const segment of segments) {
      this.items.push(segmentToKicad(segment, copper, this.options));
    }
  }

  get itemCount(): number {
    return this.items.length;
  }

  toString(): string {
    return this.items.join('\n');
  }

  clear(): void {
    this.items = [];
  }
}

import type { LayerId, Point, RenderingSink, Segment, WindowSpec } from '../types';
import type { MultiPolygon } from 'polygon-clipping';
import { getColors } from '../config/colors';
import { buildLap } from '../engine/pathBuilder';
import { segmentBounds, segmentEnd, segmentStart, pointsEqual } from './geometry';
import type { Bounds2D } from './geometry';
import { unionFootprints } from './copperFootprint';

// =============================================================================
// Path data
// =============================================================================

// Avoids "-0.000" in the output
const fmt = (value: number): string => {
  const text = value.toFixed(3);
  return text === '-0.000' ? '0.000' : text;
};

const PEN_TOLERANCE = 1e-6;

const escapeXml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/**
 * Convert a segment sequence to SVG path data.
 * SVG's y axis points down, so y is negated before the offset is applied. A
 * counter-clockwise arc in board space therefore gets sweep-flag 1.
 */
export const segmentsToSvgPath = (
  segments: readonly Segment[],
  offsetX: number = 0,
  offsetY: number = 0
): string => {
  const toScreen = (p: Point): string => `${fmt(p.x + offsetX)} ${fmt(-p.y + offsetY)}`;
  const commands: string[] = [];
  let pen: Point | null = null;

  for (const segment of segments) {
    const start = segmentStart(segment);
    if (!pen || !pointsEqual(pen, start, PEN_TOLERANCE)) {
      commands.push(`M ${toScreen(start)}`);
    }

    const end = segmentEnd(segment);
    if (segment.kind === 'line') {
      commands.push(`L ${toScreen(end)}`);
    } else {
      const sweep = segment.direction === 'ccw' ? 1 : 0;
      commands.push(`A ${fmt(segment.radius)} ${fmt(segment.radius)} 0 0 ${sweep} ${toScreen(end)}`);
    }
    pen = end;
  }

  return commands.join(' ');
};

const multiPolygonToSvgPath = (multiPolygon: MultiPolygon, offsetX: number, offsetY: number): string =>
  multiPolygon
    .flatMap((polygon) => polygon)
    .map((ring) =>
      ring
        .map(([x, y], i) => `${i === 0 ? 'M' : 'L'} ${fmt(x + offsetX)} ${fmt(-y + offsetY)}`)
        .join(' ') + ' Z'
    )
    .join(' ');

// =============================================================================
// Documents
// =============================================================================

export interface SvgLayer {
  layer: LayerId;
  segments: readonly Segment[];
}

export interface SpiralSvgOptions {
  trackWidth?: number;         // mm, default 0.25
  title?: string;
  padding?: number;            // mm around the drawing, default trackWidth + 1
  copperFill?: boolean;        // filled copper outline instead of a stroked centerline
  outline?: { center: Point; window: WindowSpec };  // dashed window boundary
  terminals?: { outer: Point; inner: Point };
  background?: boolean;
}

const mergeBounds = (all: Bounds2D[]): Bounds2D | null => {
  if (all.length === 0) return null;
  return {
    minX: Math.min(...all.map((b) => b.minX)),
    maxX: Math.max(...all.map((b) => b.maxX)),
    minY: Math.min(...all.map((b) => b.minY)),
    maxY: Math.max(...all.map((b) => b.maxY)),
  };
};

/**
 * Generate an SVG document showing one path per copper layer
 */
export const generateSpiralSVG = (layers: readonly SvgLayer[], options: SpiralSvgOptions = {}): string => {
  const colors = getColors();
  const trackWidth = options.trackWidth ?? 0.25;
  const padding = options.padding ?? trackWidth + 1;

  // Same clamp the validator applies, so a raw window draws as it was wound
  const outlineWindow = (window: WindowSpec): WindowSpec => ({
    ...window,
    cornerRadius: Math.min(window.cornerRadius, window.width / 2, window.height / 2),
  });
  const outlineSegments = options.outline
    ? buildLap(outlineWindow(options.outline.window), options.outline.center, 'left-top', 'ccw')
    : [];

  const bounds = mergeBounds(
    [...layers.flatMap((l) => l.segments), ...outlineSegments].map(segmentBounds)
  ) ?? { minX: 0, maxX: 0, minY: 0, maxY: 0 };

  const svgWidth = bounds.maxX - bounds.minX + padding * 2;
  const svgHeight = bounds.maxY - bounds.minY + padding * 2;

  // Board point (x, y) lands at (x + offsetX, −y + offsetY)
  const offsetX = padding - bounds.minX;
  const offsetY = padding + bounds.maxY;

  let svg = `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg"
     width="${fmt(svgWidth)}mm"
     height="${fmt(svgHeight)}mm"
     viewBox="0 0 ${fmt(svgWidth)} ${fmt(svgHeight)}">
`;

  if (options.title) {
    svg += `  <title>${escapeXml(options.title)}</title>\n`;
  }
  if (options.background) {
    svg += `  <rect width="100%" height="100%" fill="${colors.background}" />\n`;
  }
  if (outlineSegments.length > 0) {
    svg += `  <path d="${segmentsToSvgPath(outlineSegments, offsetX, offsetY)} Z" stroke="${colors.outline.window}" stroke-width="0.05" stroke-dasharray="0.5 0.3" fill="none" opacity="${colors.opacity.outline}" />\n`;
  }

  layers.forEach((layer, index) => {
    const color = index === 0 ? colors.copper.track.base : colors.copper.track.highlight;
    svg += `  <g id="${layer.layer}" opacity="${colors.opacity.copper}">\n`;
    if (options.copperFill) {
      const d = multiPolygonToSvgPath(unionFootprints(layer.segments, trackWidth), offsetX, offsetY);
      svg += `    <path d="${d}" fill="${color}" fill-rule="evenodd" stroke="none" />\n`;
    } else {
      const d = segmentsToSvgPath(layer.segments, offsetX, offsetY);
      svg += `    <path d="${d}" stroke="${color}" stroke-width="${fmt(trackWidth)}" stroke-linecap="round" stroke-linejoin="round" fill="none" />\n`;
    }
    svg += '  </g>\n';
  });

  if (options.terminals) {
    const { outer, inner } = options.terminals;
    const r = fmt(trackWidth);
    svg += `  <circle cx="${fmt(outer.x + offsetX)}" cy="${fmt(-outer.y + offsetY)}" r="${r}" fill="${colors.terminal.outer}" />\n`;
    svg += `  <circle cx="${fmt(inner.x + offsetX)}" cy="${fmt(-inner.y + offsetY)}" r="${r}" fill="${colors.terminal.inner}" />\n`;
  }

  svg += '</svg>';
  return svg;
};

// =============================================================================
// Rendering sink
// =============================================================================

/**
 * Collects segments per layer and renders them as one SVG document
 */
export class SvgSink implements RenderingSink {
  private layers: SvgLayer[] = [];

  constructor(private options: SpiralSvgOptions = {}) {}

  consume(segments: readonly Segment[], layer: LayerId): void {
    const index = this.layers.findIndex((l) => l.layer === layer);
    if (index === -1) {
      this.layers.push({ layer, segments: [...segments] });
    } else {
      this.layers[index] = { layer, segments: [...this.layers[index].segments, ...segments] };
    }
  }

  get layerIds(): LayerId[] {
    return this.layers.map((l) => l.layer);
  }

  toSVG(): string {
    return generateSpiralSVG(this.layers, this.options);
  }

  clear(): void {
    this.layers = [];
  }
}

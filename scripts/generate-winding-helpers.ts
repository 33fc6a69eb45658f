/**
 * Argument parsing and output rendering for generate-winding.ts.
 * Kept free of process access so tests can drive it directly.
 */

import { WindingBuilder, WINDING_PRESETS, recipeToBuilder, validateWindingRecipe } from '../src/builder';
import type { WindingFixture, WindingPreset } from '../src/builder';
import { checkSpiral, formatSpiralCheckResult } from '../src/engine/validators/SpiralChecker';
import { SvgSink } from '../src/utils/svgExport';
import { KicadSink } from '../src/utils/kicadExport';
import { deserializeParams, getShareableUrl, serializeParams } from '../src/utils/urlState';
import { parseDebugTags } from '../src/utils/debug';
import type { DebugTag } from '../src/utils/debug';

export type OutputFormat = 'svg' | 'kicad' | 'share' | 'check';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['svg', 'kicad', 'share', 'check'];

export interface CliOptions {
  preset?: WindingPreset;
  json?: string;
  share?: string;
  format: OutputFormat;
  layer?: string;
  fill: boolean;
  debugTags: DebugTag[];
  shareBaseUrl?: string;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export const USAGE = [
  'Usage: tsx scripts/generate-winding.ts [preset] [options]',
  '',
  `Presets: ${WINDING_PRESETS.join(', ')}`,
  '',
  'Options:',
  '  --json <recipe>     JSON recipe instead of a preset',
  '  --share <code>      Share code instead of a preset',
  `  --format <format>   ${OUTPUT_FORMATS.join(' | ')} (default svg)`,
  '  --layer <name>      Copper layer, e.g. B.Cu',
  '  --fill              Filled copper in SVG output',
  '  --debug [tags]      Debug tags, comma separated, or "all"',
  '',
  'Environment: WINDING_DEBUG (debug tags), WINDING_SHARE_URL (base URL for share links)',
].join('\n');

const isPreset = (value: string): value is WindingPreset =>
  WINDING_PRESETS.some((preset) => preset === value);

const isFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

export function parseCliArgs(
  args: readonly string[],
  env: Record<string, string | undefined> = {}
): CliOptions {
  const options: CliOptions = {
    format: 'svg',
    fill: false,
    debugTags: parseDebugTags(env.WINDING_DEBUG ?? ''),
    shareBaseUrl: env.WINDING_SHARE_URL || undefined,
  };

  const valueAfter = (i: number, flag: string): string => {
    const value = args[i + 1];
    if (value === undefined) throw new CliError(`${flag} needs a value`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      options.json = valueAfter(i++, arg);
    } else if (arg === '--share') {
      options.share = valueAfter(i++, arg);
    } else if (arg === '--format') {
      const format = valueAfter(i++, arg);
      if (!isFormat(format)) {
        throw new CliError(`Unknown format: ${format}. Available: ${OUTPUT_FORMATS.join(', ')}`);
      }
      options.format = format;
    } else if (arg === '--layer') {
      options.layer = valueAfter(i++, arg);
    } else if (arg === '--fill') {
      options.fill = true;
    } else if (arg === '--debug') {
      const next = args[i + 1];
      const spec = next !== undefined && !next.startsWith('--') ? args[++i] : 'all';
      options.debugTags = parseDebugTags(spec);
    } else if (arg.startsWith('--')) {
      throw new CliError(`Unknown option: ${arg}`);
    } else if (!options.preset) {
      if (!isPreset(arg)) {
        throw new CliError(`Unknown preset: ${arg}. Available presets: ${WINDING_PRESETS.join(', ')}`);
      }
      options.preset = arg;
    } else {
      throw new CliError(`Unexpected argument: ${arg}`);
    }
  }

  const sources = [options.preset, options.json, options.share].filter((s) => s !== undefined);
  if (sources.length > 1) {
    throw new CliError('Give only one of a preset, --json or --share');
  }

  return options;
}

/**
 * Build the winding the options describe
 */
export function resolveFixture(options: CliOptions): WindingFixture {
  let builder: WindingBuilder;

  if (options.json !== undefined) {
    let raw: unknown;
    try {
      raw = JSON.parse(options.json);
    } catch (e) {
      throw new CliError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    builder = recipeToBuilder(validateWindingRecipe(raw));
  } else if (options.share !== undefined) {
    const loaded = deserializeParams(options.share);
    if (!loaded) throw new CliError('Share code could not be read');
    builder = WindingBuilder.from(loaded.params, loaded.layer);
  } else {
    builder = WindingBuilder.preset(options.preset ?? 'default');
  }

  if (options.layer !== undefined) builder.onLayer(options.layer);
  return builder.build();
}

export function renderFixture(fixture: WindingFixture, options: CliOptions): string {
  const { params, spiral, layer } = fixture;

  switch (options.format) {
    case 'svg': {
      const sink = new SvgSink({
        trackWidth: params.trackWidth,
        copperFill: options.fill,
        outline: { center: params.center, window: spiral.laps[0].window },
        terminals: { outer: spiral.outerTerminal, inner: spiral.innerTerminal },
        title: `${params.turns}-turn winding`,
      });
      sink.consume(spiral.segments, layer);
      return sink.toSVG();
    }
    case 'kicad': {
      const sink = new KicadSink({ trackWidth: params.trackWidth });
      sink.consume(spiral.segments, layer);
      return sink.toString();
    }
    case 'share':
      return options.shareBaseUrl
        ? getShareableUrl(params, layer, options.shareBaseUrl)
        : serializeParams(params, layer);
    case 'check':
      return formatSpiralCheckResult(
        checkSpiral(spiral, { turns: params.turns, trackWidth: params.trackWidth })
      );
  }
}

import type { LayerId, StartPosition, WindingParams } from '../types';
import { compressToEncodedURIComponent, decompressFromEncodedURIComponent } from 'lz-string';
import { DEFAULT_LAYER } from '../config/defaults';
import { debug } from './debug';

// Compact serialization format for share codes
interface SerializedParams {
  v: number;                        // Version for future compatibility
  c: [number, number];              // center [x, y]
  w: [number, number, number];      // window [width, height, cornerRadius]
  t: number;                        // trackWidth
  g: number;                        // guard
  ig: number;                       // innerGap
  n: number;                        // turns
  s: 't' | 'c' | 'b';               // startPosition
  d?: 'cw';                         // direction, omitted for ccw
  l?: string;                       // layer, omitted for the default
}

export interface ShareState {
  params: WindingParams;
  layer: LayerId;
}

const VERSION = 1;

const START_CODES: Record<StartPosition, SerializedParams['s']> = {
  'left-top': 't',
  'left-center': 'c',
  'left-bottom': 'b',
};

const START_FROM_CODE: Record<SerializedParams['s'], StartPosition> = {
  t: 'left-top',
  c: 'left-center',
  b: 'left-bottom',
};

// Round number to 4 decimal places (0.1 µm) to save space
const r = (n: number): number => Math.round(n * 10000) / 10000;

export const serializeParams = (params: WindingParams, layer: LayerId = DEFAULT_LAYER): string => {
  const serialized: SerializedParams = {
    v: VERSION,
    c: [r(params.center.x), r(params.center.y)],
    w: [r(params.window.width), r(params.window.height), r(params.window.cornerRadius)],
    t: r(params.trackWidth),
    g: r(params.guard),
    ig: r(params.innerGap),
    n: params.turns,
    s: START_CODES[params.startPosition],
  };
  if (params.direction === 'cw') serialized.d = 'cw';
  if (layer !== DEFAULT_LAYER) serialized.l = layer;

  // Convert to JSON and compress with lz-string
  const json = JSON.stringify(serialized);
  return compressToEncodedURIComponent(json);
};

// =============================================================================
// Parsing
// =============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const numberTuple = (value: unknown, length: number): number[] | null => {
  if (!Array.isArray(value) || value.length !== length) return null;
  const numbers = value.filter(isFiniteNumber);
  return numbers.length === length ? numbers : null;
};

const isStartCode = (value: unknown): value is SerializedParams['s'] =>
  value === 't' || value === 'c' || value === 'b';

const toShareState = (value: unknown): ShareState | null => {
  if (!isRecord(value)) return null;
  if (value.v !== VERSION) {
    debug('share', `unknown share code version ${String(value.v)}`);
    return null;
  }

  const center = numberTuple(value.c, 2);
  const window = numberTuple(value.w, 3);
  const { t, g, ig, n, s, d, l } = value;
  if (!center || !window) return null;
  if (!isFiniteNumber(t) || !isFiniteNumber(g) || !isFiniteNumber(ig) || !isFiniteNumber(n)) return null;
  if (!isStartCode(s)) return null;
  if (d !== undefined && d !== 'cw') return null;
  if (l !== undefined && typeof l !== 'string') return null;

  return {
    params: {
      center: { x: center[0], y: center[1] },
      window: { width: window[0], height: window[1], cornerRadius: window[2] },
      trackWidth: t,
      guard: g,
      innerGap: ig,
      turns: n,
      startPosition: START_FROM_CODE[s],
      direction: d === 'cw' ? 'cw' : 'ccw',
    },
    layer: l ?? DEFAULT_LAYER,
  };
};

/**
 * Decode a share code. Returns null for anything that is not a valid code;
 * the values themselves are not validated as geometry.
 */
export const deserializeParams = (encoded: string): ShareState | null => {
  const json = decompressFromEncodedURIComponent(encoded);
  if (!json) {
    debug('share', 'share code did not decompress');
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    debug('share', `share code is not JSON: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }

  const state = toShareState(parsed);
  if (!state) debug('share', 'share code has missing or malformed fields');
  return state;
};

// URL helpers - using query parameter for better sharing compatibility
const URL_PARAM = 'w';

export const getShareableUrl = (params: WindingParams, layer: LayerId, baseUrl: string): string => {
  const url = new URL(baseUrl);
  url.searchParams.set(URL_PARAM, serializeParams(params, layer));
  url.hash = '';
  return url.toString();
};

export const parseShareableUrl = (href: string): ShareState | null => {
  let url: URL;
  try {
    url = new URL(href);
  } catch (e) {
    debug('share', `not a URL: ${href} (${e instanceof Error ? e.message : String(e)})`);
    return null;
  }

  const encoded = url.searchParams.get(URL_PARAM);
  return encoded ? deserializeParams(encoded) : null;
};

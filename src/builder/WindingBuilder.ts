/**
 * WindingBuilder - Fluent builder for winding parameters.
 *
 * Factory methods create the initial state, configuration methods adjust it,
 * and build() validates and synthesizes the spiral.
 *
 * @example
 * ```typescript
 * const { spiral } = WindingBuilder.window(20, 15, 2)
 *   .track(0.2, 0.2)
 *   .innerGap(0.5)
 *   .turns(3)
 *   .startAt('left-top')
 *   .build();
 *
 * // Matrix of scenarios from one base
 * const base = WindingBuilder.preset('compact');
 * const variants = START_POSITIONS.map((start) => base.clone().startAt(start));
 * ```
 */

import type { LayerId, Point, StartPosition, WindingDirection, WindingParams, WindowSpec } from '../types';
import { DEFAULT_LAYER, DEFAULT_PARAMS } from '../config/defaults';
import { computeSpiral } from '../engine/computeSpiral';
import type { WindingFixture, WindingPreset } from './types';

type PresetValues = Pick<WindingParams, 'window' | 'trackWidth' | 'guard' | 'innerGap' | 'turns'>;

const PRESETS: Record<WindingPreset, PresetValues> = {
  default: DEFAULT_PARAMS,
  compact: { window: { width: 8, height: 8, cornerRadius: 1 }, trackWidth: 0.15, guard: 0.15, innerGap: 0.5, turns: 5 },
  power: { window: { width: 40, height: 30, cornerRadius: 4 }, trackWidth: 1.5, guard: 0.5, innerGap: 2, turns: 4 },
  fine: { window: { width: 12, height: 10, cornerRadius: 0.5 }, trackWidth: 0.1, guard: 0.1, innerGap: 0.2, turns: 12 },
};

export const WINDING_PRESETS: readonly WindingPreset[] = ['default', 'compact', 'power', 'fine'];

export class WindingBuilder {
  private _params: WindingParams;
  private _layer: LayerId;

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(params: WindingParams, layer: LayerId = DEFAULT_LAYER) {
    this._params = params;
    this._layer = layer;
  }

  // ===========================================================================
  // Factory Methods
  // ===========================================================================

  /**
   * Start from the default parameters (20 × 16 mm, six turns)
   */
  static defaults(): WindingBuilder {
    return new WindingBuilder(DEFAULT_PARAMS);
  }

  /**
   * Start from the defaults with a different window
   */
  static window(width: number, height: number, cornerRadius: number = 0): WindingBuilder {
    return new WindingBuilder({ ...DEFAULT_PARAMS, window: { width, height, cornerRadius } });
  }

  static preset(name: WindingPreset): WindingBuilder {
    return new WindingBuilder({ ...DEFAULT_PARAMS, ...PRESETS[name] });
  }

  static from(params: WindingParams, layer: LayerId = DEFAULT_LAYER): WindingBuilder {
    return new WindingBuilder(params, layer);
  }

  // ===========================================================================
  // Configuration Methods
  // ===========================================================================

  private update(changes: Partial<WindingParams>): this {
    this._params = { ...this._params, ...changes };
    return this;
  }

  at(x: number, y: number): this {
    return this.update({ center: { x, y } });
  }

  centeredOn(center: Point): this {
    return this.update({ center });
  }

  withWindow(window: WindowSpec): this {
    return this.update({ window });
  }

  cornerRadius(cornerRadius: number): this {
    return this.update({ window: { ...this._params.window, cornerRadius } });
  }

  /**
   * Track width and the guard spacing between adjacent turns
   */
  track(trackWidth: number, guard: number): this {
    return this.update({ trackWidth, guard });
  }

  innerGap(innerGap: number): this {
    return this.update({ innerGap });
  }

  turns(turns: number): this {
    return this.update({ turns });
  }

  startAt(startPosition: StartPosition): this {
    return this.update({ startPosition });
  }

  direction(direction: WindingDirection): this {
    return this.update({ direction });
  }

  onLayer(layer: LayerId): this {
    this._layer = layer;
    return this;
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  /**
   * Independent copy that can be modified without affecting this builder
   */
  clone(): WindingBuilder {
    return new WindingBuilder(this._params, this._layer);
  }

  toParams(): WindingParams {
    return this._params;
  }

  get layer(): LayerId {
    return this._layer;
  }

  /**
   * Validate and synthesize.
   *
   * @throws InvalidGeometry or GeometryExhausted when the parameters cannot be wound
   */
  build(): WindingFixture {
    return {
      params: this._params,
      spiral: computeSpiral(this._params),
      layer: this._layer,
    };
  }
}

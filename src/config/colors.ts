/**
 * Centralized color configuration for rendered previews.
 * All copper, outline and marker colors used by the SVG sink are defined here.
 */

export interface StateColors {
  base: string;
  highlight: string;
}

export interface ColorConfig {
  // ===== Copper =====
  copper: {
    track: StateColors;        // base for the first layer, highlight for the rest
  };

  // ===== Reference geometry =====
  outline: {
    window: string;            // Nominal window boundary (dashed)
  };

  // ===== Terminals =====
  terminal: {
    outer: string;
    inner: string;
  };

  // ===== Background =====
  background: string;

  // ===== Opacity Presets =====
  opacity: {
    copper: number;            // 0.9
    outline: number;           // 0.6
  };
}

// ===== Default Theme =====
export const defaultColors: ColorConfig = {
  copper: {
    track: { base: '#c87533', highlight: '#5a8fe3' },
  },

  outline: {
    window: '#6a6a8a',
  },

  terminal: {
    outer: '#e74c3c',
    inner: '#3498db',
  },

  background: '#1a1a2e',

  opacity: {
    copper: 0.9,
    outline: 0.6,
  },
};

/**
 * Get colors for the current theme.
 */
export function getColors(): ColorConfig {
  return defaultColors;
}

/**
 * Dial defaults, geometry ratios and demo configuration.
 *
 * Centralizes every tunable number used by the scale calculator,
 * scene composer, spring animation and sensor simulator.
 */

/** Default dial configuration (0–100, major every 20, 270° sweep). */
export const DIAL_DEFAULTS = {
  minValue: 0,
  maxValue: 100,
  majorStep: 20,
  subdivisions: 4,
  startAngle: -225,
  endAngle: 45,
} as const;

/** Default SVG viewBox edge and hand color. */
export const DIAL_RENDER_DEFAULTS = {
  size: 300,
  accentColor: "#ef4444",
} as const;

/** Tick mark proportions, relative to the dial diameter. */
export const TICK_GEOMETRY = {
  major: { length: 0.06, thickness: 0.012 },
  minor: { length: 0.04, thickness: 0.007 },
} as const;

/** Label placement, relative to the dial radius / diameter. */
export const LABEL_GEOMETRY = {
  radiusRatio: 0.75,
  fontSizeDivisor: 14,
} as const;

/** Hand proportions, relative to the dial diameter. */
export const HAND_GEOMETRY = {
  length: 0.45,
  thickness: 0.01,
  // Fraction of the hand's length that sits behind the pivot.
  pivotPosition: 0.1,
  knobRadius: 0.03,
} as const;

/** Colors per color scheme. */
export const THEME_COLORS = {
  light: {
    background: "#ffffff",
    border: "#000000",
    text: "#000000",
    tick: "#000000",
  },
  dark: {
    background: "#000000",
    border: "transparent",
    text: "#ffffff",
    tick: "#ffffff",
  },
} as const;

/** Spring used for the hand, expressed as response time and damping fraction. */
export const SPRING_CONFIG = {
  responseSeconds: 0.55,
  dampingFraction: 0.825,
  maxSubstepSeconds: 1 / 240,
  // A single frame gap larger than this is treated as a stall and truncated.
  maxDeltaSeconds: 0.25,
  angleTolerance: 0.01,
  velocityTolerance: 0.05,
} as const;

/** Parse a positive integer env value, falling back when absent or malformed. */
function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/** Simulated sensor configuration for the demo app. */
export const SIMULATION_CONFIG = {
  intervalMs: readPositiveInt(import.meta.env.VITE_SIMULATION_INTERVAL_MS, 200),
  minValue: 0,
  maxValue: 60,
  lowThreshold: 20,
  highThreshold: 40,
  lowRange: [-1, 3],
  midRange: [-2, 2],
  highRange: [-3, 1],
} as const;

/** Forced color scheme from the environment, if any. */
export const COLOR_SCHEME_OVERRIDE: string | undefined = import.meta.env.VITE_COLOR_SCHEME;

/** Viewport breakpoints for the demo's size classes, in CSS pixels. */
export const SIZE_CLASS_BREAKPOINTS = {
  width: 700,
  height: 500,
} as const;

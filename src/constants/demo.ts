/**
 * Dial presets shown by the demo application.
 */

import type { ColorScheme } from "../types/dial";
import type { DialOptions } from "../lib/dial-scale";

/** A dial preset with its look. */
export interface DemoDialPreset {
  readonly id: string;
  readonly options: DialOptions;
  readonly accentColor: string;
  /** Fixed scheme; omitted presets follow the environment */
  readonly colorScheme?: ColorScheme;
}

/** 0–60 in steps of 10, light face, red hand. */
export const SPEEDOMETER_LIGHT: DemoDialPreset = {
  id: "speed-60-light",
  options: { maxValue: 60, majorStep: 10 },
  accentColor: "#ef4444",
  colorScheme: "light",
};

/** 0–40 in steps of 5 with five subdivisions, dark face, orange hand. */
export const SPEEDOMETER_DARK: DemoDialPreset = {
  id: "speed-40-dark",
  options: { maxValue: 40, majorStep: 5, subdivisions: 5 },
  accentColor: "#f97316",
  colorScheme: "dark",
};

/** Narrow 90° sweep to the right, dark face, yellow hand. */
export const NARROW_SWEEP: DemoDialPreset = {
  id: "narrow-60-dark",
  options: { maxValue: 60, majorStep: 20, subdivisions: 10, startAngle: -45, endAngle: 45 },
  accentColor: "#eab308",
  colorScheme: "dark",
};

/** Upper half-circle 0–50, light face, blue hand. */
export const HALF_CIRCLE: DemoDialPreset = {
  id: "half-50-light",
  options: { maxValue: 50, majorStep: 10, subdivisions: 10, startAngle: -180, endAngle: 0 },
  accentColor: "#3b82f6",
  colorScheme: "light",
};

/** Single dial for the smallest layouts; follows the ambient scheme. */
export const SPEEDOMETER_AMBIENT: DemoDialPreset = {
  id: "speed-60-ambient",
  options: { maxValue: 60, majorStep: 10 },
  accentColor: "#ef4444",
};

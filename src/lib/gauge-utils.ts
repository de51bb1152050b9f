/**
 * Pure geometry helpers for dial rendering.
 *
 * Angles are in degrees with 0° pointing east and positive angles
 * turning clockwise, which is the natural orientation of SVG's
 * downward-growing y axis.
 */

import type { Degrees, Point, PolarPoint } from "../types/dial";
import { InvalidConfigurationError } from "./errors";

/** Convert degrees to radians. */
export function toRadians(angleDeg: Degrees): number {
  return (angleDeg * Math.PI) / 180;
}

/** Convert radians to degrees. */
export function toDegrees(angleRad: number): Degrees {
  return (angleRad * 180) / Math.PI;
}

/**
 * Wrap an angle into the half-open interval (-180°, 180°].
 */
export function normalizeDegrees(angleDeg: Degrees): Degrees {
  const wrapped = ((angleDeg % 360) + 360) % 360;
  return wrapped > 180 ? wrapped - 360 : wrapped;
}

/**
 * Convert polar coordinates to Cartesian (SVG) coordinates.
 *
 * @param cx - Center X coordinate
 * @param cy - Center Y coordinate
 * @param radius - Distance from center
 * @param angleDeg - Angle in degrees (0 = right, clockwise)
 * @returns Cartesian point
 */
export function polarToCartesian(
  cx: number,
  cy: number,
  radius: number,
  angleDeg: Degrees,
): Point {
  const angleRad = toRadians(angleDeg);
  return {
    x: cx + radius * Math.cos(angleRad),
    y: cy + radius * Math.sin(angleRad),
  };
}

/**
 * Inverse of {@link polarToCartesian}.
 *
 * @returns Radius and angle in (-180°, 180°] of `point` around (cx, cy)
 */
export function cartesianToPolar(cx: number, cy: number, point: Point): PolarPoint {
  const dx = point.x - cx;
  const dy = point.y - cy;
  return {
    radius: Math.hypot(dx, dy),
    angle: normalizeDegrees(toDegrees(Math.atan2(dy, dx))),
  };
}

/**
 * Fraction of the way `value` lies from `min` to `max`.
 *
 * Not clamped: values outside the range give fractions outside [0, 1].
 */
export function interpolate(value: number, min: number, max: number): number {
  if (min === max) {
    throw new InvalidConfigurationError(
      "maxValue",
      `Cannot interpolate over an empty range (min = max = ${min})`,
    );
  }
  return (value - min) / (max - min);
}

/**
 * Map a value to an angle within the dial's sweep.
 *
 * Values outside [min, max] extrapolate past the sweep so the hand
 * can overshoot the scale. `min` maps to exactly `startAngle` and
 * `max` to exactly `endAngle`.
 *
 * @param value - Current value
 * @param min - Minimum value
 * @param max - Maximum value
 * @param startAngle - Angle of `min` (degrees)
 * @param endAngle - Angle of `max` (degrees)
 * @returns Corresponding angle in degrees
 */
export function angleFor(
  value: number,
  min: number,
  max: number,
  startAngle: Degrees,
  endAngle: Degrees,
): Degrees {
  const t = interpolate(value, min, max);
  return startAngle * (1 - t) + endAngle * t;
}

/**
 * Format a tick value as an integer label.
 *
 * Halves round to the nearest even integer, so 2.5 reads "2" and
 * 3.5 reads "4".
 */
export function formatTickLabel(value: number): string {
  const isHalf = Math.abs(value % 1) === 0.5;
  const rounded = isHalf ? 2 * Math.round(value / 2) : Math.round(value);
  // String(-0) is "0", unlike (-0).toFixed(0)
  return String(rounded);
}

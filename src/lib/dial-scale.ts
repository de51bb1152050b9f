/**
 * Dial configuration validation and tick computation.
 *
 * A dial is built once from its configuration: the values are
 * checked, then the major and minor tick values are derived and
 * frozen alongside the configuration.
 */

import type { Dial, DialConfiguration, TickSet } from "../types/dial";
import { DIAL_DEFAULTS } from "../constants/dial";
import { InvalidConfigurationError } from "./errors";

/** Configuration input; omitted fields take {@link DIAL_DEFAULTS}. */
export type DialOptions = Partial<DialConfiguration>;

function assertRange(minValue: number, maxValue: number): void {
  if (!Number.isFinite(minValue)) {
    throw new InvalidConfigurationError("minValue", `minValue must be finite, got ${minValue}`);
  }
  if (!Number.isFinite(maxValue)) {
    throw new InvalidConfigurationError("maxValue", `maxValue must be finite, got ${maxValue}`);
  }
  if (minValue >= maxValue) {
    throw new InvalidConfigurationError(
      "maxValue",
      `minValue (${minValue}) must be less than maxValue (${maxValue})`,
    );
  }
}

function assertStep(majorStep: number): void {
  if (!Number.isFinite(majorStep) || majorStep <= 0) {
    throw new InvalidConfigurationError(
      "majorStep",
      `majorStep must be a positive number, got ${majorStep}`,
    );
  }
}

function assertSubdivisions(subdivisions: number): void {
  if (!Number.isInteger(subdivisions) || subdivisions < 0) {
    throw new InvalidConfigurationError(
      "subdivisions",
      `subdivisions must be a non-negative integer, got ${subdivisions}`,
    );
  }
}

/** Fraction of a step within which a tick counts as landing on maxValue. */
const END_TOLERANCE_RATIO = 1e-9;

/**
 * Compute the values where major and minor ticks are drawn.
 *
 * Major ticks run from `minValue` in steps of `majorStep` up to and
 * including the last step that does not pass `maxValue`; the last tick
 * is not moved onto `maxValue` when the range is not a multiple of the
 * step. Each major interval is divided into `subdivisions` parts and
 * the inner division points become minor ticks, so the next major tick
 * is never repeated as a minor one.
 *
 * @throws InvalidConfigurationError for an empty or inverted range,
 *   a non-positive step or a negative/fractional subdivision count
 */
export function computeTicks(
  minValue: number,
  maxValue: number,
  majorStep: number,
  subdivisions: number,
): TickSet {
  assertRange(minValue, maxValue);
  assertStep(majorStep);
  assertSubdivisions(subdivisions);

  // Index-based so rounding error does not accumulate across steps
  const tolerance = majorStep * END_TOLERANCE_RATIO;
  const majorTicks: number[] = [];
  for (let i = 0; ; i += 1) {
    const value = minValue + i * majorStep;
    if (value > maxValue + tolerance) break;
    // 3 * 0.1 lands just past 0.3; pin it to the end of the scale
    majorTicks.push(Math.abs(value - maxValue) <= tolerance ? maxValue : value);
  }

  const minorTicks: number[] = [];
  if (subdivisions > 0) {
    const stepPerSubdivision = majorStep / subdivisions;
    for (const major of majorTicks.slice(0, -1)) {
      for (let k = 1; k < subdivisions; k += 1) {
        minorTicks.push(major + k * stepPerSubdivision);
      }
    }
  }

  return { majorTicks, minorTicks };
}

/**
 * Fill in defaults and validate a dial configuration.
 *
 * @throws InvalidConfigurationError when any field is out of range
 */
export function createDialConfiguration(options: DialOptions = {}): DialConfiguration {
  const config: DialConfiguration = {
    minValue: options.minValue ?? DIAL_DEFAULTS.minValue,
    maxValue: options.maxValue ?? DIAL_DEFAULTS.maxValue,
    majorStep: options.majorStep ?? DIAL_DEFAULTS.majorStep,
    subdivisions: options.subdivisions ?? DIAL_DEFAULTS.subdivisions,
    startAngle: options.startAngle ?? DIAL_DEFAULTS.startAngle,
    endAngle: options.endAngle ?? DIAL_DEFAULTS.endAngle,
  };

  assertRange(config.minValue, config.maxValue);
  assertStep(config.majorStep);
  assertSubdivisions(config.subdivisions);
  if (!Number.isFinite(config.startAngle) || !Number.isFinite(config.endAngle)) {
    throw new InvalidConfigurationError("startAngle", "startAngle and endAngle must be finite");
  }
  if (config.startAngle >= config.endAngle) {
    throw new InvalidConfigurationError(
      "endAngle",
      `startAngle (${config.startAngle}) must be less than endAngle (${config.endAngle})`,
    );
  }

  return Object.freeze(config);
}

/**
 * Build a dial: validated configuration plus its tick set.
 *
 * @throws InvalidConfigurationError when the configuration is invalid
 */
export function createDial(options: DialOptions = {}): Dial {
  const config = createDialConfiguration(options);
  const { majorTicks, minorTicks } = computeTicks(
    config.minValue,
    config.maxValue,
    config.majorStep,
    config.subdivisions,
  );
  return {
    config,
    ticks: {
      majorTicks: Object.freeze(majorTicks),
      minorTicks: Object.freeze(minorTicks),
    },
  };
}

/**
 * Simulated sensor feeding the demo dials.
 *
 * On a fixed cadence, nudges a value by a bounded random delta that
 * leans upward when the value is low and downward when it is high,
 * keeping it inside the simulated range.
 */

import { SIMULATION_CONFIG } from "../constants/dial";
import type { ValueStore } from "./value-store";

/** Source of uniform random numbers in [0, 1). */
export type RandomSource = () => number;

/** Configuration for the sensor simulator. */
export interface SensorSimulatorConfig {
  /** Store the simulated value is written to */
  readonly store: ValueStore;
  /** Tick cadence in milliseconds (default: SIMULATION_CONFIG.intervalMs) */
  readonly intervalMs?: number;
  /** Random source (default: Math.random) */
  readonly random?: RandomSource;
  /** Called when a tick fails; the simulator stops afterwards */
  readonly onError?: (error: string) => void;
}

/** Map a uniform sample onto [low, high]. */
function sampleRange(random: RandomSource, [low, high]: readonly [number, number]): number {
  const sample = random();
  if (!Number.isFinite(sample)) {
    throw new Error(`Random source returned a non-finite sample: ${sample}`);
  }
  return low + sample * (high - low);
}

/**
 * Compute the next simulated value.
 *
 * @param current - Previous value
 * @param random - Uniform random source
 * @returns New value, clamped to the simulated range
 */
export function nextSimulatedValue(current: number, random: RandomSource = Math.random): number {
  const { lowThreshold, highThreshold, lowRange, midRange, highRange } = SIMULATION_CONFIG;

  let range: readonly [number, number] = midRange;
  if (current <= lowThreshold) range = lowRange;
  else if (current >= highThreshold) range = highRange;

  const next = current + sampleRange(random, range);
  return Math.max(SIMULATION_CONFIG.minValue, Math.min(SIMULATION_CONFIG.maxValue, next));
}

/**
 * Periodic timer that writes simulated readings into a {@link ValueStore}.
 */
export class SensorSimulator {
  private timer: ReturnType<typeof setInterval> | null = null;

  private readonly config: SensorSimulatorConfig;

  constructor(config: SensorSimulatorConfig) {
    this.config = config;
  }

  /** Whether the timer is active. */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Start ticking. Does nothing if already running. */
  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.tick(), this.config.intervalMs ?? SIMULATION_CONFIG.intervalMs);
  }

  /** Stop ticking. Does nothing if already stopped. */
  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Produce one reading immediately. */
  tick(): void {
    const { store, random, onError } = this.config;
    try {
      store.set(nextSimulatedValue(store.get(), random));
    } catch (err) {
      this.stop();
      if (!onError) throw err;
      onError(`Sensor simulation failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

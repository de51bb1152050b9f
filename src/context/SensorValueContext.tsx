/**
 * React context for sharing the simulated sensor value.
 *
 * Owns the ValueStore, runs the simulator against it through
 * useSensorSimulator, and exposes both to the component tree.
 */

import { createContext, useState, type ReactNode } from "react";
import { ValueStore } from "../lib/value-store";
import type { RandomSource } from "../lib/sensor-simulator";
import { useSensorSimulator, type UseSensorSimulatorResult } from "../hooks/useSensorSimulator";
import { SIMULATION_CONFIG } from "../constants/dial";

/** Shape of the sensor context value. */
export interface SensorValueContextValue extends UseSensorSimulatorResult {
  /** Store holding the latest reading */
  readonly store: ValueStore;
}

/** React context for the simulated sensor. */
export const SensorValueContext = createContext<SensorValueContextValue | null>(null);

/** Props for SensorValueProvider. */
interface SensorValueProviderProps {
  /** Child components to provide context to */
  readonly children: ReactNode;
  /** Starting value (default: 0) */
  readonly initialValue?: number;
  /** Tick cadence override */
  readonly intervalMs?: number;
  /** Random source override (for testing) */
  readonly random?: RandomSource;
}

/**
 * Provider component that owns the sensor value and its simulator.
 *
 * Children read the value with the useSensorValue hook.
 */
export function SensorValueProvider({
  children,
  initialValue = 0,
  intervalMs = SIMULATION_CONFIG.intervalMs,
  random,
}: SensorValueProviderProps): React.ReactElement {
  const [store] = useState(() => new ValueStore(initialValue));
  const simulation = useSensorSimulator(store, intervalMs, random);

  return (
    <SensorValueContext.Provider value={{ store, ...simulation }}>
      {children}
    </SensorValueContext.Provider>
  );
}

/**
 * React hook that runs the demo's simulated sensor.
 *
 * Creates a SensorSimulator bound to the given store, starts it on
 * mount and stops it on unmount.
 */

import { useCallback, useEffect, useRef, useState } from "react";
import { SensorSimulator, type RandomSource } from "../lib/sensor-simulator";
import type { ValueStore } from "../lib/value-store";
import { SIMULATION_CONFIG } from "../constants/dial";

/** Return type of the useSensorSimulator hook. */
export interface UseSensorSimulatorResult {
  /** Whether the simulator is currently ticking */
  readonly isRunning: boolean;
  /** Last simulation error, or null */
  readonly error: string | null;
  /** Stop producing readings */
  readonly pause: () => void;
  /** Resume producing readings */
  readonly resume: () => void;
}

/**
 * Hook that drives `store` from a simulated sensor.
 *
 * @param store - Store to write readings into
 * @param intervalMs - Tick cadence (defaults to env/config value)
 * @param random - Random source, injectable for tests
 * @returns Running state, last error, and pause/resume controls
 */
export function useSensorSimulator(
  store: ValueStore,
  intervalMs: number = SIMULATION_CONFIG.intervalMs,
  random?: RandomSource,
): UseSensorSimulatorResult {
  const [isRunning, setIsRunning] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const simulatorRef = useRef<SensorSimulator | null>(null);

  useEffect(() => {
    const simulator = new SensorSimulator({
      store,
      intervalMs,
      random,
      onError: (errMsg: string) => {
        setError(errMsg);
        setIsRunning(false);
      },
    });

    simulatorRef.current = simulator;
    simulator.start();
    setIsRunning(true);
    setError(null);

    return () => {
      simulator.stop();
      simulatorRef.current = null;
    };
  }, [store, intervalMs, random]);

  const pause = useCallback(() => {
    simulatorRef.current?.stop();
    setIsRunning(false);
  }, []);

  const resume = useCallback(() => {
    const simulator = simulatorRef.current;
    if (!simulator) return;
    simulator.start();
    setIsRunning(true);
    setError(null);
  }, []);

  return { isRunning, error, pause, resume };
}

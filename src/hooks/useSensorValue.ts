/**
 * Convenience hooks for reading the simulated sensor.
 */

import { useCallback, useContext, useSyncExternalStore } from "react";
import { SensorValueContext, type SensorValueContextValue } from "../context/SensorValueContext";

/**
 * Read the sensor context.
 *
 * @returns Store, running state and simulator controls
 */
export function useSensorContext(): SensorValueContextValue {
  const context = useContext(SensorValueContext);
  if (!context) {
    throw new Error("useSensorContext must be used within a SensorValueProvider");
  }
  return context;
}

/**
 * Subscribe to the latest sensor value; re-renders on every change.
 */
export function useSensorValue(): number {
  const { store } = useSensorContext();
  const subscribe = useCallback((onChange: () => void) => store.subscribe(onChange), [store]);
  const getSnapshot = useCallback(() => store.get(), [store]);
  return useSyncExternalStore(subscribe, getSnapshot);
}

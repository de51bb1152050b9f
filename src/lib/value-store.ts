/**
 * Observable numeric value shared between a producer and the dials.
 *
 * Framework-agnostic; React components read it through
 * useSyncExternalStore in SensorValueContext.
 */

/** Callback invoked with the new value after every change. */
export type ValueListener = (value: number) => void;

export class ValueStore {
  private value: number;
  private readonly listeners = new Set<ValueListener>();

  constructor(initialValue: number = 0) {
    this.value = initialValue;
  }

  /** Current value. */
  get(): number {
    return this.value;
  }

  /**
   * Replace the value. Listeners are only notified when it changes.
   */
  set(value: number): void {
    if (Object.is(value, this.value)) return;
    this.value = value;
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }

  /**
   * Register a listener.
   *
   * @returns Function that removes the listener again
   */
  subscribe(listener: ValueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Number of registered listeners. */
  get listenerCount(): number {
    return this.listeners.size;
  }
}

/**
 * Root application component for the dial demo.
 *
 * Wraps the page in the SensorValueProvider and binds every dial
 * to the simulated reading.
 */

import { SensorValueProvider } from "./context/SensorValueContext";
import { useSensorContext, useSensorValue } from "./hooks/useSensorValue";
import { useSizeClasses } from "./hooks/useSizeClasses";
import { DemoLayout, DialGrid, StatusBar } from "./components/layout/DemoLayout";

/**
 * Demo content with the live reading.
 */
function DemoContent(): React.ReactElement {
  const { isRunning, error, pause, resume } = useSensorContext();
  const value = useSensorValue();
  const sizeClasses = useSizeClasses();

  return (
    <DemoLayout
      statusBar={
        <StatusBar
          value={value}
          isRunning={isRunning}
          error={error}
          onToggle={isRunning ? pause : resume}
        />
      }
    >
      <DialGrid sizeClasses={sizeClasses} value={value} />
    </DemoLayout>
  );
}

/**
 * Root App component.
 */
export function App(): React.ReactElement {
  return (
    <SensorValueProvider>
      <DemoContent />
    </SensorValueProvider>
  );
}

/**
 * Demo layout: status bar plus a grid of dials that adapts to the
 * viewport's size classes.
 */

import type { ReactNode } from "react";
import type { SizeClasses } from "../../hooks/useSizeClasses";
import type { DemoDialPreset } from "../../constants/demo";
import {
  HALF_CIRCLE,
  NARROW_SWEEP,
  SPEEDOMETER_AMBIENT,
  SPEEDOMETER_DARK,
  SPEEDOMETER_LIGHT,
} from "../../constants/demo";
import { Dial } from "../gauges/Dial";
import { DialErrorBoundary } from "../common/DialErrorBoundary";

// ─── StatusBar ────────────────────────────────────────────────────────────────

/** Props for the StatusBar component. */
interface StatusBarProps {
  /** Latest simulated reading */
  readonly value: number;
  /** Whether the simulator is ticking */
  readonly isRunning: boolean;
  /** Last simulator error, if any */
  readonly error?: string | null;
  /** Pause or resume the simulator */
  readonly onToggle: () => void;
}

/**
 * Top bar with the live reading, simulator state and a pause/resume button.
 */
export function StatusBar({ value, isRunning, error, onToggle }: StatusBarProps): React.ReactElement {
  return (
    <header className="px-5 py-2 flex items-center justify-between border-b border-black/10 dark:border-white/10">
      <span className="text-sm font-semibold tracking-widest">ANALOG DIAL</span>

      <div className="flex items-center gap-1.5 px-3 py-1 rounded-full border border-black/10 dark:border-white/10">
        <span
          className={`w-2 h-2 rounded-full ${isRunning ? "bg-gauge-green animate-pulse-slow" : "bg-gauge-amber"}`}
        />
        <span className="text-[11px] font-medium tracking-wide">
          {isRunning ? "Live" : "Paused"}
        </span>
        {error && (
          <span role="status" className="text-[10px] text-gauge-red ml-1 max-w-[220px] truncate">
            — {error}
          </span>
        )}
      </div>

      <div className="flex items-center gap-3">
        <span className="text-base font-semibold tabular-nums" data-testid="reading">
          {value.toFixed(1)}
        </span>
        <button
          type="button"
          onClick={onToggle}
          aria-label={isRunning ? "Pause simulation" : "Resume simulation"}
          className="px-3 py-1 rounded-md border border-black/20 dark:border-white/20 text-xs font-medium"
        >
          {isRunning ? "Pause" : "Resume"}
        </button>
      </div>
    </header>
  );
}

// ─── DialGrid ─────────────────────────────────────────────────────────────────

/**
 * Pick the rows of dials to show for a pair of size classes.
 *
 * - compact width, regular height: two dials stacked
 * - regular width, compact height: two dials side by side
 * - regular both ways: a 2×2 grid
 * - compact both ways: a single dial following the ambient scheme
 */
export function selectDialRows(classes: SizeClasses): DemoDialPreset[][] {
  const { horizontal, vertical } = classes;
  if (horizontal === "compact" && vertical === "regular") {
    return [[SPEEDOMETER_LIGHT], [SPEEDOMETER_DARK]];
  }
  if (horizontal === "regular" && vertical === "compact") {
    return [[SPEEDOMETER_LIGHT, SPEEDOMETER_DARK]];
  }
  if (horizontal === "regular" && vertical === "regular") {
    return [
      [SPEEDOMETER_LIGHT, SPEEDOMETER_DARK],
      [NARROW_SWEEP, HALF_CIRCLE],
    ];
  }
  return [[SPEEDOMETER_AMBIENT]];
}

/** Props for the DialGrid component. */
interface DialGridProps {
  readonly sizeClasses: SizeClasses;
  /** Value every dial displays */
  readonly value: number;
}

/**
 * Grid of demo dials, all bound to the same value.
 */
export function DialGrid({ sizeClasses, value }: DialGridProps): React.ReactElement {
  const rows = selectDialRows(sizeClasses);

  return (
    <div className="flex flex-col gap-10 flex-1 min-h-0 items-center justify-center">
      {rows.map((row) => (
        <div key={row.map((preset) => preset.id).join("+")} className="flex gap-10 min-h-0 w-full max-w-4xl justify-center">
          {row.map((preset) => (
            <div key={preset.id} className="flex-1 min-w-0 max-w-md" data-testid={preset.id}>
              <DialErrorBoundary>
                <Dial
                  currentValue={value}
                  {...preset.options}
                  accentColor={preset.accentColor}
                  colorScheme={preset.colorScheme}
                />
              </DialErrorBoundary>
            </div>
          ))}
        </div>
      ))}
    </div>
  );
}

// ─── DemoLayout ───────────────────────────────────────────────────────────────

/** Props for the DemoLayout component. */
interface DemoLayoutProps {
  /** Main content (the dial grid) */
  readonly children: ReactNode;
  /** Bar rendered above the content */
  readonly statusBar?: ReactNode;
}

/**
 * Full-screen column: status bar on top, padded content below.
 */
export function DemoLayout({ children, statusBar }: DemoLayoutProps): React.ReactElement {
  return (
    <div className="flex flex-col h-screen overflow-hidden">
      {statusBar}
      <main className="flex-1 min-h-0 overflow-hidden p-4 flex flex-col">{children}</main>
    </div>
  );
}

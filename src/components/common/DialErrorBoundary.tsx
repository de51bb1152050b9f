/**
 * Error boundary that replaces a failed dial with its error message.
 */

import { Component, type ErrorInfo, type ReactNode } from "react";

/** Props for the DialErrorBoundary component. */
interface DialErrorBoundaryProps {
  readonly children: ReactNode;
}

interface DialErrorBoundaryState {
  readonly message: string | null;
}

/**
 * Catches render errors (typically InvalidConfigurationError) from a
 * dial subtree so one misconfigured dial does not take down the page.
 */
export class DialErrorBoundary extends Component<DialErrorBoundaryProps, DialErrorBoundaryState> {
  state: DialErrorBoundaryState = { message: null };

  static getDerivedStateFromError(error: unknown): DialErrorBoundaryState {
    return { message: error instanceof Error ? error.message : String(error) };
  }

  componentDidCatch(error: unknown, info: ErrorInfo): void {
    // Keep a trace for browser devtools
    // eslint-disable-next-line no-console
    console.error("Dial failed to render:", error, info.componentStack);
  }

  render(): ReactNode {
    if (this.state.message !== null) {
      return (
        <div
          role="alert"
          className="aspect-square w-full flex flex-col items-center justify-center rounded-full border border-gauge-red p-6 text-center text-sm text-gauge-red"
        >
          <span className="font-semibold">Dial unavailable</span>
          <span className="mt-2 break-words">{this.state.message}</span>
        </div>
      );
    }
    return this.props.children;
  }
}

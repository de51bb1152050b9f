/**
 * Tests for the Dial component.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { render, screen } from "@testing-library/react";
import { Dial } from "../../src/components/gauges/Dial";
import { DialErrorBoundary } from "../../src/components/common/DialErrorBoundary";
import { InvalidConfigurationError } from "../../src/lib/errors";

beforeEach(() => {
  // Frames never run here, so the hand only moves when a test says so
  vi.stubGlobal("requestAnimationFrame", () => 1);
  vi.stubGlobal("cancelAnimationFrame", () => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("Dial", () => {
  it("exposes a single meter labelled Dial with the current value", () => {
    render(<Dial currentValue={42} />);
    const meter = screen.getByRole("meter", { name: "Dial" });
    expect(meter).toHaveAttribute("aria-valuetext", "42");
    expect(meter).toHaveAttribute("aria-valuenow", "42");
    expect(meter).toHaveAttribute("aria-valuemin", "0");
    expect(meter).toHaveAttribute("aria-valuemax", "100");
    expect(meter).toHaveAttribute("aria-live", "off");
  });

  it("labels every major tick of the default scale", () => {
    render(<Dial currentValue={0} />);
    for (const label of ["0", "20", "40", "60", "80", "100"]) {
      expect(screen.getByText(label)).toBeInTheDocument();
    }
  });

  it("draws major and minor tick marks", () => {
    const { container } = render(
      <Dial currentValue={0} maxValue={40} majorStep={5} subdivisions={5} />,
    );
    expect(container.querySelectorAll('[data-kind="majorTick"]')).toHaveLength(9);
    expect(container.querySelectorAll('[data-kind="minorTick"]')).toHaveLength(32);
    expect(container.querySelectorAll('[data-kind="label"]')).toHaveLength(9);
  });

  it("points the hand at the current value on first render", () => {
    const { container } = render(<Dial currentValue={30} maxValue={60} majorStep={10} />);
    const hand = container.querySelector('[data-kind="hand"]');
    expect(hand).toHaveAttribute("data-angle", "-90");
    expect(hand?.querySelector("rect")).toHaveAttribute("transform", "rotate(-90 150 150)");
  });

  it("does not jump straight to a new value", () => {
    const { container, rerender } = render(<Dial currentValue={30} maxValue={60} majorStep={10} />);
    rerender(<Dial currentValue={60} maxValue={60} majorStep={10} />);

    expect(container.querySelector('[data-kind="hand"]')).toHaveAttribute("data-angle", "-90");
    expect(screen.getByRole("meter", { name: "Dial" })).toHaveAttribute("aria-valuetext", "60");
  });

  it("points past the scale for values outside the range", () => {
    const { container } = render(<Dial currentValue={90} maxValue={60} majorStep={10} />);
    expect(container.querySelector('[data-kind="hand"]')).toHaveAttribute("data-angle", "180");
  });

  it("paints the hand in the accent color", () => {
    const { container } = render(<Dial currentValue={10} accentColor="#f97316" />);
    const hand = container.querySelector('[data-kind="hand"]');
    expect(hand?.querySelector("rect")).toHaveAttribute("fill", "#f97316");
    expect(hand?.querySelector("circle")).toHaveAttribute("fill", "#f97316");
  });

  it("follows a forced dark scheme", () => {
    const { container } = render(<Dial currentValue={10} colorScheme="dark" />);
    expect(container.querySelector('[data-kind="background"]')).toHaveAttribute("fill", "#000000");
    expect(container.querySelector('[data-kind="border"]')).toHaveAttribute("stroke", "transparent");
    expect(screen.getByText("40")).toHaveAttribute("fill", "#ffffff");
  });

  it("defaults to the light scheme", () => {
    const { container } = render(<Dial currentValue={10} />);
    expect(container.querySelector('[data-kind="background"]')).toHaveAttribute("fill", "#ffffff");
    expect(container.querySelector('[data-kind="border"]')).toHaveAttribute("stroke", "#000000");
  });

  it("refuses to render an invalid configuration", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => render(<Dial currentValue={0} minValue={10} maxValue={5} />)).toThrow(
      InvalidConfigurationError,
    );
  });

  it("shows the configuration error inside an error boundary", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    render(
      <DialErrorBoundary>
        <Dial currentValue={0} majorStep={0} />
      </DialErrorBoundary>,
    );
    expect(screen.getByRole("alert")).toHaveTextContent("majorStep must be a positive number, got 0");
    expect(screen.queryByRole("meter")).not.toBeInTheDocument();
  });
});

/**
 * Tests for the useSpringAngle hook.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { act, renderHook } from "@testing-library/react";
import { useSpringAngle } from "../../src/hooks/useSpringAngle";

/** Frame callbacks captured from requestAnimationFrame. */
let frames: FrameRequestCallback[];
const cancelled: number[] = [];

beforeEach(() => {
  frames = [];
  cancelled.length = 0;
  vi.stubGlobal("requestAnimationFrame", (callback: FrameRequestCallback): number => {
    frames.push(callback);
    return frames.length;
  });
  vi.stubGlobal("cancelAnimationFrame", (handle: number): void => {
    cancelled.push(handle);
  });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

/** Run the next pending frame at `time` milliseconds. */
function runNextFrame(time: number): boolean {
  const callback = frames.shift();
  if (!callback) return false;
  act(() => callback(time));
  return true;
}

describe("useSpringAngle", () => {
  it("starts at the target without animating", () => {
    const { result } = renderHook(() => useSpringAngle(-90));
    expect(result.current).toBe(-90);
    expect(frames).toHaveLength(0);
  });

  it("animates toward a new target over several frames", () => {
    const { result, rerender } = renderHook(({ target }) => useSpringAngle(target), {
      initialProps: { target: -225 },
    });

    rerender({ target: 45 });
    expect(result.current).toBe(-225);
    expect(frames).toHaveLength(1);

    runNextFrame(1000);
    expect(result.current).toBe(-225);

    runNextFrame(1016);
    expect(result.current).toBeGreaterThan(-225);
    expect(result.current).toBeLessThan(45);

    let time = 1016;
    while (runNextFrame((time += 16))) {
      if (time > 20_000) throw new Error("hand never settled");
    }
    expect(result.current).toBe(45);
  });

  it("keeps a single frame loop when retargeted mid-flight", () => {
    const { result, rerender } = renderHook(({ target }) => useSpringAngle(target), {
      initialProps: { target: 0 },
    });

    rerender({ target: 100 });
    runNextFrame(0);
    runNextFrame(16);
    rerender({ target: -40 });
    expect(frames).toHaveLength(1);

    let time = 16;
    while (runNextFrame((time += 16))) {
      if (time > 20_000) throw new Error("hand never settled");
    }
    expect(result.current).toBe(-40);
  });

  it("cancels a pending frame on unmount", () => {
    const { rerender, unmount } = renderHook(({ target }) => useSpringAngle(target), {
      initialProps: { target: 0 },
    });

    rerender({ target: 100 });
    unmount();

    expect(cancelled).toEqual([1]);
  });
});

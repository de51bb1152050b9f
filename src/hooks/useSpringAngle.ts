/**
 * React hook animating the dial hand toward its target angle.
 *
 * Steps the spring once per animation frame via requestAnimationFrame
 * and stops scheduling frames once the hand has settled.
 */

import { useCallback, useEffect, useRef, useState } from "react";
import type { Degrees, SpringState } from "../types/dial";
import { createSpringState, isSpringAtRest, stepSpring } from "../lib/spring";

/**
 * Hook returning the hand's animated angle.
 *
 * The first render shows `targetAngle` directly. Later target changes
 * animate from wherever the hand currently is, keeping its velocity.
 *
 * @param targetAngle - Angle the hand should come to rest at
 * @returns Angle to draw this frame
 */
export function useSpringAngle(targetAngle: Degrees): Degrees {
  const [angle, setAngle] = useState<Degrees>(targetAngle);

  const stateRef = useRef<SpringState>(createSpringState(targetAngle));
  const targetRef = useRef<Degrees>(targetAngle);
  const rafRef = useRef<number | null>(null);
  const lastFrameRef = useRef<number | null>(null);

  const runFrame: FrameRequestCallback = useCallback((time: number): void => {
    const last = lastFrameRef.current ?? time;
    lastFrameRef.current = time;

    const step = stepSpring(stateRef.current, targetRef.current, (time - last) / 1000);
    stateRef.current = step.state;
    setAngle(step.angle);

    if (step.isSettled) {
      rafRef.current = null;
      lastFrameRef.current = null;
      return;
    }
    rafRef.current = requestAnimationFrame(runFrame);
  }, []);

  useEffect(() => {
    targetRef.current = targetAngle;
    if (rafRef.current === null && !isSpringAtRest(stateRef.current, targetAngle)) {
      rafRef.current = requestAnimationFrame(runFrame);
    }
  }, [targetAngle, runFrame]);

  useEffect(() => {
    return () => {
      if (rafRef.current !== null) {
        cancelAnimationFrame(rafRef.current);
        rafRef.current = null;
      }
    };
  }, []);

  return angle;
}

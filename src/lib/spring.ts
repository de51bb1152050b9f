/**
 * Damped spring stepper for the dial hand.
 *
 * The host's animation clock calls {@link stepSpring} once per frame
 * and keeps the returned state for the next call. Changing the target
 * mid-flight keeps the hand's current angle and velocity.
 */

import type { Degrees, SpringState, SpringStep } from "../types/dial";
import { SPRING_CONFIG } from "../constants/dial";

/** Spring tuning, with the same shape as {@link SPRING_CONFIG}. */
export interface SpringConfig {
  /** Approximate time for one oscillation of the undamped spring */
  readonly responseSeconds: number;
  /** 1 is critically damped, below 1 overshoots */
  readonly dampingFraction: number;
  readonly maxSubstepSeconds: number;
  readonly maxDeltaSeconds: number;
  readonly angleTolerance: number;
  readonly velocityTolerance: number;
}

/** A hand at rest at `angle`. */
export function createSpringState(angle: Degrees): SpringState {
  return { angle, velocity: 0 };
}

/** Whether `state` is within tolerance of resting on `target`. */
export function isSpringAtRest(
  state: SpringState,
  target: Degrees,
  config: SpringConfig = SPRING_CONFIG,
): boolean {
  return (
    Math.abs(state.angle - target) <= config.angleTolerance &&
    Math.abs(state.velocity) <= config.velocityTolerance
  );
}

/**
 * Advance the spring by `deltaSeconds` toward `targetAngle`.
 *
 * Integrates with semi-implicit Euler in sub-steps no longer than
 * `maxSubstepSeconds`. Once within tolerance the hand snaps onto the
 * target with zero velocity and `isSettled` is true. A non-positive or
 * non-finite delta leaves the state untouched.
 */
export function stepSpring(
  state: SpringState,
  targetAngle: Degrees,
  deltaSeconds: number,
  config: SpringConfig = SPRING_CONFIG,
): SpringStep {
  if (!Number.isFinite(targetAngle)) {
    // Nothing sensible to move toward; hold position
    return { angle: state.angle, state, isSettled: true };
  }
  if (!Number.isFinite(deltaSeconds) || deltaSeconds <= 0) {
    return { angle: state.angle, state, isSettled: isSpringAtRest(state, targetAngle, config) };
  }

  const omega = (2 * Math.PI) / config.responseSeconds;
  const stiffness = omega * omega;
  const damping = 2 * config.dampingFraction * omega;

  const elapsed = Math.min(deltaSeconds, config.maxDeltaSeconds);
  const substeps = Math.ceil(elapsed / config.maxSubstepSeconds);
  const h = elapsed / substeps;

  let angle = state.angle;
  let velocity = state.velocity;
  for (let i = 0; i < substeps; i += 1) {
    const acceleration = -stiffness * (angle - targetAngle) - damping * velocity;
    velocity += acceleration * h;
    angle += velocity * h;
  }

  const next: SpringState = { angle, velocity };
  if (isSpringAtRest(next, targetAngle, config)) {
    const settled = createSpringState(targetAngle);
    return { angle: targetAngle, state: settled, isSettled: true };
  }
  return { angle, state: next, isSettled: false };
}

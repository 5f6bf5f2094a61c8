import type { Complex } from './complex.js';

/**
 * Drifting parameter state, threaded through `advance` once per frame
 */
export interface AnimationState {
  /** Deviation of the Julia parameter from its base value */
  offset: Complex;
  velocity: Complex;
  /** Internal state of the xorshift64* generator (64-bit) */
  rngState: bigint;
}

/**
 * Fixed configuration of the damped random walk
 */
export interface AnimatorConfig {
  base: Complex;
  /** Soft bound for |offset| */
  radius: number;
  /** Random acceleration magnitude */
  accelStrength: number;
  /** Velocity damping per time-unit; higher means more damping */
  damping: number;
}

/**
 * Result of one animator step
 */
export interface AdvanceResult {
  state: AnimationState;
  parameter: Complex;
}

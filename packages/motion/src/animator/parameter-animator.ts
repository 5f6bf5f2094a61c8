import {
  DEFAULT_ANIMATOR_CONFIG,
  DEFAULT_SEED,
  MAX_DT,
  ZERO,
  add,
  abs,
  complex,
  dot,
  normSqr,
  scale,
  sub,
  type AdvanceResult,
  type AnimationState,
  type AnimatorConfig,
} from '@julia-drift/protocol';
import { Xorshift64Star, normalizeSeed } from '../random/xorshift.js';

/** Fraction of the overshoot removed per step once |offset| exceeds the radius */
const PULL_BACK = 0.6;
/** Fraction of the radial velocity component removed on overshoot */
const RADIAL_DAMPING = 0.5;
const EPSILON = 1e-12;

/**
 * Create the initial animation state for a seed
 */
export function initialize(seed: bigint = DEFAULT_SEED): AnimationState {
  return {
    offset: ZERO,
    velocity: ZERO,
    rngState: normalizeSeed(seed, DEFAULT_SEED),
  };
}

/**
 * Advance the damped random walk by `dt` time-units.
 *
 * Velocity decays by `damping * dt` and receives a random push; once the
 * offset leaves `radius` it is pulled back and its outward velocity damped.
 * Pure: the input state is never mutated.
 */
export function advance(
  state: AnimationState,
  dt: number,
  config: AnimatorConfig = DEFAULT_ANIMATOR_CONFIG
): AdvanceResult {
  // Clamp large pauses (suspend/resume) so they cannot fling the velocity
  const step = Math.min(Math.max(dt, 0), MAX_DT);

  const rng = new Xorshift64Star(state.rngState);
  const ax = rng.nextSigned() * config.accelStrength;
  const ay = rng.nextSigned() * config.accelStrength;
  const acceleration = complex(ax, ay);

  let velocity = add(scale(state.velocity, 1 - config.damping * step), scale(acceleration, step));
  let offset = add(state.offset, scale(velocity, step));

  const length = abs(offset);
  if (length > config.radius) {
    const pull = (length - config.radius) / length;
    offset = sub(offset, scale(offset, pull * PULL_BACK));

    const projection = dot(velocity, offset) / (normSqr(offset) + EPSILON);
    velocity = sub(velocity, scale(offset, projection * RADIAL_DAMPING));
  }

  if (abs(velocity) > config.radius * 2) {
    velocity = scale(velocity, 0.5);
  }

  return {
    state: { offset, velocity, rngState: rng.getState() },
    parameter: add(config.base, offset),
  };
}

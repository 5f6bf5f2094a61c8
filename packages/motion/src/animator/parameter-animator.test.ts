import { describe, expect, it } from 'vitest';
import { DEFAULT_ANIMATOR_CONFIG, abs, type AnimationState } from '@julia-drift/protocol';
import { advance, initialize } from './parameter-animator.js';

function run(dts: number[]): { states: AnimationState[]; parameters: { re: number; im: number }[] } {
  let state = initialize(0x9e3779b97f4a7c15n);
  const states: AnimationState[] = [];
  const parameters: { re: number; im: number }[] = [];
  for (const dt of dts) {
    const result = advance(state, dt);
    state = result.state;
    states.push(state);
    parameters.push(result.parameter);
  }
  return { states, parameters };
}

describe('ParameterAnimator', () => {
  it('should start at rest on the given seed', () => {
    const state = initialize(42n);
    expect(state.offset).toEqual({ re: 0, im: 0 });
    expect(state.velocity).toEqual({ re: 0, im: 0 });
    expect(state.rngState).toBe(42n);
  });

  it('should use the default seed for zero', () => {
    expect(initialize(0n).rngState).toBe(0x9e3779b97f4a7c15n);
  });

  it('should take the first step from two generator samples', () => {
    const { state, parameter } = advance(initialize(), 0.016);

    expect(state.velocity.re).toBeCloseTo(-0.017172830463033285, 14);
    expect(state.velocity.im).toBeCloseTo(-0.006484981209528824, 14);
    expect(state.offset.re).toBeCloseTo(-0.0002747652874085326, 14);
    expect(state.offset.im).toBeCloseTo(-0.00010375969935246119, 14);
    expect(parameter.re).toBeCloseTo(-0.8002747652874086, 14);
    expect(parameter.im).toBeCloseTo(0.15589624030064753, 14);
    expect(state.rngState).toBe(0x5830920757d41153n);
  });

  it('should be bit-reproducible for the same seed and dt sequence', () => {
    const a = run([0.016, 0.016, 0.016]);
    const b = run([0.016, 0.016, 0.016]);
    expect(a.states).toEqual(b.states);
    expect(a.parameters).toEqual(b.parameters);
    expect(new Set(a.parameters.map((p) => `${p.re},${p.im}`)).size).toBe(3);
  });

  it('should not mutate the input state', () => {
    const state = initialize();
    const snapshot = structuredClone(state);
    advance(state, 0.016);
    expect(state).toEqual(snapshot);
  });

  it('should clamp long pauses to 0.1', () => {
    const state = initialize();
    expect(advance(state, 5)).toEqual(advance(state, 0.1));
  });

  it('should leave offset and velocity unchanged for dt = 0 apart from the generator', () => {
    const start: AnimationState = {
      offset: { re: 0.1, im: -0.05 },
      velocity: { re: 0.2, im: 0.1 },
      rngState: 99n,
    };
    const { state } = advance(start, 0);
    expect(state.offset).toEqual(start.offset);
    expect(state.velocity).toEqual(start.velocity);
    expect(state.rngState).not.toBe(99n);
  });

  it('should pull an overshooting offset back toward the radius', () => {
    const start: AnimationState = {
      offset: { re: 0.3, im: 0.4 },
      velocity: { re: 0, im: 0 },
      rngState: 0x9e3779b97f4a7c15n,
    };
    expect(abs(start.offset)).toBeCloseTo(0.5, 12);

    const { state } = advance(start, 0.016, { ...DEFAULT_ANIMATOR_CONFIG, radius: 0.4 });
    const after = abs(state.offset);
    expect(after).toBeLessThan(0.5);
    expect(after).toBeGreaterThan(0.4);
  });

  it('should halve excessive velocity', () => {
    const start: AnimationState = {
      offset: { re: 0, im: 0 },
      velocity: { re: 2, im: 0 },
      rngState: 0x9e3779b97f4a7c15n,
    };
    const { state } = advance(start, 0);
    expect(state.velocity).toEqual({ re: 1, im: 0 });
  });

  it('should stay finite and loosely bounded over a long run', () => {
    let state = initialize(7n);
    for (let i = 0; i < 20000; i++) {
      const result = advance(state, i % 50 === 0 ? 1 : 0.016);
      state = result.state;
      expect(Number.isFinite(result.parameter.re)).toBe(true);
      expect(Number.isFinite(result.parameter.im)).toBe(true);
    }
    expect(abs(state.offset)).toBeLessThan(DEFAULT_ANIMATOR_CONFIG.radius * 2);
    expect(abs(state.velocity)).toBeLessThanOrEqual(DEFAULT_ANIMATOR_CONFIG.radius * 2);
  });
});

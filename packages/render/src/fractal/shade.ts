import { hsvTo256 } from '../ansi/colors.js';

/**
 * Density ramp, from blank to solid block
 */
export const SHADES: readonly string[] = [' ', '.', ':', '-', '=', '+', '*', 'o', 'O', '#', '█'];

/** Biases toward the sparse end of the ramp for longer */
export const SHADE_GAMMA = 0.85;

export const PALETTE_SATURATION = 0.9;
export const PALETTE_VALUE = 1.0;

/**
 * Ramp position for a normalized escape value in [0, 1).
 * Monotonic non-decreasing in `norm`.
 */
export function shadeIndex(norm: number): number {
  const last = SHADES.length - 1;
  const idx = Math.round(Math.pow(Math.max(norm, 0), SHADE_GAMMA) * last);
  return Math.min(Math.max(idx, 0), last);
}

export function shadeChar(norm: number): string {
  return SHADES[shadeIndex(norm)] ?? ' ';
}

/**
 * Palette index for a normalized escape value: hue sweeps the full circle
 */
export function colorIndex(norm: number): number {
  return hsvTo256(norm * 360, PALETTE_SATURATION, PALETTE_VALUE);
}

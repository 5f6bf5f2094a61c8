import { CSI } from './codes.js';

/** Below this saturation the color cube is bypassed for the grayscale ramp */
export const GRAYSCALE_SATURATION = 0.08;

export const CUBE_BASE = 16;
export const GRAY_BASE = 232;
export const GRAY_STEPS = 24;

/**
 * 256-color foreground code
 */
export function fg256(index: number): string {
  return `${CSI}38;5;${index}m`;
}

/**
 * Quantize an HSV color to the xterm 256-color palette.
 *
 * Hue is in degrees (any value, wrapped into [0, 360)); saturation and value in [0, 1].
 * Saturated colors land in the 6x6x6 cube [16, 231], near-gray ones on the
 * 24-step ramp [232, 255].
 */
export function hsvTo256(hueDeg: number, saturation: number, value: number): number {
  if (saturation < GRAYSCALE_SATURATION) {
    const gray = Math.min(Math.max(Math.round(value * (GRAY_STEPS - 1)), 0), GRAY_STEPS - 1);
    return GRAY_BASE + gray;
  }

  const h = (((hueDeg % 360) + 360) % 360) / 60;
  const c = value * saturation;
  const x = c * (1 - Math.abs((h % 2) - 1));

  let r1: number;
  let g1: number;
  let b1: number;
  switch (Math.floor(h)) {
    case 0:
      [r1, g1, b1] = [c, x, 0];
      break;
    case 1:
      [r1, g1, b1] = [x, c, 0];
      break;
    case 2:
      [r1, g1, b1] = [0, c, x];
      break;
    case 3:
      [r1, g1, b1] = [0, x, c];
      break;
    case 4:
      [r1, g1, b1] = [x, 0, c];
      break;
    default:
      [r1, g1, b1] = [c, 0, x];
  }

  const m = value - c;
  return CUBE_BASE + 36 * cubeLevel(r1 + m) + 6 * cubeLevel(g1 + m) + cubeLevel(b1 + m);
}

/**
 * Map a 0-1 channel to one of the 6 cube levels
 */
function cubeLevel(channel: number): number {
  return Math.round(Math.min(Math.max(channel * 5, 0), 5));
}

import { ESCAPE_RADIUS_SQR, type Complex } from '@julia-drift/protocol';

/**
 * Fixed complex viewport: real part spans [-1.5, 1.5), imaginary part [-1, 1).
 * Terminal cells are not square, so the image is stretched vertically.
 */
export const VIEWPORT = {
  reMin: -1.5,
  reSpan: 3.0,
  imMin: -1.0,
  imSpan: 2.0,
} as const;

/**
 * Escape iteration count of `z <- z^2 + c` starting at `z = point`.
 * Returns `maxIters` for points that never leave |z| <= 2 (interior).
 */
export function escapeCount(parameter: Complex, point: Complex, maxIters: number): number {
  return escapeCountAt(parameter.re, parameter.im, point.re, point.im, maxIters);
}

/**
 * Scalar form of {@link escapeCount} used by the per-cell loop
 */
export function escapeCountAt(cRe: number, cIm: number, zRe: number, zIm: number, maxIters: number): number {
  let re = zRe;
  let im = zIm;
  let re2 = re * re;
  let im2 = im * im;
  let iters = 0;

  while (re2 + im2 <= ESCAPE_RADIUS_SQR && iters < maxIters) {
    im = 2 * re * im + cIm;
    re = re2 - im2 + cRe;
    re2 = re * re;
    im2 = im * im;
    iters++;
  }

  return iters;
}

/**
 * Map a grid cell to its point on the complex plane
 */
export function cellToPoint(x: number, y: number, width: number, height: number): Complex {
  return {
    re: cellRe(x, width),
    im: cellIm(y, height),
  };
}

export function cellRe(x: number, width: number): number {
  return (x / width) * VIEWPORT.reSpan + VIEWPORT.reMin;
}

export function cellIm(y: number, height: number): number {
  return (y / height) * VIEWPORT.imSpan + VIEWPORT.imMin;
}

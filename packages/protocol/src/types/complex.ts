/**
 * Complex number (immutable value)
 */
export interface Complex {
  re: number;
  im: number;
}

export const ZERO: Complex = { re: 0, im: 0 };

export function complex(re: number, im: number): Complex {
  return { re, im };
}

export function add(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function sub(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

/**
 * Multiply by a real scalar
 */
export function scale(a: Complex, k: number): Complex {
  return { re: a.re * k, im: a.im * k };
}

/**
 * Squared magnitude (|a|^2)
 */
export function normSqr(a: Complex): number {
  return a.re * a.re + a.im * a.im;
}

/**
 * Magnitude (|a|)
 */
export function abs(a: Complex): number {
  return Math.hypot(a.re, a.im);
}

/**
 * Real dot product of two complex numbers seen as 2D vectors
 */
export function dot(a: Complex, b: Complex): number {
  return a.re * b.re + a.im * b.im;
}

/**
 * Format as `(+0.123,-0.456)`
 */
export function formatComplex(a: Complex, digits: number = 3): string {
  return `(${signed(a.re, digits)},${signed(a.im, digits)})`;
}

function signed(n: number, digits: number): string {
  const text = n.toFixed(digits);
  return text.startsWith('-') ? text : `+${text}`;
}

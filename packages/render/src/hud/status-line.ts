import { formatComplex, type Complex, type FrameMetrics } from '@julia-drift/protocol';
import { ANSIBuilder } from '../ansi/builder.js';

/**
 * One-line heads-up display text, cut to `width` columns
 */
export function formatStatusLine(parameter: Complex, metrics: FrameMetrics, width: number): string {
  const text =
    `Julia anim | c=${formatComplex(parameter)} | Frame ${metrics.frame} | ` +
    `FPS ${metrics.smoothedFps.toFixed(1)} (q/Ctrl+C to quit)`;
  return text.slice(0, Math.max(0, width));
}

/**
 * Escape sequence drawing `text` on row `row`, replacing whatever was there
 */
export function renderStatusLine(row: number, text: string, ansi: ANSIBuilder = new ANSIBuilder()): string {
  return ansi.clear().moveTo(0, row).clearLine().resetAttributes().write(text).build();
}

/**
 * Summary printed after the terminal is restored
 */
export function formatExitReport(frames: number, seconds: number): string {
  const avg = seconds > 0 ? frames / seconds : 0;
  return `Exited. Frames: ${frames} Time: ${seconds.toFixed(2)}s Avg FPS: ${avg.toFixed(2)}`;
}

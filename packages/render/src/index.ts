// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';

// Errors
export { FrameWriteError } from './errors.js';

// Fractal evaluation and encoding
export {
  VIEWPORT,
  escapeCount,
  escapeCountAt,
  cellToPoint,
  cellRe,
  cellIm,
} from './fractal/escape.js';
export {
  SHADES,
  SHADE_GAMMA,
  PALETTE_SATURATION,
  PALETTE_VALUE,
  shadeIndex,
  shadeChar,
  colorIndex,
} from './fractal/shade.js';
export { renderFrame, renderFrameDetailed } from './fractal/frame-renderer.js';

// Status line
export { formatStatusLine, renderStatusLine, formatExitReport } from './hud/status-line.js';

// Input
export { KeyParser } from './input/key-parser.js';
export { InputHandler, DEFAULT_BINDINGS, type KeyBinding, type InputCallback } from './input/input-handler.js';

// Perf stats
export { PerfStatsTracker, perfStats, type PerfStats, type PerfLogger } from './stats/perf-stats.js';

// Transport (backpressure handling)
export { OutputPump, type OutputPumpMetrics } from './transport/index.js';

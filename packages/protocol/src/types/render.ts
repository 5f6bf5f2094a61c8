/**
 * Destination for encoded frames.
 * Implementations may throw; the renderer surfaces the failure to its caller.
 */
export interface FrameSink {
  write(chunk: string): void;
}

/**
 * Counters for one rendered frame
 */
export interface FrameRenderResult {
  /** Color-set and reset directives emitted */
  directives: number;
  /** Directives a per-glyph encoder would have emitted for the same frame */
  naiveDirectives: number;
  glyphs: number;
  bytes: number;
}

/**
 * Display-only frame rate bookkeeping
 */
export interface FrameMetrics {
  frame: number;
  smoothedFps: number;
  /** Cost of the last frame in seconds */
  lastFrameTime: number;
}

/**
 * Key event from terminal input
 */
export interface KeyEvent {
  type: 'key' | 'unknown';
  key?: string;
  char?: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

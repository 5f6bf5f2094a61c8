export * from './constants.js';
export * from './types/complex.js';
export type { AnimationState, AnimatorConfig, AdvanceResult } from './types/animation.js';
export type { FrameSink, FrameRenderResult, FrameMetrics, KeyEvent } from './types/render.js';

import type { AnimatorConfig } from './types/animation.js';

// Iteration
export const DEFAULT_MAX_ITERS = 120;
export const ESCAPE_RADIUS_SQR = 4;

// Animation
export const DEFAULT_SEED = 0x9e3779b97f4a7c15n;
export const MAX_DT = 0.1;
export const DEFAULT_ANIMATOR_CONFIG: AnimatorConfig = {
  base: { re: -0.8, im: 0.156 },
  radius: 0.4,
  accelStrength: 1.2,
  damping: 0.85,
};

// Pacing
export const DEFAULT_TARGET_FPS = 60;
export const FPS_SMOOTHING = 0.85;

// Terminal defaults
export const DEFAULT_VIEWPORT_WIDTH = 80;
export const DEFAULT_VIEWPORT_HEIGHT = 24;
export const STATUS_LINE_HEIGHT = 1;

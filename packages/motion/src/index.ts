// Random generator
export { Xorshift64Star, nextSample, normalizeSeed } from './random/xorshift.js';

// Parameter animation
export { initialize, advance } from './animator/parameter-animator.js';

// Pacing and cancellation
export { FramePacer, type FramePacerConfig, type Clock, type Sleep } from './tick/frame-pacer.js';
export { CancellationFlag } from './tick/cancellation.js';

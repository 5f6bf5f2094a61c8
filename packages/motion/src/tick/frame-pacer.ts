import { DEFAULT_TARGET_FPS, FPS_SMOOTHING, type FrameMetrics } from '@julia-drift/protocol';

/** Monotonic clock in seconds */
export type Clock = () => number;
export type Sleep = (seconds: number) => Promise<void>;

/**
 * Frame pacer configuration
 */
export interface FramePacerConfig {
  targetFps: number;
  clock: Clock;
  sleep: Sleep;
}

const defaultClock: Clock = () => performance.now() / 1000;

const defaultSleep: Sleep = (seconds) =>
  new Promise((resolve) => setTimeout(resolve, seconds * 1000));

/**
 * Fixed-rate frame pacing driven by measured time.
 *
 * Overruns are never compensated: no frames are dropped and no catch-up
 * steps are taken, the animation simply receives a larger dt next tick.
 */
export class FramePacer {
  private config: FramePacerConfig;
  private lastTick: number;
  private metrics: FrameMetrics;
  readonly targetInterval: number;

  constructor(config: Partial<FramePacerConfig> = {}) {
    this.config = {
      targetFps: DEFAULT_TARGET_FPS,
      clock: defaultClock,
      sleep: defaultSleep,
      ...config,
    };
    this.targetInterval = 1 / this.config.targetFps;
    this.lastTick = this.config.clock();
    this.metrics = {
      frame: 0,
      smoothedFps: this.config.targetFps,
      lastFrameTime: 0,
    };
  }

  /**
   * Current time on the pacer's clock (seconds)
   */
  now(): number {
    return this.config.clock();
  }

  /**
   * Mark the start of a frame; returns seconds elapsed since the previous tick
   */
  tick(): number {
    const now = this.config.clock();
    const elapsed = now - this.lastTick;
    this.lastTick = now;
    return elapsed;
  }

  /**
   * Sleep for whatever is left of the frame budget.
   * Resolves to the number of seconds slept (0 on overrun).
   */
  async pace(frameCost: number, targetInterval: number = this.targetInterval): Promise<number> {
    const remaining = targetInterval - frameCost;
    if (!(remaining > 0)) return 0;

    await this.config.sleep(remaining);
    return remaining;
  }

  /**
   * Update the smoothed frame rate with the cost of a finished frame
   */
  recordFrame(frameCost: number): FrameMetrics {
    const instantaneous = frameCost > 0 ? 1 / frameCost : this.config.targetFps;
    this.metrics = {
      frame: this.metrics.frame + 1,
      smoothedFps: this.metrics.smoothedFps * FPS_SMOOTHING + instantaneous * (1 - FPS_SMOOTHING),
      lastFrameTime: frameCost,
    };
    return this.metrics;
  }

  getMetrics(): FrameMetrics {
    return { ...this.metrics };
  }
}

import { EventEmitter } from 'events';
import {
  DEFAULT_ANIMATOR_CONFIG,
  DEFAULT_MAX_ITERS,
  DEFAULT_SEED,
  DEFAULT_TARGET_FPS,
  STATUS_LINE_HEIGHT,
  type AnimatorConfig,
  type Complex,
  type FrameMetrics,
  type FrameRenderResult,
  type FrameSink,
} from '@julia-drift/protocol';
import { CancellationFlag, FramePacer, advance, initialize } from '@julia-drift/motion';
import {
  ANSIBuilder,
  formatStatusLine,
  renderFrameDetailed,
  renderStatusLine,
  type PerfStatsTracker,
} from '@julia-drift/render';

/**
 * Animation loop configuration
 */
export interface AnimationLoopConfig {
  maxIters: number;
  targetFps: number;
  seed: bigint;
  animator: AnimatorConfig;
}

/**
 * Frame output that can report when the stream has caught up
 */
export interface FrameOutput extends FrameSink {
  flushed(): Promise<void>;
}

export interface AnimationLoopDeps {
  output: FrameOutput;
  size: () => { columns: number; rows: number };
  cancel: CancellationFlag;
  pacer?: FramePacer;
  stats?: PerfStatsTracker;
}

/**
 * Context emitted after every frame
 */
export interface FrameContext {
  parameter: Complex;
  metrics: FrameMetrics;
  render: FrameRenderResult;
  dt: number;
  /** Seconds spent on the frame before pacing */
  cost: number;
}

export interface LoopSummary {
  frames: number;
  seconds: number;
  parameter: Complex;
}

/**
 * Variable-timestep render loop.
 *
 * Each frame: measure dt, advance the drifting parameter, render the fractal
 * and status line, wait for the output to drain, then sleep off the rest of
 * the frame budget. The cancellation flag is polled once per frame.
 */
export class AnimationLoop extends EventEmitter {
  private config: AnimationLoopConfig;
  private deps: AnimationLoopDeps;
  private pacer: FramePacer;
  private ansi = new ANSIBuilder();
  private running: boolean = false;

  constructor(config: Partial<AnimationLoopConfig>, deps: AnimationLoopDeps) {
    super();
    this.config = {
      maxIters: DEFAULT_MAX_ITERS,
      targetFps: DEFAULT_TARGET_FPS,
      seed: DEFAULT_SEED,
      animator: DEFAULT_ANIMATOR_CONFIG,
      ...config,
    };
    this.deps = deps;
    this.pacer = deps.pacer ?? new FramePacer({ targetFps: this.config.targetFps });
  }

  /**
   * Run until cancelled. Rejects with the first frame write failure.
   */
  async run(): Promise<LoopSummary> {
    if (this.running) throw new Error('Animation loop is already running');
    this.running = true;

    const { output, size, cancel, stats } = this.deps;
    const startTime = this.pacer.now();
    let state = initialize(this.config.seed);
    let parameter = this.config.animator.base;
    let metrics = this.pacer.getMetrics();

    this.emit('start');
    try {
      this.pacer.tick();

      while (!cancel.isCancelled()) {
        const dt = this.pacer.tick();
        const frameStart = this.pacer.now();

        const { columns, rows } = size();
        const width = Math.max(columns, 0);
        const height = Math.max(rows - STATUS_LINE_HEIGHT, 0);

        const step = advance(state, dt, this.config.animator);
        state = step.state;
        parameter = step.parameter;

        output.write(this.ansi.clear().home().build());
        const render = renderFrameDetailed(parameter, width, height, this.config.maxIters, output, this.ansi);

        metrics = this.pacer.recordFrame(this.pacer.now() - frameStart);
        output.write(renderStatusLine(height, formatStatusLine(parameter, metrics, width), this.ansi));
        await this.flushedOrCancelled();

        const cost = this.pacer.now() - frameStart;
        if (stats) {
          stats.recordFrame(render.bytes, cost * 1000);
          stats.recordDirectives(render.directives, render.naiveDirectives);
        }

        const ctx: FrameContext = { parameter, metrics, render, dt, cost };
        this.emit('frame', ctx);
        if (cost > this.pacer.targetInterval) {
          this.emit('slowFrame', { frame: metrics.frame, cost, budget: this.pacer.targetInterval });
        }

        await this.pacer.pace(cost);
      }
    } finally {
      this.running = false;
      this.emit('stop');
    }

    return {
      frames: metrics.frame,
      seconds: this.pacer.now() - startTime,
      parameter,
    };
  }

  /**
   * Wait for the output to drain, giving up as soon as the loop is cancelled
   * so a stalled reader cannot block quitting
   */
  private async flushedOrCancelled(): Promise<void> {
    const { output, cancel } = this.deps;
    let unsubscribe = () => {};
    const cancelled = new Promise<void>((resolve) => {
      unsubscribe = cancel.onCancel(resolve);
    });
    try {
      await Promise.race([output.flushed(), cancelled]);
    } finally {
      unsubscribe();
    }
  }

  isRunning(): boolean {
    return this.running;
  }
}

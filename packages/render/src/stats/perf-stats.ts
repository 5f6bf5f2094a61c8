/**
 * Performance statistics for the frame encoder
 *
 * Tracks bytes and render time per frame and how many color directives the
 * run-length encoding saved over a per-glyph encoding. Logged at a fixed
 * interval when enabled.
 */

export interface PerfStats {
  // Color run-length encoding
  runs: {
    directivesEmitted: number;
    directivesPerGlyph: number;
    directivesSaved: number;
  };

  // Overall
  frameCount: number;
  avgBytesPerFrame: number;
  avgRenderTimeMs: number;
}

export type PerfLogger = (message: string) => void;

function emptyStats(): PerfStats {
  return {
    runs: {
      directivesEmitted: 0,
      directivesPerGlyph: 0,
      directivesSaved: 0,
    },
    frameCount: 0,
    avgBytesPerFrame: 0,
    avgRenderTimeMs: 0,
  };
}

export class PerfStatsTracker {
  private stats: PerfStats = emptyStats();
  private enabled: boolean = false;
  private logInterval: ReturnType<typeof setInterval> | null = null;
  private logger: PerfLogger = (message) => console.error(message);
  private totalBytes: number = 0;
  private totalRenderTime: number = 0;
  private lastLogTime: number = Date.now();

  /**
   * Enable performance tracking with periodic logging
   */
  enable(logIntervalMs: number = 10000, logger?: PerfLogger): void {
    this.enabled = true;
    if (logger) this.logger = logger;
    if (this.logInterval) {
      clearInterval(this.logInterval);
    }
    this.lastLogTime = Date.now();
    this.logInterval = setInterval(() => this.logStats(), logIntervalMs);
    // Never keep the process alive just to log
    this.logInterval.unref();
  }

  /**
   * Disable performance tracking
   */
  disable(): void {
    this.enabled = false;
    if (this.logInterval) {
      clearInterval(this.logInterval);
      this.logInterval = null;
    }
  }

  /**
   * Record a frame render
   */
  recordFrame(bytes: number, renderTimeMs: number): void {
    if (!this.enabled) return;
    this.stats.frameCount++;
    this.totalBytes += bytes;
    this.totalRenderTime += renderTimeMs;
    this.stats.avgBytesPerFrame = this.totalBytes / this.stats.frameCount;
    this.stats.avgRenderTimeMs = this.totalRenderTime / this.stats.frameCount;
  }

  /**
   * Record color directives for a frame against the per-glyph count
   */
  recordDirectives(emitted: number, perGlyph: number): void {
    if (!this.enabled) return;
    this.stats.runs.directivesEmitted += emitted;
    this.stats.runs.directivesPerGlyph += perGlyph;
    this.stats.runs.directivesSaved = this.stats.runs.directivesPerGlyph - this.stats.runs.directivesEmitted;
  }

  /**
   * Get current stats
   */
  getStats(): PerfStats {
    return { ...this.stats, runs: { ...this.stats.runs } };
  }

  /**
   * Reset all stats
   */
  reset(): void {
    this.stats = emptyStats();
    this.totalBytes = 0;
    this.totalRenderTime = 0;
  }

  /**
   * Format the current interval's stats
   */
  formatStats(elapsedSeconds: number): string {
    const s = this.stats;
    const savings = s.runs.directivesPerGlyph > 0
      ? ((s.runs.directivesSaved / s.runs.directivesPerGlyph) * 100).toFixed(1)
      : '0';
    return [
      `[PerfStats] ${elapsedSeconds.toFixed(1)}s interval, ${s.frameCount} frames`,
      `  Avg: ${s.avgBytesPerFrame.toFixed(0)} bytes/frame, ${s.avgRenderTimeMs.toFixed(2)}ms render`,
      `  Runs: ${s.runs.directivesEmitted} directives, ${savings}% saved vs per-glyph`,
    ].join('\n');
  }

  private logStats(): void {
    const elapsed = (Date.now() - this.lastLogTime) / 1000;
    this.lastLogTime = Date.now();
    this.logger(this.formatStats(elapsed));

    // Reset for next interval
    this.reset();
  }
}

// Singleton instance
export const perfStats = new PerfStatsTracker();

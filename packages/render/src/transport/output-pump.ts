import type { FrameSink } from '@julia-drift/protocol';
import { FrameWriteError } from '../errors.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * OutputPump - frame sink over a writable stream with backpressure handling
 *
 * When stream.write() returns false the kernel/terminal buffer is full; the
 * loop awaits `flushed()` before pacing so frames are never queued without
 * bound and never dropped. Stream errors are kept and re-raised as
 * FrameWriteError on the next write.
 */
export class OutputPump implements FrameSink {
  private stream: NodeJS.WritableStream;
  private backpressured = false;
  private closed = false;
  private failure: unknown = null;
  private waiters: Waiter[] = [];

  // Metrics
  private drainCount = 0;
  private totalBytesWritten = 0;
  private totalWrites = 0;

  // Event handlers (stored for cleanup)
  private drainHandler: () => void;
  private closeHandler: () => void;
  private errorHandler: (error: unknown) => void;

  constructor(stream: NodeJS.WritableStream) {
    this.stream = stream;

    this.drainHandler = () => {
      this.drainCount++;
      this.backpressured = false;
      this.settle(null);
    };

    this.closeHandler = () => {
      this.closed = true;
      this.settle(new FrameWriteError('Output stream closed'));
    };

    this.errorHandler = (error: unknown) => {
      this.failure = error;
      this.settle(this.failureError());
    };

    this.stream.on('drain', this.drainHandler);
    this.stream.on('close', this.closeHandler);
    this.stream.on('error', this.errorHandler);
  }

  /**
   * Write a chunk; throws FrameWriteError if the stream has failed or closed
   */
  write(chunk: string): void {
    if (this.failure !== null) throw this.failureError();
    if (this.closed) throw new FrameWriteError('Output stream closed');

    this.totalBytesWritten += Buffer.byteLength(chunk, 'utf8');
    this.totalWrites++;

    const ok = this.stream.write(chunk);
    if (!ok) {
      // Buffer full - wait for drain event before the next frame
      this.backpressured = true;
    }
  }

  /**
   * Resolves once the stream has accepted everything written so far
   */
  flushed(): Promise<void> {
    if (this.failure !== null) return Promise.reject(this.failureError());
    if (this.closed) return Promise.reject(new FrameWriteError('Output stream closed'));
    if (!this.backpressured) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  isBackpressured(): boolean {
    return this.backpressured;
  }

  getMetrics(): OutputPumpMetrics {
    return {
      drainCount: this.drainCount,
      totalBytesWritten: this.totalBytesWritten,
      totalWrites: this.totalWrites,
      backpressured: this.backpressured,
    };
  }

  /**
   * Remove listeners; pending flushes are rejected
   */
  destroy(): void {
    this.stream.removeListener('drain', this.drainHandler);
    this.stream.removeListener('close', this.closeHandler);
    this.stream.removeListener('error', this.errorHandler);
    this.settle(new FrameWriteError('Output pump destroyed'));
  }

  private failureError(): FrameWriteError {
    return new FrameWriteError('Output stream failed', { cause: this.failure });
  }

  private settle(error: Error | null): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve();
      }
    }
  }
}

export interface OutputPumpMetrics {
  drainCount: number;
  totalBytesWritten: number;
  totalWrites: number;
  backpressured: boolean;
}

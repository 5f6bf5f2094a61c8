/**
 * Shared cancellation flag.
 *
 * Backed by a one-slot Int32Array over a SharedArrayBuffer and accessed with
 * Atomics, so a signal handler, an input listener or a worker holding the same
 * buffer can raise it while the frame loop polls it.
 */
export class CancellationFlag {
  /** Pass to another flag (or a worker) to share the same state */
  readonly buffer: SharedArrayBuffer;
  private readonly cell: Int32Array;
  private listeners: Array<() => void> = [];

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.buffer = buffer;
    this.cell = new Int32Array(buffer, 0, 1);
  }

  cancel(): void {
    Atomics.store(this.cell, 0, 1);

    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) listener();
  }

  /**
   * Call `listener` once when this flag is cancelled (immediately if it
   * already is). Only sees `cancel()` calls on this instance, not on other
   * views of the buffer. Returns an unsubscribe function.
   */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled()) {
      listener();
      return () => {};
    }
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  isCancelled(): boolean {
    return Atomics.load(this.cell, 0) === 1;
  }

  reset(): void {
    Atomics.store(this.cell, 0, 0);
  }
}

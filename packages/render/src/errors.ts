/**
 * A frame could not be written to its sink.
 * Raised to the caller as-is; the renderer never retries or drops the frame silently.
 */
export class FrameWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FrameWriteError';
  }
}

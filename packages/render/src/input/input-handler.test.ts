import { describe, expect, it, vi } from 'vitest';
import { InputHandler } from './input-handler.js';

describe('InputHandler', () => {
  it('should map q, Q and Ctrl+C to quit', () => {
    const handler = new InputHandler();
    const callback = vi.fn();
    handler.onAction(callback);

    handler.handleInput(Buffer.from('q'));
    handler.handleInput(Buffer.from('Q'));
    handler.handleInput(Buffer.from([0x03]));

    expect(callback).toHaveBeenCalledTimes(3);
    expect(callback.mock.calls.map((call) => call[0])).toEqual(['quit', 'quit', 'quit']);
  });

  it('should ignore unbound keys and escape sequences', () => {
    const handler = new InputHandler();
    const callback = vi.fn();
    handler.onAction(callback);

    handler.handleInput(Buffer.from('x\x1b[A\r'));
    expect(callback).not.toHaveBeenCalled();
  });

  it('should accept custom bindings', () => {
    const handler = new InputHandler([{ key: 'p', action: 'pause' }]);
    const callback = vi.fn();
    handler.onAction(callback);

    handler.handleInput(Buffer.from('pq'));
    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0]?.[0]).toBe('pause');
  });
});

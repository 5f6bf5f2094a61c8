import type { KeyEvent } from '@julia-drift/protocol';
import { KeyParser } from './key-parser.js';

/**
 * Key binding definition
 */
export interface KeyBinding {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  action: string;
}

/**
 * Input handler callback type
 */
export type InputCallback = (action: string, event: KeyEvent) => void;

export const DEFAULT_BINDINGS: readonly KeyBinding[] = [
  { key: 'q', action: 'quit' },
  { key: 'Q', action: 'quit' },
  { key: 'Ctrl-C', ctrl: true, action: 'quit' },
];

/**
 * Turns raw terminal input into named actions
 */
export class InputHandler {
  private parser = new KeyParser();
  private bindings: readonly KeyBinding[];
  private callback: InputCallback | null = null;

  constructor(bindings: readonly KeyBinding[] = DEFAULT_BINDINGS) {
    this.bindings = bindings;
  }

  /**
   * Set callback for actions
   */
  onAction(callback: InputCallback): void {
    this.callback = callback;
  }

  /**
   * Feed raw input bytes
   */
  handleInput(data: Buffer): void {
    for (const event of this.parser.parse(data)) {
      const action = this.findAction(event);
      if (action && this.callback) {
        this.callback(action, event);
      }
    }
  }

  private findAction(event: KeyEvent): string | null {
    if (event.type !== 'key' || event.key === undefined) return null;

    const binding = this.bindings.find(
      (b) =>
        b.key === event.key &&
        (b.ctrl === undefined || b.ctrl === event.ctrl) &&
        (b.alt === undefined || b.alt === event.alt)
    );
    return binding?.action ?? null;
  }
}

import type { KeyEvent } from '@julia-drift/protocol';

type ParseResult = { event: KeyEvent; consumed: number };

const NO_MODIFIERS = { ctrl: false, alt: false, shift: false, meta: false } as const;

/**
 * Parser for raw terminal input.
 * Recognizes control keys, printable UTF-8 characters and skips escape
 * sequences (arrows, function keys) as whole units.
 */
export class KeyParser {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Parse incoming data and emit key events
   */
  parse(data: Buffer): KeyEvent[] {
    this.buffer = Buffer.concat([this.buffer, data]);
    const events: KeyEvent[] = [];

    while (this.buffer.length > 0) {
      const result = this.parseOne();
      if (result) {
        events.push(result.event);
        this.buffer = this.buffer.subarray(result.consumed);
      } else {
        // Incomplete sequence, wait for more data
        break;
      }
    }

    return events;
  }

  /**
   * Clear buffer
   */
  clear(): void {
    this.buffer = Buffer.alloc(0);
  }

  private parseOne(): ParseResult | null {
    const first = this.buffer[0];
    if (first === undefined) return null;

    if (first === 0x1b) return this.parseEscape();
    if (first < 0x20) return this.parseControl(first);
    if (first === 0x7f) {
      return { event: { type: 'key', key: 'Backspace', ...NO_MODIFIERS }, consumed: 1 };
    }
    return this.parseChar(first);
  }

  private parseEscape(): ParseResult | null {
    const b = this.buffer;
    const second = b[1];

    // Bare ESC
    if (second === undefined) {
      return { event: { type: 'key', key: 'Escape', ...NO_MODIFIERS }, consumed: 1 };
    }

    // ESC [ ... final byte in 0x40-0x7E
    if (second === 0x5b) {
      let end = 2;
      while (end < b.length) {
        const byte = b[end];
        if (byte !== undefined && byte >= 0x40 && byte <= 0x7e) break;
        end++;
      }
      if (end >= b.length) return null;
      return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed: end + 1 };
    }

    // ESC O x (SS3)
    if (second === 0x4f) {
      if (b.length < 3) return null;
      return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed: 3 };
    }

    // Alt + key
    if (second >= 0x20 && second < 0x7f) {
      const char = String.fromCharCode(second);
      return {
        event: { type: 'key', key: char, char, ...NO_MODIFIERS, alt: true, shift: char !== char.toLowerCase() },
        consumed: 2,
      };
    }

    return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed: 2 };
  }

  private parseControl(byte: number): ParseResult {
    const named: Record<number, string> = {
      0x08: 'Backspace',
      0x09: 'Tab',
      0x0a: 'Enter',
      0x0d: 'Enter',
    };

    const key = named[byte] ?? (byte === 0x00 ? 'Ctrl-Space' : `Ctrl-${String.fromCharCode(byte + 64)}`);
    const ctrl = named[byte] === undefined;

    return { event: { type: 'key', key, ...NO_MODIFIERS, ctrl }, consumed: 1 };
  }

  private parseChar(first: number): ParseResult | null {
    let charLen = 1;

    // Determine UTF-8 character length
    if ((first & 0xe0) === 0xc0) charLen = 2;
    else if ((first & 0xf0) === 0xe0) charLen = 3;
    else if ((first & 0xf8) === 0xf0) charLen = 4;

    if (this.buffer.length < charLen) return null;

    const char = this.buffer.subarray(0, charLen).toString('utf8');
    return {
      event: { type: 'key', key: char, char, ...NO_MODIFIERS, shift: char !== char.toLowerCase() },
      consumed: charLen,
    };
  }
}

import { CURSOR, SCREEN, STYLE } from './codes.js';
import { fg256 } from './colors.js';

/**
 * Fluent ANSI escape sequence builder
 */
export class ANSIBuilder {
  private output: string = '';

  // Cursor movement
  moveTo(x: number, y: number): this {
    this.output += CURSOR.moveTo(y + 1, x + 1); // Convert 0-indexed to 1-indexed
    return this;
  }

  home(): this {
    this.output += CURSOR.home;
    return this;
  }

  hideCursor(): this {
    this.output += CURSOR.hide;
    return this;
  }

  showCursor(): this {
    this.output += CURSOR.show;
    return this;
  }

  // Screen control
  clearScreen(): this {
    this.output += SCREEN.clear;
    return this;
  }

  clearLine(): this {
    this.output += SCREEN.clearLine;
    return this;
  }

  enterAlternateScreen(): this {
    this.output += SCREEN.enterAlt;
    return this;
  }

  exitAlternateScreen(): this {
    this.output += SCREEN.exitAlt;
    return this;
  }

  disableLineWrap(): this {
    this.output += SCREEN.disableWrap;
    return this;
  }

  enableLineWrap(): this {
    this.output += SCREEN.enableWrap;
    return this;
  }

  // Colors
  setForeground256(index: number): this {
    this.output += fg256(index);
    return this;
  }

  resetAttributes(): this {
    this.output += STYLE.reset;
    return this;
  }

  // Text output
  write(text: string): this {
    this.output += text;
    return this;
  }

  newline(): this {
    this.output += '\n';
    return this;
  }

  // Build and clear
  build(): string {
    const result = this.output;
    this.output = '';
    return result;
  }

  // Clear without building
  clear(): this {
    this.output = '';
    return this;
  }
}

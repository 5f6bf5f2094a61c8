/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * Cursor control
 */
export const CURSOR = {
  /** Move cursor to (row, col) - 1-indexed */
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  /** Hide cursor */
  hide: `${CSI}?25l`,
  /** Show cursor */
  show: `${CSI}?25h`,
  /** Move to home position */
  home: `${CSI}H`,
} as const;

/**
 * Screen control
 */
export const SCREEN = {
  /** Clear entire screen */
  clear: `${CSI}2J`,
  /** Clear entire line */
  clearLine: `${CSI}2K`,
  /** Enter alternate screen buffer */
  enterAlt: `${CSI}?1049h`,
  /** Exit alternate screen buffer */
  exitAlt: `${CSI}?1049l`,
  /** Enable line wrapping */
  enableWrap: `${CSI}?7h`,
  /** Disable line wrapping */
  disableWrap: `${CSI}?7l`,
} as const;

/**
 * Text styling
 */
export const STYLE = {
  /** Reset all attributes */
  reset: `${CSI}0m`,
} as const;

import { ANSIBuilder } from '@julia-drift/render';
import { DEFAULT_VIEWPORT_HEIGHT, DEFAULT_VIEWPORT_WIDTH } from '@julia-drift/protocol';

/**
 * Input side of a terminal (process.stdin fits)
 */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  off(event: 'data', listener: (data: Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/**
 * Output side of a terminal (process.stdout fits)
 */
export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

/**
 * Source of the process 'exit' event (process fits)
 */
export interface ExitEvents {
  on(event: 'exit', listener: () => void): unknown;
  off(event: 'exit', listener: () => void): unknown;
}

export interface TerminalSessionOptions {
  input: TerminalInput;
  output: TerminalOutput;
  onData?: (data: Buffer) => void;
  /** Restore the terminal on 'exit' too, so process.exit() from a crash handler leaves it usable */
  exitEvents?: ExitEvents;
}

/**
 * Full-screen terminal session: alternate screen, hidden cursor, no line
 * wrap and raw keyboard input while open. `close` restores everything and is
 * safe to call more than once.
 */
export class TerminalSession {
  private input: TerminalInput;
  private output: TerminalOutput;
  private dataHandler: (data: Buffer) => void;
  private exitEvents?: ExitEvents;
  private exitHandler = () => this.close();
  private ansi = new ANSIBuilder();
  private rawMode = false;
  private active = false;

  constructor(options: TerminalSessionOptions) {
    this.input = options.input;
    this.output = options.output;
    this.exitEvents = options.exitEvents;
    const onData = options.onData;
    this.dataHandler = (data) => onData?.(data);
  }

  /**
   * Initialize terminal (enter alternate screen, hide cursor, etc.)
   */
  open(): void {
    if (this.active) return;
    this.active = true;
    this.exitEvents?.on('exit', this.exitHandler);

    const init = this.ansi
      .enterAlternateScreen()
      .hideCursor()
      .disableLineWrap()
      .clearScreen()
      .build();
    this.output.write(init);

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
      this.rawMode = true;
    }
    this.input.on('data', this.dataHandler);
    this.input.resume();
  }

  /**
   * Cleanup terminal (exit alternate screen, show cursor)
   */
  close(): void {
    if (!this.active) return;
    this.active = false;
    this.exitEvents?.off('exit', this.exitHandler);

    this.input.off('data', this.dataHandler);
    if (this.rawMode && this.input.setRawMode) {
      this.input.setRawMode(false);
      this.rawMode = false;
    }
    this.input.pause();

    const cleanup = this.ansi
      .resetAttributes()
      .exitAlternateScreen()
      .showCursor()
      .enableLineWrap()
      .build();
    this.output.write(cleanup);
  }

  isOpen(): boolean {
    return this.active;
  }

  /**
   * Current terminal size; 80x24 when the output is not a terminal
   */
  size(): TerminalSize {
    return {
      columns: this.output.columns || DEFAULT_VIEWPORT_WIDTH,
      rows: this.output.rows || DEFAULT_VIEWPORT_HEIGHT,
    };
  }
}

/**
 * Run `fn` inside an open terminal session; the terminal is restored on every
 * exit path, including thrown errors
 */
export async function withTerminalSession<T>(
  options: TerminalSessionOptions,
  fn: (session: TerminalSession) => Promise<T>
): Promise<T> {
  const session = new TerminalSession(options);
  try {
    session.open();
    return await fn(session);
  } finally {
    session.close();
  }
}

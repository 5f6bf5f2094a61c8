export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogWriter = (line: string, ...details: unknown[]) => void;

/**
 * Timestamped, tagged logger.
 * Writes to stderr by default: stdout carries the frames.
 */
export function createLogger(
  tag: string,
  level: LogLevel = 'info',
  writer: LogWriter = (line, ...details) => console.error(line, ...details)
): Logger {
  const threshold = LEVELS[level];

  const log = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (LEVELS[at] < threshold) return;
    const timestamp = new Date().toISOString();
    const prefix = at === 'info' ? '' : `${at.toUpperCase()} `;
    writer(`${timestamp} ${prefix}[${tag}] ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => log('debug', message, details),
    info: (message, ...details) => log('info', message, details),
    warn: (message, ...details) => log('warn', message, details),
    error: (message, ...details) => log('error', message, details),
  };
}

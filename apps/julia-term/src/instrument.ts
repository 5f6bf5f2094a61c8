// Imported before anything else so .env is in process.env when config loads
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import type { AppConfig } from './config.js';

/**
 * Process-level failure events (process fits)
 */
export interface CrashEvents {
  on(event: 'unhandledRejection' | 'uncaughtException', listener: (error: unknown) => void): unknown;
  exit(code: number): unknown;
}

/**
 * Start Sentry from validated config. Does nothing without a DSN.
 */
export function initSentry(
  config: Pick<AppConfig, 'sentryDsn' | 'environment'>,
  events: CrashEvents = process
): boolean {
  if (!config.sentryDsn) return false;

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.environment,
    tracesSampleRate: 0,
    beforeSend(event) {
      // Add memory info to all events
      const mem = process.memoryUsage();
      event.contexts = {
        ...event.contexts,
        memory: {
          heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
          rss_mb: Math.round(mem.rss / 1024 / 1024),
        },
      };
      return event;
    },
  });

  events.on('unhandledRejection', (reason) => {
    Sentry.captureException(reason);
  });

  // process.exit fires 'exit', which restores the terminal
  events.on('uncaughtException', (error) => {
    Sentry.captureException(error);
    void Sentry.flush(2000).finally(() => events.exit(1));
  });

  return true;
}

export { Sentry };

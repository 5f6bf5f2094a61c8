// .env must be loaded before config is read
import { Sentry, initSentry } from './instrument.js';

import { CancellationFlag } from '@julia-drift/motion';
import { InputHandler, OutputPump, formatExitReport, perfStats } from '@julia-drift/render';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { AnimationLoop, type LoopSummary } from './loop/animation-loop.js';
import { withTerminalSession } from './terminal/terminal-session.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  initSentry(config);

  const log = createLogger('Main', config.logLevel);
  const loopLog = createLogger('Loop', config.logLevel);
  log.info(
    `Starting julia-drift: ${config.targetFps} fps, ${config.maxIters} iterations, seed 0x${config.seed.toString(16)}`
  );

  if (config.perfStats) {
    const statsLog = createLogger('PerfStats', config.logLevel);
    perfStats.enable(10000, (message) => statsLog.info(message));
  }

  // Signals and the quit key only raise the flag; the loop notices on its next frame
  const cancel = new CancellationFlag();
  const onSignal = () => cancel.cancel();
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const input = new InputHandler();
  input.onAction((action) => {
    if (action === 'quit') cancel.cancel();
  });

  let summary: LoopSummary;
  try {
    summary = await withTerminalSession(
      {
        input: process.stdin,
        output: process.stdout,
        onData: (data) => input.handleInput(data),
        exitEvents: process,
      },
      async (session) => {
        const pump = new OutputPump(process.stdout);
        const loop = new AnimationLoop(
          {
            maxIters: config.maxIters,
            targetFps: config.targetFps,
            seed: config.seed,
            animator: config.animator,
          },
          { output: pump, size: () => session.size(), cancel, stats: perfStats }
        );
        loop.on('slowFrame', ({ frame, cost, budget }: { frame: number; cost: number; budget: number }) => {
          loopLog.debug(`Frame ${frame} took ${(cost * 1000).toFixed(1)}ms (budget ${(budget * 1000).toFixed(1)}ms)`);
        });

        try {
          return await loop.run();
        } finally {
          pump.destroy();
        }
      }
    );
  } catch (error) {
    log.error('Fatal error:', error);
    Sentry.captureException(error);
    await Sentry.flush(2000);
    return 1;
  } finally {
    perfStats.disable();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  console.log(formatExitReport(summary.frames, summary.seconds));
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error);
    Sentry.captureException(error);
    process.exit(1);
  });

import { z } from 'zod';
import {
  DEFAULT_ANIMATOR_CONFIG,
  DEFAULT_MAX_ITERS,
  DEFAULT_SEED,
  DEFAULT_TARGET_FPS,
  type AnimatorConfig,
} from '@julia-drift/protocol';
import type { LogLevel } from './utils/logger.js';

/** Unset and empty variables both fall back to their defaults */
const optional = (value: unknown) => (value === '' ? undefined : value);

const number = (fallback: number) => z.preprocess(optional, z.coerce.number().finite().default(fallback));

const EnvSchema = z.object({
  JULIA_MAX_ITERS: z.preprocess(optional, z.coerce.number().int().min(1).max(100000).default(DEFAULT_MAX_ITERS)),
  JULIA_TARGET_FPS: z.preprocess(optional, z.coerce.number().positive().max(1000).default(DEFAULT_TARGET_FPS)),
  JULIA_SEED: z.preprocess(
    optional,
    z
      .string()
      .trim()
      .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'Expected a decimal or 0x-prefixed hex integer')
      .transform((value) => BigInt(value))
      .optional()
  ),
  JULIA_BASE_RE: number(DEFAULT_ANIMATOR_CONFIG.base.re),
  JULIA_BASE_IM: number(DEFAULT_ANIMATOR_CONFIG.base.im),
  JULIA_RADIUS: z.preprocess(optional, z.coerce.number().positive().finite().default(DEFAULT_ANIMATOR_CONFIG.radius)),
  JULIA_ACCEL: z.preprocess(optional, z.coerce.number().nonnegative().finite().default(DEFAULT_ANIMATOR_CONFIG.accelStrength)),
  // damping * dt must stay <= 1 for dt up to 0.1
  JULIA_DAMPING: z.preprocess(optional, z.coerce.number().min(0).max(10).default(DEFAULT_ANIMATOR_CONFIG.damping)),
  JULIA_PERF_STATS: z.preprocess(
    optional,
    z
      .enum(['true', 'false', '1', '0'])
      .default('false')
      .transform((value) => value === 'true' || value === '1')
  ),
  LOG_LEVEL: z.preprocess(optional, z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')),
  SENTRY_DSN: z.preprocess(optional, z.string().url().optional()),
  NODE_ENV: z.preprocess(optional, z.string().default('development')),
});

export interface AppConfig {
  maxIters: number;
  targetFps: number;
  seed: bigint;
  animator: AnimatorConfig;
  perfStats: boolean;
  logLevel: LogLevel;
  sentryDsn?: string;
  environment: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = result.data;
  return {
    maxIters: e.JULIA_MAX_ITERS,
    targetFps: e.JULIA_TARGET_FPS,
    seed: e.JULIA_SEED ?? DEFAULT_SEED,
    animator: {
      base: { re: e.JULIA_BASE_RE, im: e.JULIA_BASE_IM },
      radius: e.JULIA_RADIUS,
      accelStrength: e.JULIA_ACCEL,
      damping: e.JULIA_DAMPING,
    },
    perfStats: e.JULIA_PERF_STATS,
    logLevel: e.LOG_LEVEL,
    sentryDsn: e.SENTRY_DSN,
    environment: e.NODE_ENV,
  };
}

/**
 * Application Configuration
 *
 * Environment variables validated by the zod schema in `validation.schema.ts`
 * and shaped into a typed AppConfig.
 *
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const timeoutMs = this.configService.get('worker.timeoutMs', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type LogLevel = EnvConfig['LOG_LEVEL'];

export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: LogLevel;
  /**
   * Parallel execution settings.
   *
   * ### timeoutMs (WORKER_TIMEOUT_MS)
   * Budget per worker, measured from its dispatch. A worker that has not
   * reported by then gets a WORKER_TIMEOUT result and is stopped.
   *
   * ### maxConcurrent (MAX_CONCURRENT_WORKERS)
   * Upper bound on simultaneously running workers. `0` starts one worker
   * per file at once; with a bound, extra tasks wait in FIFO order and
   * their timeout starts only when they are dispatched.
   *
   * ### strategy (WORKER_STRATEGY)
   * `thread` runs each file in its own worker thread; `inline` runs it as
   * an async task on the main thread.
   */
  worker: {
    timeoutMs: number;
    maxConcurrent: number;
    strategy: EnvConfig['WORKER_STRATEGY'];
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    worker: {
      timeoutMs: env.WORKER_TIMEOUT_MS,
      maxConcurrent: env.MAX_CONCURRENT_WORKERS,
      strategy: env.WORKER_STRATEGY,
    },
  };
}

export default (): AppConfig => buildConfig(validateEnv(process.env));

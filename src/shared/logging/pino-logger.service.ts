import { LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger, LoggerOptions } from 'pino';
import { AppConfig } from '../../config/configuration';

type PinoMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Root pino logger. Logs go to stderr: stdout carries the run's JSON result.
 */
export function createRootLogger(configService: ConfigService<AppConfig>): Logger {
  const logLevel = configService.get('logLevel', { infer: true }) ?? 'info';
  const nodeEnv = configService.get('nodeEnv', { infer: true });

  const options: LoggerOptions = {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'file-metrics-service',
      env: nodeEnv,
    },
  };

  if (nodeEnv === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

/**
 * Nest LoggerService backed by pino.
 *
 * Accepts both call styles:
 * - pino style: `info({ taskId }, 'message')`
 * - Nest style: `log('message', context)`, `error('message', stack, context)`
 */
export class PinoLoggerService implements LoggerService {
  constructor(
    private readonly logger: Logger,
    private context?: string,
  ) {}

  static fromConfig(configService: ConfigService<AppConfig>): PinoLoggerService {
    return new PinoLoggerService(createRootLogger(configService));
  }

  setContext(context: string): void {
    this.context = context;
  }

  private write(level: PinoMethod, message: unknown, optionalParams: unknown[]): void {
    // Nest appends the context as the last parameter
    const last = optionalParams[optionalParams.length - 1];

    if (isRecord(message)) {
      const [msg] = optionalParams;
      const context = optionalParams.length > 1 && typeof last === 'string' ? last : this.context;
      this.logger[level]({ context, ...message }, typeof msg === 'string' ? msg : '');
      return;
    }

    const context = typeof last === 'string' ? last : this.context;
    const extra = typeof last === 'string' ? optionalParams.slice(0, -1) : optionalParams;
    const trace = level === 'error' && typeof extra[0] === 'string' ? extra[0] : undefined;

    this.logger[level]({ context, ...(trace !== undefined && { trace }) }, String(message));
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  info(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('fatal', message, optionalParams);
  }

  isLevelEnabled(level: PinoMethod): boolean {
    return this.logger.isLevelEnabled(level);
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    return new PinoLoggerService(this.logger.child(bindings), this.context);
  }

  withBatchId(batchId: string): PinoLoggerService {
    return this.child({ batchId });
  }

  withTaskId(taskId: string): PinoLoggerService {
    return this.child({ taskId });
  }
}

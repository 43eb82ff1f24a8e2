import { ConfigService } from '@nestjs/config';
import pino from 'pino';
import { AppConfig } from '../../../src/config/configuration';
import { FileTaskEntity } from '../../../src/domain/entities/file-task.entity';
import { FileTask } from '../../../src/shared/interfaces/file-task.interface';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';

/**
 * Mock Factories for services and common dependencies
 */

export function createTestConfig(worker: Partial<AppConfig['worker']> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'silent',
    worker: {
      timeoutMs: 5000,
      maxConcurrent: 0,
      strategy: 'inline',
      ...worker,
    },
  };
}

export function createConfigService(
  worker: Partial<AppConfig['worker']> = {},
): ConfigService<AppConfig> {
  return new ConfigService<AppConfig>(createTestConfig(worker));
}

/**
 * A real PinoLoggerService writing nowhere
 */
export function createSilentLogger(): PinoLoggerService {
  return new PinoLoggerService(pino({ level: 'silent' }));
}

export function createTask(filePath: string, taskId?: string): FileTask {
  return FileTaskEntity.create({ filePath, taskId });
}

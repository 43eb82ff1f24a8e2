import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  RunSequentialUseCase,
  runSequential,
} from '../../../src/application/use-cases/run-sequential.use-case';
import { FileProcessorPort } from '../../../src/application/ports/output/file-processor.port';
import { LocalFileProcessorAdapter } from '../../../src/infrastructure/adapters/processing/local-file-processor.adapter';
import { failureResult } from '../../../src/processing/file-processor';
import { ExecutionStatus } from '../../../src/shared/interfaces/batch-result.interface';
import { FileTask } from '../../../src/shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingResult,
} from '../../../src/shared/interfaces/processing-result.interface';
import { createTask } from '../helpers/mock-factories';
import {
  SALES_CSV_WITH_BAD_LINE,
  TempDir,
  USERS_JSON,
  createTempDir,
} from '../helpers/temp-files';

describe('RunSequentialUseCase', () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('processes every file in input order', async () => {
    const useCase = new RunSequentialUseCase(new LocalFileProcessorAdapter());
    const tasks = [
      createTask(await temp.write('users.json', USERS_JSON)),
      createTask(await temp.write('sales.csv', SALES_CSV_WITH_BAD_LINE)),
      createTask(temp.pathOf('absent.log')),
    ];
    const seen: string[] = [];

    const result = await useCase.execute({
      tasks,
      batchId: 'seq-1',
      onResult: (entry) => seen.push(entry.result.fileName),
    });

    expect(seen).toEqual(['users.json', 'sales.csv', 'absent.log']);
    expect(result).toMatchObject({
      batchId: 'seq-1',
      successCount: 1,
      partialCount: 1,
      errorCount: 1,
      status: ExecutionStatus.PARTIAL,
    });
    expect(result.entries[1].result.errors).toEqual([
      { line: 2, reason: 'Empty product name', content: '2024-01-02,,Tools,5.00,1,0' },
    ]);
  });

  it('waits for each file before starting the next', async () => {
    let running = 0;
    let maxRunning = 0;
    const processor: FileProcessorPort = {
      async process(task: FileTask): Promise<ProcessingResult> {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return failureResult(task, ProcessingErrorCode.UNKNOWN, 'stub');
      },
    };
    const tasks = [createTask('/in/c.log'), createTask('/in/a.log'), createTask('/in/b.log')];

    const results = await runSequential(tasks, processor);

    expect(maxRunning).toBe(1);
    expect(results.map((result) => result.fileName)).toEqual(['c.log', 'a.log', 'b.log']);
  });

  it('reports a batch where every file failed as an error', async () => {
    const useCase = new RunSequentialUseCase(new LocalFileProcessorAdapter());

    const result = await useCase.execute({
      tasks: [createTask(temp.pathOf('a.csv')), createTask(temp.pathOf('b.json'))],
    });

    expect(result.status).toBe(ExecutionStatus.ERROR);
  });

  it('reports an empty batch as successful', async () => {
    const useCase = new RunSequentialUseCase(new LocalFileProcessorAdapter());

    const result = await useCase.execute({ tasks: [] });

    expect(result).toMatchObject({ entries: [], status: ExecutionStatus.SUCCESS });
  });

  it('accepts a log file of only blank lines as empty', async () => {
    const useCase = new RunSequentialUseCase(new LocalFileProcessorAdapter());
    const task = createTask(await temp.write('quiet.log', '\n\n'));

    const result = await useCase.execute({ tasks: [task] });

    expect(result.entries[0].result).toMatchObject({
      errorCode: ProcessingErrorCode.EMPTY_FILE,
      reason: 'Empty file',
    });
  });
});

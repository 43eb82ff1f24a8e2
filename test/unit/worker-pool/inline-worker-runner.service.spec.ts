import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InlineWorkerRunner } from '../../../src/worker-pool/inline-worker-runner.service';
import { failureResult } from '../../../src/processing/file-processor';
import {
  ProcessingErrorCode,
  ProcessingResult,
  ProcessingStatus,
} from '../../../src/shared/interfaces/processing-result.interface';
import { createSilentLogger, createTask } from '../helpers/mock-factories';
import { SALES_CSV, TempDir, createTempDir } from '../helpers/temp-files';

describe('InlineWorkerRunner', () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('runs the file pipeline on the calling thread', async () => {
    const runner = new InlineWorkerRunner(createSilentLogger());
    const task = createTask(await temp.write('sales.csv', SALES_CSV));

    const result = await runner.run(task);

    expect(runner.strategy).toBe('inline');
    expect(result).toMatchObject({
      fileName: 'sales.csv',
      status: ProcessingStatus.SUCCESS,
      metrics: { totalSales: 43.5 },
    });
  });

  it('converts a throwing pipeline into WORKER_CRASHED', async () => {
    const runner = new InlineWorkerRunner(createSilentLogger(), async () => {
      throw new Error('out of memory');
    });

    const result = await runner.run(createTask('/data/a.log'));

    expect(result).toMatchObject({
      fileName: 'a.log',
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.WORKER_CRASHED,
      reason: 'Worker crashed: out of memory',
    });
  });

  it('settles as aborted when the signal fires mid-flight', async () => {
    const runner = new InlineWorkerRunner(
      createSilentLogger(),
      () => new Promise<ProcessingResult>(() => undefined),
    );
    const controller = new AbortController();

    const pending = runner.run(createTask('/data/a.json'), controller.signal);
    controller.abort();

    expect(await pending).toMatchObject({
      errorCode: ProcessingErrorCode.UNKNOWN,
      reason: 'Worker aborted',
    });
  });

  it('does not start when already aborted', async () => {
    let calls = 0;
    const runner = new InlineWorkerRunner(createSilentLogger(), async (task) => {
      calls++;
      return failureResult(task, ProcessingErrorCode.UNKNOWN, 'unreachable');
    });
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run(createTask('/data/a.csv'), controller.signal);

    expect(result).toMatchObject({ reason: 'Worker aborted before start' });
    expect(calls).toBe(0);
  });
});

/**
 * Use Cases Barrel Export
 */
export { RunSequentialUseCase, runSequential } from './run-sequential.use-case';
export { RunParallelUseCase } from './run-parallel.use-case';
export { RunBenchmarkUseCase, computeBenchmarkStats } from './run-benchmark.use-case';
export {
  ProcessBatchUseCase,
  validateBatchCommand,
  buildSummary,
} from './process-batch.use-case';

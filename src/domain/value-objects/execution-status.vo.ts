import { BatchCounters, ExecutionStatus } from '../../shared/interfaces/batch-result.interface';
import {
  ProcessingResult,
  ProcessingStatus,
} from '../../shared/interfaces/processing-result.interface';

/**
 * Execution Status Value Object
 * Overall flag of a run, derived from outcome states only
 */
export class ExecutionStatusVO {
  private constructor(private readonly _value: ExecutionStatus) {}

  /**
   * No files or all successful → success; all failed → error; anything
   * else → partial.
   */
  static fromCounters(counters: BatchCounters): ExecutionStatusVO {
    const total = counters.successCount + counters.partialCount + counters.errorCount;
    if (counters.successCount === total) {
      return new ExecutionStatusVO(ExecutionStatus.SUCCESS);
    }
    if (counters.errorCount === total) {
      return new ExecutionStatusVO(ExecutionStatus.ERROR);
    }
    return new ExecutionStatusVO(ExecutionStatus.PARTIAL);
  }

  static fromResults(results: readonly ProcessingResult[]): ExecutionStatusVO {
    return ExecutionStatusVO.fromCounters(countOutcomes(results));
  }

  get value(): ExecutionStatus {
    return this._value;
  }
}

export function countOutcomes(results: readonly ProcessingResult[]): BatchCounters {
  return results.reduce<BatchCounters>(
    (counters, result) => {
      switch (result.status) {
        case ProcessingStatus.SUCCESS:
          return { ...counters, successCount: counters.successCount + 1 };
        case ProcessingStatus.PARTIAL_SUCCESS:
          return { ...counters, partialCount: counters.partialCount + 1 };
        case ProcessingStatus.FAILURE:
          return { ...counters, errorCount: counters.errorCount + 1 };
      }
    },
    { successCount: 0, partialCount: 0, errorCount: 0 },
  );
}

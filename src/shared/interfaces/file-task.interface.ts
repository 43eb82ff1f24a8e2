export enum FileFormat {
  CSV = 'csv',
  JSON = 'json',
  LOG = 'log',
  UNKNOWN = 'unknown',
}

/**
 * One file submitted for processing. Plain data so it survives the
 * structured clone into a worker thread.
 */
export interface FileTask {
  readonly taskId: string;
  readonly filePath: string;
  readonly fileName: string;
  readonly extension: string;
  readonly format: FileFormat;
}

export enum ProcessingMode {
  SEQUENTIAL = 'sequential',
  PARALLEL = 'parallel',
  BENCHMARK = 'benchmark',
}

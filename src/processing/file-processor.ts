import { promises as fs } from 'fs';
import { performance } from 'perf_hooks';
import { FileFormat, FileTask } from '../shared/interfaces/file-task.interface';
import {
  FailedProcessingResult,
  ProcessingErrorCode,
  ProcessingResult,
  ProcessingStatus,
} from '../shared/interfaces/processing-result.interface';
import { parseCsv, parseJson, parseLog } from './parsers';

export type FileIdentity = Pick<FileTask, 'filePath' | 'fileName' | 'format'>;

/**
 * Build a failure result for a file whose pipeline never produced metrics
 * (unreadable, unsupported, timed out, crashed worker).
 */
export function failureResult(
  file: FileIdentity,
  errorCode: ProcessingErrorCode,
  reason: string,
  durationMs = 0,
): FailedProcessingResult {
  const base = { fileName: file.fileName, filePath: file.filePath, durationMs };
  const outcome = {
    status: ProcessingStatus.FAILURE as const,
    errorCode,
    reason,
    errors: [],
  };

  switch (file.format) {
    case FileFormat.CSV:
      return { ...base, ...outcome, format: FileFormat.CSV };
    case FileFormat.JSON:
      return { ...base, ...outcome, format: FileFormat.JSON };
    case FileFormat.LOG:
      return { ...base, ...outcome, format: FileFormat.LOG };
    case FileFormat.UNKNOWN:
      return { ...base, ...outcome, format: FileFormat.UNKNOWN };
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readContent(
  task: FileTask,
): Promise<{ ok: true; content: string } | { ok: false; code: ProcessingErrorCode; reason: string }> {
  try {
    return { ok: true, content: await fs.readFile(task.filePath, 'utf8') };
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {
        ok: false,
        code: ProcessingErrorCode.FILE_NOT_FOUND,
        reason: `File not found: ${task.filePath}`,
      };
    }
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      code: ProcessingErrorCode.READ_FAILED,
      reason: `Could not read ${task.filePath}: ${message}`,
    };
  }
}

function analyze(task: FileTask, content: string): ProcessingResult {
  const base = { fileName: task.fileName, filePath: task.filePath, durationMs: 0 };

  switch (task.format) {
    case FileFormat.CSV:
      return { ...base, format: FileFormat.CSV, ...parseCsv(content) };
    case FileFormat.JSON:
      return { ...base, format: FileFormat.JSON, ...parseJson(content) };
    case FileFormat.LOG:
      return { ...base, format: FileFormat.LOG, ...parseLog(content) };
    case FileFormat.UNKNOWN:
      return failureResult(
        task,
        ProcessingErrorCode.UNSUPPORTED_FORMAT,
        unsupportedReason(task),
      );
  }
}

function unsupportedReason(task: FileTask): string {
  return `Unsupported file type: ${task.extension || '(none)'}`;
}

/**
 * The per-file pipeline shared by every execution path: read, dispatch by
 * format, validate, measure. Malformed content never throws; it comes back
 * as a failure or partial result.
 */
export async function processFile(task: FileTask): Promise<ProcessingResult> {
  const startedAt = performance.now();
  const elapsed = () => Math.round(performance.now() - startedAt);

  if (task.format === FileFormat.UNKNOWN) {
    return failureResult(
      task,
      ProcessingErrorCode.UNSUPPORTED_FORMAT,
      unsupportedReason(task),
      elapsed(),
    );
  }

  const read = await readContent(task);
  if (!read.ok) {
    return failureResult(task, read.code, read.reason, elapsed());
  }

  const result = analyze(task, read.content);
  return { ...result, durationMs: elapsed() };
}

import { FileFormat } from './file-task.interface';

export enum ProcessingStatus {
  SUCCESS = 'success',
  PARTIAL_SUCCESS = 'partial_success',
  FAILURE = 'failure',
}

export enum ProcessingErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  READ_FAILED = 'READ_FAILED',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  NO_DATA = 'NO_DATA',
  EMPTY_FILE = 'EMPTY_FILE',
  DECODE_FAILED = 'DECODE_FAILED',
  INVALID_STRUCTURE = 'INVALID_STRUCTURE',
  NO_VALID_RECORDS = 'NO_VALID_RECORDS',
  WORKER_TIMEOUT = 'WORKER_TIMEOUT',
  WORKER_CRASHED = 'WORKER_CRASHED',
  UNKNOWN = 'UNKNOWN',
}

/**
 * A single rejected record. `line` is 1-based: CSV counts data lines (the
 * header is not one), LOG counts physical lines.
 */
export interface LineError {
  line: number;
  reason: string;
  content: string;
}

export interface CsvMetrics {
  validRecords: number;
  invalidRecords: number;
  totalLines: number;
  totalSales: number;
  uniqueProducts: number;
  /** Percentage of data lines accepted, two decimals. */
  successRate: number;
  errorRate: number;
  recommendation: string;
}

export interface JsonMetrics {
  totalUsers: number;
  activeUsers: number;
  totalSessions: number;
  fields: string[];
}

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogMetrics {
  totalLines: number;
  validLines: number;
  invalidLines: number;
  validRate: number;
  invalidRate: number;
  levels: Record<LogLevel, number>;
  recommendation: string;
}

export interface JsonDecodeError {
  type: 'DecodeError';
  position: number | null;
  message: string;
}

interface SuccessOutcome<M> {
  status: ProcessingStatus.SUCCESS;
  metrics: M;
  errors: LineError[];
}

interface PartialOutcome<M> {
  status: ProcessingStatus.PARTIAL_SUCCESS;
  metrics: M;
  errors: LineError[];
}

interface FailureOutcome<M> {
  status: ProcessingStatus.FAILURE;
  errorCode: ProcessingErrorCode;
  reason: string;
  metrics?: M;
  errors: LineError[];
}

/**
 * What a format validator produces for a readable file. The file processor
 * adds the file identity and timing on top.
 */
export type ParseOutcome<M> = SuccessOutcome<M> | PartialOutcome<M> | FailureOutcome<M>;

export type JsonParseOutcome =
  | SuccessOutcome<JsonMetrics>
  | (FailureOutcome<JsonMetrics> & { decodeError?: JsonDecodeError });

interface ResultBase<F extends FileFormat> {
  fileName: string;
  filePath: string;
  format: F;
  durationMs: number;
}

export type CsvProcessingResult = ResultBase<FileFormat.CSV> & ParseOutcome<CsvMetrics>;
export type JsonProcessingResult = ResultBase<FileFormat.JSON> & JsonParseOutcome;
export type LogProcessingResult = ResultBase<FileFormat.LOG> & ParseOutcome<LogMetrics>;
export type UnknownProcessingResult = ResultBase<FileFormat.UNKNOWN> & FailureOutcome<never>;

export type ProcessingResult =
  | CsvProcessingResult
  | JsonProcessingResult
  | LogProcessingResult
  | UnknownProcessingResult;

export type FailedProcessingResult = Extract<ProcessingResult, { status: ProcessingStatus.FAILURE }>;

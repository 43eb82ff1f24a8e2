import {
  LOG_LEVELS,
  LineError,
  LogLevel,
  LogMetrics,
  ParseOutcome,
  ProcessingErrorCode,
  ProcessingStatus,
} from '../../shared/interfaces/processing-result.interface';
import { isBlank, lineError, percentage, splitLines, truncate } from './parsing-utils';

const LOG_LINE_PATTERN =
  /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[(DEBUG|INFO|WARN|ERROR|FATAL)\]/i;

const REASON_PREVIEW_LENGTH = 30;

export const LOG_RECOMMENDATION_VALID = 'Log file is valid';
export const LOG_RECOMMENDATION_REVIEW = 'Review format of invalid lines';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level of a well-formed log line, or null when the line does not match
 * `YYYY-MM-DD HH:MM:SS [LEVEL]`.
 */
export function matchLogLine(line: string): LogLevel | null {
  const match = LOG_LINE_PATTERN.exec(line);
  if (!match) return null;

  const level = match[1].toUpperCase();
  return isLogLevel(level) ? level : null;
}

export function emptyLevelCounts(): Record<LogLevel, number> {
  return { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 };
}

export function parseLog(content: string): ParseOutcome<LogMetrics> {
  const levels = emptyLevelCounts();
  const errors: LineError[] = [];
  let totalLines = 0;

  splitLines(content).forEach((line, index) => {
    if (isBlank(line)) return;
    totalLines++;

    const level = matchLogLine(line);
    if (level === null) {
      errors.push(
        lineError(index + 1, `Invalid format: ${truncate(line, REASON_PREVIEW_LENGTH)}`, line),
      );
      return;
    }
    levels[level]++;
  });

  if (totalLines === 0) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.EMPTY_FILE,
      reason: 'Empty file',
      errors: [],
    };
  }

  const validLines = totalLines - errors.length;
  const metrics: LogMetrics = {
    totalLines,
    validLines,
    invalidLines: errors.length,
    validRate: percentage(validLines, totalLines),
    invalidRate: percentage(errors.length, totalLines),
    levels,
    recommendation: errors.length > 0 ? LOG_RECOMMENDATION_REVIEW : LOG_RECOMMENDATION_VALID,
  };

  if (errors.length === 0) {
    return { status: ProcessingStatus.SUCCESS, metrics, errors };
  }

  if (validLines === 0) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.NO_VALID_RECORDS,
      reason: `All ${totalLines} lines are invalid`,
      metrics,
      errors,
    };
  }

  return { status: ProcessingStatus.PARTIAL_SUCCESS, metrics, errors };
}

import {
  JsonDecodeError,
  JsonParseOutcome,
  ProcessingErrorCode,
  ProcessingStatus,
} from '../../shared/interfaces/processing-result.interface';

export const USERS_FIELD = 'usuarios';
export const SESSIONS_FIELD = 'sesiones';
export const ACTIVE_FLAG = 'activo';

const POSITION_PATTERN = /position\s*(\d+)/i;
const END_OF_INPUT_PATTERN = /end of (?:json )?input/i;
const UNEXPECTED_TOKEN_PATTERN = /^Unexpected token '(.)'/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when `prefix` could be the start of a valid document: it decodes, or
 * the decoder only complains about reaching its end.
 */
function isValidPrefix(prefix: string): boolean {
  try {
    JSON.parse(prefix);
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (END_OF_INPUT_PATTERN.test(message)) return true;
    const match = POSITION_PATTERN.exec(message);
    return match !== null && Number(match[1]) >= prefix.length;
  }
}

/**
 * Index of the reported token that ends the longest valid prefix. Prefix
 * validity is monotonic, so the occurrences are binary searched.
 */
function locateUnexpectedToken(token: string, content: string): number | null {
  const occurrences: number[] = [];
  for (let index = content.indexOf(token); index !== -1; index = content.indexOf(token, index + 1)) {
    occurrences.push(index);
  }

  let low = 0;
  let high = occurrences.length - 1;
  let found: number | null = null;
  while (low <= high) {
    const middle = Math.floor((low + high) / 2);
    if (isValidPrefix(content.slice(0, occurrences[middle]))) {
      found = occurrences[middle];
      low = middle + 1;
    } else {
      high = middle - 1;
    }
  }
  return found;
}

/**
 * Best-effort location of a syntax error, read from the decoder message:
 * an explicit position, the end of the document for an unexpected end of
 * input, or the offending token located in the content.
 */
export function extractErrorPosition(message: string, content: string): number | null {
  const match = POSITION_PATTERN.exec(message);
  if (match) return Number(match[1]);
  if (END_OF_INPUT_PATTERN.test(message)) return content.length;

  const token = UNEXPECTED_TOKEN_PATTERN.exec(message);
  if (token) return locateUnexpectedToken(token[1], content);
  return null;
}

function decode(content: string): { ok: true; value: unknown } | { ok: false; error: JsonDecodeError } {
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: {
        type: 'DecodeError',
        position: extractErrorPosition(message, content),
        message,
      },
    };
  }
}

function readArrayField(
  document: Record<string, unknown>,
  field: string,
): { ok: true; items: unknown[] } | { ok: false } {
  const value = document[field];
  if (value === undefined) return { ok: true, items: [] };
  if (Array.isArray(value)) return { ok: true, items: value };
  return { ok: false };
}

/**
 * Users/sessions snapshot. The whole document either decodes or the file
 * fails; there is no per-line recovery for JSON.
 */
export function parseJson(content: string): JsonParseOutcome {
  const decoded = decode(content);
  if (!decoded.ok) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.DECODE_FAILED,
      reason: 'Malformed JSON',
      decodeError: decoded.error,
      errors: [],
    };
  }

  const document = decoded.value;
  if (!isPlainObject(document)) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.INVALID_STRUCTURE,
      reason: 'JSON root must be an object',
      errors: [],
    };
  }

  const users = readArrayField(document, USERS_FIELD);
  const sessions = readArrayField(document, SESSIONS_FIELD);
  if (!users.ok || !sessions.ok) {
    const field = users.ok ? SESSIONS_FIELD : USERS_FIELD;
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.INVALID_STRUCTURE,
      reason: `Field "${field}" must be an array`,
      errors: [],
    };
  }

  const activeUsers = users.items.filter(
    (user) => isPlainObject(user) && user[ACTIVE_FLAG] === true,
  ).length;

  return {
    status: ProcessingStatus.SUCCESS,
    metrics: {
      totalUsers: users.items.length,
      activeUsers,
      totalSessions: sessions.items.length,
      fields: Object.keys(document),
    },
    errors: [],
  };
}

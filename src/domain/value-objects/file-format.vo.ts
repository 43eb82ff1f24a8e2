import * as path from 'path';
import { FileFormat } from '../../shared/interfaces/file-task.interface';

const FORMAT_BY_EXTENSION: Record<string, FileFormat> = {
  '.csv': FileFormat.CSV,
  '.json': FileFormat.JSON,
  '.log': FileFormat.LOG,
};

/**
 * File Format Value Object
 * Format inferred from the file extension, case-insensitively
 */
export class FileFormatVO {
  private constructor(
    private readonly _value: FileFormat,
    private readonly _extension: string,
  ) {}

  static fromPath(filePath: string): FileFormatVO {
    return FileFormatVO.fromExtension(path.extname(filePath));
  }

  static fromExtension(extension: string): FileFormatVO {
    const normalized = extension.toLowerCase();
    return new FileFormatVO(FORMAT_BY_EXTENSION[normalized] ?? FileFormat.UNKNOWN, extension);
  }

  get value(): FileFormat {
    return this._value;
  }

  get extension(): string {
    return this._extension;
  }

  isSupported(): boolean {
    return this._value !== FileFormat.UNKNOWN;
  }

  equals(other: FileFormatVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

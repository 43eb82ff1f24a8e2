import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FileTask } from '../../shared/interfaces/file-task.interface';
import { FileFormatVO } from '../value-objects/file-format.vo';

/**
 * File Task Entity - one file submitted for processing.
 *
 * Kept as plain frozen data (no attached methods) because tasks are posted
 * to worker threads, and structured clone drops functions.
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace FileTaskEntity {
  export interface CreateProps {
    filePath: string;
    taskId?: string;
  }

  export function create(props: CreateProps): FileTask {
    validate(props);

    const format = FileFormatVO.fromPath(props.filePath);
    return Object.freeze({
      taskId: props.taskId ?? uuidv4(),
      filePath: props.filePath,
      fileName: path.basename(props.filePath),
      extension: format.extension,
      format: format.value,
    });
  }

  /**
   * One task per path, in the given order. Duplicate paths get distinct tasks.
   */
  export function fromPaths(filePaths: readonly string[]): FileTask[] {
    return filePaths.map((filePath) => create({ filePath }));
  }

  function validate(props: CreateProps): void {
    if (props.filePath.trim() === '') {
      throw new Error('filePath is required');
    }
    if (props.taskId !== undefined && props.taskId.trim() === '') {
      throw new Error('taskId must not be empty');
    }
  }
}

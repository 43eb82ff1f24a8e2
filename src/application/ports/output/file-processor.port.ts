import { FileTask } from '../../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../../shared/interfaces/processing-result.interface';

/**
 * File Processor Port (Driven Port)
 * The per-file pipeline used by the sequential path
 */
export interface FileProcessorPort {
  process(task: FileTask): Promise<ProcessingResult>;
}

import { Injectable } from '@nestjs/common';
import { FileProcessorPort } from '../../../application/ports/output/file-processor.port';
import { processFile } from '../../../processing/file-processor';
import { FileTask } from '../../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../../shared/interfaces/processing-result.interface';

/**
 * Local File Processor Adapter
 * Runs the file pipeline against the local filesystem
 */
@Injectable()
export class LocalFileProcessorAdapter implements FileProcessorPort {
  process(task: FileTask): Promise<ProcessingResult> {
    return processFile(task);
  }
}

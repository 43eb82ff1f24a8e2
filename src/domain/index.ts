/**
 * Domain Layer Barrel Export
 */

// Entities
export { FileTaskEntity } from './entities/file-task.entity';
export {
  BatchRunEntity,
  type BatchRunEntityData,
  type BatchRunState,
} from './entities/batch-run.entity';

// Value Objects
export { FileFormatVO } from './value-objects/file-format.vo';
export { ExecutionStatusVO, countOutcomes } from './value-objects/execution-status.vo';

// Events
export * from './events';

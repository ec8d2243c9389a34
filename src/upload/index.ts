/**
 * Upload orchestration
 * @module dataverse-direct-upload/upload
 */

export {
  UploadUnit,
  FileDescriptorSchema,
  type FileDescriptor,
  type UnitStatus,
} from './unit.js';
export { selectStrategy, transferChunks, type UploadStrategy } from './strategy.js';
export { DatasetFileIndex, type DuplicateDecision } from './duplicates.js';
export { WorkerPool, type PoolStats } from './pool.js';
export { UnitRunner, type UploadResult, type UnitRunnerDependencies } from './runner.js';
export {
  DirectUploadOrchestrator,
  type DirectUploadRequest,
  type BatchUploadResult,
  type OrchestratorOptions,
} from './orchestrator.js';

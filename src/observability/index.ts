/**
 * Observability for direct uploads
 * @module dataverse-direct-upload/observability
 */

export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  redactText,
  redactContext,
  DEFAULT_LOG_CONFIG,
  type Logger,
  type LogLevel,
  type LogConfig,
} from './logging.js';

export {
  NOOP_PROGRESS_OBSERVER,
  RecordingProgressObserver,
  guardObserver,
  type ProgressEvent,
  type ProgressEventType,
  type ProgressObserver,
} from './progress.js';

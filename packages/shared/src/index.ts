/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type SchedulerMode } from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractTextTask,
  type ExtractTransactionsTask,
  type PipelineTask,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  queueNameForTask,
  type WorkerOptions,
} from './queues';

// Scheduling
export {
  InlineTaskScheduler,
  DetachedTaskScheduler,
  QueueTaskScheduler,
  type TaskScheduler,
  type TaskHandler,
  type TaskQueues,
} from './scheduler';

// Metrics
export {
  register,
  queueDepthGauge,
  stageDurationHistogram,
  stagesProcessedCounter,
  backendExtractionsCounter,
  backendDurationHistogram,
  transactionsExtractedCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateLlmTransaction, type ValidationResult } from './schemas';

// Persistence
export type { RecordStore, FileStore } from './store';

// Templates
export {
  TRANSACTION_EXTRACTION_TEMPLATE,
  VISION_TRANSCRIPTION_TEMPLATE,
  VISION_TRANSCRIPTION_SCHEMA,
  renderTemplate,
  type PromptTemplate,
  type RenderedPrompt,
} from './templates';

// Pipeline
export * from './pipeline';

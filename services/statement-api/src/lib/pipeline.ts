/**
 * Pipeline Wiring
 *
 * Builds the orchestrator over the production collaborators. The scheduler
 * is chosen by SCHEDULER_MODE: `in_process` runs stages detached in the API
 * process, `queue` hands them to the BullMQ worker.
 */

import type { Queue } from 'bullmq';
import {
  config,
  createQueue,
  logger,
  DetachedTaskScheduler,
  ProcessingOrchestrator,
  QueueTaskScheduler,
  QUEUE_NAMES,
  TextExtractionAdapter,
  TransactionParser,
  type PipelineTask,
  type SchedulerMode,
  type TaskQueues,
  type TaskScheduler,
} from '@ledgerline/shared';
import { createPool, PgRecordStore } from './db';
import { LocalFileStore } from './files';
import { createOpenAiClient, OpenAiLanguageModelClient } from './llm';
import { PdfLayoutBackend } from './pdf';
import { OpenAiVisionBackend } from './vision';

export interface Pipeline {
  orchestrator: ProcessingOrchestrator;
  store: PgRecordStore;
  /** Present in queue mode */
  queues: TaskQueues | null;
  /** Wait for in-process tasks, then release connections */
  close(): Promise<void>;
}

export function createTaskQueues(): TaskQueues {
  return {
    [QUEUE_NAMES.EXTRACT_TEXT]: createQueue<PipelineTask, void>(QUEUE_NAMES.EXTRACT_TEXT),
    [QUEUE_NAMES.EXTRACT_TRANSACTIONS]: createQueue<PipelineTask, void>(
      QUEUE_NAMES.EXTRACT_TRANSACTIONS
    ),
  };
}

export function listQueues(queues: TaskQueues): Array<{ name: string; queue: Queue }> {
  return Object.entries(queues).map(([name, queue]) => ({ name, queue }));
}

export function createPipeline(mode: SchedulerMode = config.schedulerMode): Pipeline {
  const pool = createPool();
  const store = new PgRecordStore(pool);
  const openai = createOpenAiClient();

  const adapter = new TextExtractionAdapter({
    layout: new PdfLayoutBackend(),
    vision: new OpenAiVisionBackend(openai),
    layoutTimeoutMs: config.layoutTimeoutMs,
    visionTimeoutMs: config.visionTimeoutMs,
  });

  const parser = new TransactionParser(store, new OpenAiLanguageModelClient(openai), {
    maxInputChars: config.llmMaxInputChars,
    requestTimeoutMs: config.llmRequestTimeoutMs,
    defaultConfidence: config.defaultLlmConfidence,
  });

  const queues = mode === 'queue' ? createTaskQueues() : null;
  let detached: DetachedTaskScheduler | null = null;
  let scheduler: TaskScheduler;
  if (queues) {
    scheduler = new QueueTaskScheduler(queues);
  } else {
    detached = new DetachedTaskScheduler();
    scheduler = detached;
  }

  const orchestrator = new ProcessingOrchestrator({
    store,
    files: new LocalFileStore(),
    adapter,
    parser,
    scheduler,
    maxUploadBytes: config.maxUploadBytes,
  });

  logger.info('Pipeline created', { schedulerMode: mode });

  return {
    orchestrator,
    store,
    queues,
    async close() {
      if (detached) {
        logger.info('Waiting for in-flight tasks', { pending: detached.pending });
        await detached.onIdle();
      }
      if (queues) {
        await Promise.all(Object.values(queues).map((q) => q.close()));
      }
      await pool.end();
    },
  };
}

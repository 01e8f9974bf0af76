/**
 * Pipeline Worker
 *
 * Consumes the extract_text and extract_transactions queues (SCHEDULER_MODE=queue)
 * and runs each task through the same orchestrator entry point the
 * in-process scheduler uses. Follow-up stages are enqueued again.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  serveMetrics,
  reportQueueMetrics,
  QUEUE_NAMES,
  type PipelineTask,
} from '@ledgerline/shared';
import { createPipeline, listQueues } from './lib/pipeline';

const pipeline = createPipeline('queue');

/**
 * Run one task. runTask() records failures on the documents itself, so the
 * job only fails if the process cannot reach its stores at all.
 */
async function processTask(job: Job<PipelineTask, void>): Promise<void> {
  logger.info('Processing task', { jobId: job.id, task: job.data.type });
  await pipeline.orchestrator.runTask(job.data);
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort, async () => {
  if (pipeline.queues) {
    await reportQueueMetrics(listQueues(pipeline.queues));
  }
});

// Create and start the workers
const workers = [
  createWorker<PipelineTask, void>(QUEUE_NAMES.EXTRACT_TEXT, processTask),
  createWorker<PipelineTask, void>(QUEUE_NAMES.EXTRACT_TRANSACTIONS, processTask),
];

logger.info('Pipeline worker started');

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await Promise.all(workers.map((w) => w.close()));
  metricsServer.close();
  await pipeline.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

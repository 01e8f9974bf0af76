/**
 * Task Scheduling
 *
 * Stages never run on the request path. The orchestrator hands each
 * follow-up stage to a TaskScheduler:
 * - InlineTaskScheduler: runs before submit() resolves (tests)
 * - DetachedTaskScheduler: same process, off the request path
 * - QueueTaskScheduler: BullMQ job consumed by the worker process
 */

import type { Queue } from 'bullmq';
import { logger } from './logger';
import { runWithContextAsync } from './context';
import { queueNameForTask, type PipelineTask, type QueueName } from './queues';

export type TaskHandler = (task: PipelineTask) => Promise<void>;

export interface TaskScheduler {
  submit(task: PipelineTask): Promise<void>;
  /** Called once by the orchestrator with its task entry point */
  attach(handler: TaskHandler): void;
}

abstract class HandlerScheduler implements TaskScheduler {
  private handler: TaskHandler | null = null;

  attach(handler: TaskHandler): void {
    this.handler = handler;
  }

  protected requireHandler(): TaskHandler {
    if (!this.handler) {
      throw new Error('Scheduler has no task handler attached');
    }
    return this.handler;
  }

  abstract submit(task: PipelineTask): Promise<void>;
}

export class InlineTaskScheduler extends HandlerScheduler {
  async submit(task: PipelineTask): Promise<void> {
    const handler = this.requireHandler();
    await runWithContextAsync({ correlationId: task.correlation_id }, () => handler(task));
  }
}

export class DetachedTaskScheduler extends HandlerScheduler {
  private readonly inFlight = new Set<Promise<void>>();

  async submit(task: PipelineTask): Promise<void> {
    const handler = this.requireHandler();
    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => runWithContextAsync({ correlationId: task.correlation_id }, () => handler(task)))
      .catch((err: unknown) => {
        logger.error('Detached task failed', err, { task: task.type });
      });
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every task (including ones scheduled by running tasks) has settled */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}

export type TaskQueues = Record<QueueName, Queue<PipelineTask, void>>;

export class QueueTaskScheduler implements TaskScheduler {
  constructor(private readonly queues: TaskQueues) {}

  async submit(task: PipelineTask): Promise<void> {
    const queueName = queueNameForTask(task);
    await this.queues[queueName].add(task.type, task);
    logger.info('Task enqueued', { queue: queueName });
  }

  attach(_handler: TaskHandler): void {
    // The worker process consumes the queue and calls the orchestrator directly
  }
}

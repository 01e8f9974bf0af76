/**
 * Statement API
 *
 * Upload statement PDFs, follow their processing and read back the
 * extracted transactions and summaries.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
} from '@ledgerline/shared';
import { createPipeline, listQueues } from './lib/pipeline';
import { createRouter, errorHandler } from './lib/routes';

const pipeline = createPipeline();
const app = express();

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.header('x-correlation-id') || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const routePath: unknown = req.route?.path;
    const path = typeof routePath === 'string' ? routePath : req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    await pipeline.store.ping();

    res.json({
      status: 'healthy',
      service: 'statement-api',
      database: 'connected',
      scheduler: config.schedulerMode,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'statement-api',
      database: 'disconnected',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  try {
    if (pipeline.queues) {
      await reportQueueMetrics(listQueues(pipeline.queues));
    }
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  } catch (error) {
    logger.error('Metrics scrape failed', error);
    res.status(500).end();
  }
});

app.use(createRouter(pipeline.orchestrator));
app.use(errorHandler);

// Start server
const server = app.listen(config.port, () => {
  logger.info('Statement API started', { port: config.port, schedulerMode: config.schedulerMode });
});

// Graceful shutdown: stop accepting requests, let detached tasks finish
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
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

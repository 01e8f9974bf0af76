/**
 * HTTP Routes
 *
 * Thin mapping from HTTP onto orchestrator operations. Errors are forwarded
 * to errorHandler, which renders the error envelope.
 */

import path from 'path';
import express, { Request, Response, NextFunction, Router } from 'express';
import {
  config,
  logger,
  isPipelineError,
  InvalidRequestError,
  type DocumentFilter,
  type ErrorEnvelope,
  type ProcessingOrchestrator,
} from '@ledgerline/shared';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handlers; forward them to next() */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function uploadFilename(req: Request): string {
  const header = req.header('x-filename');
  return header ? path.basename(header) : 'statement.pdf';
}

export function createRouter(orchestrator: ProcessingOrchestrator): Router {
  const router = express.Router();

  /**
   * POST /statements/:statement_id/documents
   * Raw PDF body; X-Filename and X-User-Id headers. Extraction is scheduled.
   */
  router.post(
    '/statements/:statement_id/documents',
    express.raw({ type: ['application/pdf', 'application/octet-stream'], limit: config.maxUploadBytes }),
    route(async (req, res) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new InvalidRequestError('Expected an application/pdf request body');
      }
      const doc = await orchestrator.upload(
        { bytes: body, originalFilename: uploadFilename(req) },
        req.params.statement_id,
        req.header('x-user-id') ?? ''
      );
      res.status(202).json(doc);
    })
  );

  /**
   * GET /documents?statement_id=&user_id=
   */
  router.get(
    '/documents',
    route(async (req, res) => {
      const filter: DocumentFilter = {
        statement_id: queryString(req.query.statement_id),
        user_id: queryString(req.query.user_id),
      };
      res.json({ items: await orchestrator.listDocuments(filter) });
    })
  );

  router.get(
    '/documents/:document_id',
    route(async (req, res) => {
      res.json(await orchestrator.getDocument(req.params.document_id));
    })
  );

  router.delete(
    '/documents/:document_id',
    route(async (req, res) => {
      await orchestrator.deleteDocument(req.params.document_id);
      res.status(204).end();
    })
  );

  router.post(
    '/documents/:document_id/extract-text',
    route(async (req, res) => {
      res.status(202).json(await orchestrator.triggerExtraction(req.params.document_id));
    })
  );

  router.get(
    '/documents/:document_id/text',
    route(async (req, res) => {
      res.json(await orchestrator.getDocumentText(req.params.document_id));
    })
  );

  router.get(
    '/documents/:document_id/comparison',
    route(async (req, res) => {
      res.json(await orchestrator.getExtractionComparison(req.params.document_id));
    })
  );

  /**
   * GET /statements/:statement_id/transactions
   * Newest transaction date first, undated rows last
   */
  router.get(
    '/statements/:statement_id/transactions',
    route(async (req, res) => {
      const statementId = req.params.statement_id;
      res.json({ statement_id: statementId, items: await orchestrator.getTransactions(statementId) });
    })
  );

  /**
   * POST /statements/:statement_id/extract-transactions
   * Schedules parsing; responds with the rows stored before this run.
   */
  router.post(
    '/statements/:statement_id/extract-transactions',
    route(async (req, res) => {
      const statementId = req.params.statement_id;
      const items = await orchestrator.triggerTransactionExtraction(statementId);
      res.status(202).json({ statement_id: statementId, status: 'scheduled', items });
    })
  );

  router.delete(
    '/statements/:statement_id/transactions',
    route(async (req, res) => {
      const statementId = req.params.statement_id;
      const deleted = await orchestrator.deleteTransactions(statementId);
      res.json({ statement_id: statementId, deleted });
    })
  );

  router.get(
    '/transactions/:transaction_id',
    route(async (req, res) => {
      res.json(await orchestrator.getTransaction(req.params.transaction_id));
    })
  );

  router.delete(
    '/transactions/:transaction_id',
    route(async (req, res) => {
      await orchestrator.deleteTransaction(req.params.transaction_id);
      res.status(204).end();
    })
  );

  router.get(
    '/statements/:statement_id/transactions/summary',
    route(async (req, res) => {
      res.json(await orchestrator.getSummary(req.params.statement_id));
    })
  );

  return router;
}

function isBodyTooLarge(err: unknown): boolean {
  return err instanceof Error && 'type' in err && err.type === 'entity.too.large';
}

/**
 * Render any error as the error envelope
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const header = res.getHeader('X-Correlation-Id');
  const correlationId = typeof header === 'string' ? header : '';

  let status = 500;
  let code = 'internal_error';
  let message = 'Internal server error';

  if (isPipelineError(err)) {
    status = err.httpStatus;
    code = err.code;
    message = err.message;
  } else if (isBodyTooLarge(err)) {
    status = 413;
    code = 'payload_too_large';
    message = `File exceeds the ${config.maxUploadBytes} byte limit`;
  }

  if (status >= 500) {
    logger.error('Request failed', err, { method: req.method, path: req.path });
  } else {
    logger.warn('Request rejected', { method: req.method, path: req.path, code, message });
  }

  const envelope: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationId },
  };
  res.status(status).json(envelope);
}

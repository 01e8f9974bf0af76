/**
 * Processing Orchestrator
 *
 * Owns the per-document state machine
 *
 *   UPLOADED -> EXTRACTING -> EXTRACTED -> PARSING -> DONE
 *
 * and the operations the HTTP layer calls. Stages run through the
 * TaskScheduler, never on the request path. A stage never throws past
 * runTask(): unexpected errors set the completion flag, record the error
 * and move the document to DONE.
 */

import { v4 as uuidv4 } from 'uuid';
import { getCorrelationId, runWithContextAsync } from '../context';
import { logger } from '../logger';
import { stageDurationHistogram, stagesProcessedCounter } from '../metrics';
import {
  ConflictError,
  InvalidRequestError,
  NotFoundError,
  StorageFailureError,
  errorMessage,
} from '../errors';
import type { PipelineTask } from '../queues';
import type { TaskScheduler } from '../scheduler';
import type { FileStore, RecordStore } from '../store';
import type {
  DocumentFilter,
  DocumentRecord,
  DocumentText,
  ExtractionComparison,
  StatementSummary,
  Transaction,
} from '../types';
import type { TextExtractionAdapter } from './extraction-adapter';
import type { TransactionParser } from './transaction-parser';
import { compareExtractions, reconcile, storedResult } from './reconciler';
import { summarize } from './summary';

const PDF_MAGIC = Buffer.from('%PDF');

export interface UploadedFile {
  bytes: Buffer;
  originalFilename: string;
}

export interface OrchestratorDeps {
  store: RecordStore;
  files: FileStore;
  adapter: TextExtractionAdapter;
  parser: TransactionParser;
  scheduler: TaskScheduler;
  maxUploadBytes: number;
}

export function looksLikePdf(file: UploadedFile): boolean {
  return (
    file.originalFilename.toLowerCase().endsWith('.pdf') ||
    file.bytes.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)
  );
}

export class ProcessingOrchestrator {
  private readonly store: RecordStore;
  private readonly files: FileStore;
  private readonly adapter: TextExtractionAdapter;
  private readonly parser: TransactionParser;
  private readonly scheduler: TaskScheduler;
  private readonly maxUploadBytes: number;
  /** Tail of each statement's upload chain */
  private readonly uploadLocks = new Map<string, Promise<void>>();

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.files = deps.files;
    this.adapter = deps.adapter;
    this.parser = deps.parser;
    this.scheduler = deps.scheduler;
    this.maxUploadBytes = deps.maxUploadBytes;
    this.scheduler.attach((task) => this.runTask(task));
  }

  // ==========================================================================
  // Request operations
  // ==========================================================================

  /**
   * Store the PDF, create the document (UPLOADED) and schedule extraction.
   * Returns the new record without waiting for extraction.
   */
  async upload(file: UploadedFile, statementId: string, userId: string): Promise<DocumentRecord> {
    if (!statementId.trim()) throw new InvalidRequestError('statement_id is required');
    if (!userId.trim()) throw new InvalidRequestError('user_id is required');
    if (file.bytes.length === 0) throw new InvalidRequestError('Uploaded file is empty');
    if (file.bytes.length > this.maxUploadBytes) {
      throw new InvalidRequestError(
        `File size ${file.bytes.length} exceeds the ${this.maxUploadBytes} byte limit`
      );
    }
    if (!looksLikePdf(file)) {
      throw new InvalidRequestError('Only PDF files are accepted');
    }

    return this.withStatementLock(statementId, () => this.createDocument(file, statementId, userId));
  }

  /** Runs under the statement's upload lock: check, store, create, schedule */
  private async createDocument(
    file: UploadedFile,
    statementId: string,
    userId: string
  ): Promise<DocumentRecord> {
    const existing = await this.store.listDocuments({ statement_id: statementId });
    const inFlight = existing.find((d) => d.processing_status !== 'DONE');
    if (inFlight) {
      throw new ConflictError(
        `Document ${inFlight.id} of statement ${statementId} is still ${inFlight.processing_status}`
      );
    }

    let locator: string;
    try {
      locator = await this.files.save(file.bytes, file.originalFilename);
    } catch (err) {
      throw new StorageFailureError(`Failed to store file: ${errorMessage(err)}`, { cause: err });
    }

    let doc: DocumentRecord;
    try {
      doc = await this.store.createDocument({
        id: uuidv4(),
        user_id: userId,
        statement_id: statementId,
        original_filename: file.originalFilename,
        file_locator: locator,
        file_size: file.bytes.length,
      });
    } catch (err) {
      await this.removeFileQuietly(locator);
      throw new StorageFailureError(`Failed to create document record: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    logger.info('Document uploaded', {
      documentId: doc.id,
      statementId,
      fileSize: doc.file_size,
    });

    await this.schedule({ type: 'extract_text', correlation_id: getCorrelationId(), document_id: doc.id });
    return doc;
  }

  async getDocument(documentId: string): Promise<DocumentRecord> {
    return this.requireDocument(documentId);
  }

  async listDocuments(filter: DocumentFilter): Promise<DocumentRecord[]> {
    return this.store.listDocuments(filter);
  }

  async getDocumentText(documentId: string): Promise<DocumentText> {
    const doc = await this.requireDocument(documentId);
    return {
      document_id: doc.id,
      text_processing_completed: doc.text_processing_completed,
      text_processing_error: doc.text_processing_error,
      layout: storedResult(doc, 'layout'),
      vision: storedResult(doc, 'vision'),
    };
  }

  async getExtractionComparison(documentId: string): Promise<ExtractionComparison> {
    return compareExtractions(await this.requireDocument(documentId));
  }

  /**
   * Re-run extraction from any state. The document is reset to EXTRACTING
   * before the task is scheduled; returns the current record.
   */
  async triggerExtraction(documentId: string): Promise<DocumentRecord> {
    await this.requireDocument(documentId);
    await this.markExtracting(documentId);
    await this.schedule({ type: 'extract_text', correlation_id: getCorrelationId(), document_id: documentId });
    return this.requireDocument(documentId);
  }

  /**
   * Re-run transaction parsing for a statement whose text has been extracted.
   * Returns the transactions stored at the time of the call.
   */
  async triggerTransactionExtraction(statementId: string): Promise<Transaction[]> {
    const docs = await this.requireStatement(statementId);
    if (!docs.some((d) => d.text_processing_completed)) {
      throw new ConflictError(`Text extraction has not completed for statement ${statementId}`);
    }
    const current = await this.store.listTransactions(statementId);
    await this.schedule({
      type: 'extract_transactions',
      correlation_id: getCorrelationId(),
      statement_id: statementId,
    });
    return current;
  }

  async getTransactions(statementId: string): Promise<Transaction[]> {
    await this.requireStatement(statementId);
    return this.store.listTransactions(statementId);
  }

  async getSummary(statementId: string): Promise<StatementSummary> {
    await this.requireStatement(statementId);
    return summarize(statementId, await this.store.listTransactions(statementId));
  }

  async getTransaction(transactionId: string): Promise<Transaction> {
    const transaction = await this.store.getTransaction(transactionId);
    if (!transaction) {
      throw new NotFoundError(`Transaction ${transactionId} not found`);
    }
    return transaction;
  }

  async deleteTransaction(transactionId: string): Promise<void> {
    if (!(await this.store.deleteTransaction(transactionId))) {
      throw new NotFoundError(`Transaction ${transactionId} not found`);
    }
    logger.info('Transaction deleted', { transactionId });
  }

  async deleteTransactions(statementId: string): Promise<number> {
    await this.requireStatement(statementId);
    const deleted = await this.store.deleteTransactions(statementId);
    logger.info('Transactions deleted', { statementId, deleted });
    return deleted;
  }

  /**
   * Remove the stored file, the transactions the document produced and the
   * document record.
   */
  async deleteDocument(documentId: string): Promise<void> {
    const doc = await this.requireDocument(documentId);
    try {
      await this.files.remove(doc.file_locator);
    } catch (err) {
      throw new StorageFailureError(`Failed to remove file: ${errorMessage(err)}`, { cause: err });
    }
    const transactions = await this.store.deleteTransactionsForDocument(documentId);
    await this.store.deleteDocument(documentId);
    logger.info('Document deleted', { documentId, transactions });
  }

  // ==========================================================================
  // Background stages
  // ==========================================================================

  /**
   * Scheduler entry point. Never rejects.
   */
  async runTask(task: PipelineTask): Promise<void> {
    if (task.type === 'extract_text') {
      await runWithContextAsync(
        { correlationId: task.correlation_id, documentId: task.document_id },
        () => this.timeStage(task.type, () => this.runExtraction(task.document_id))
      );
    } else {
      await runWithContextAsync(
        { correlationId: task.correlation_id, statementId: task.statement_id },
        () => this.timeStage(task.type, () => this.runParsing(task.statement_id))
      );
    }
  }

  private async timeStage(stage: PipelineTask['type'], fn: () => Promise<boolean>): Promise<void> {
    const startTime = Date.now();
    const ok = await fn();
    const status = ok ? 'success' : 'failed';
    stageDurationHistogram.observe({ stage, status }, (Date.now() - startTime) / 1000);
    stagesProcessedCounter.inc({ stage, status });
  }

  /** Returns false when the stage ended in a recorded failure */
  private async runExtraction(documentId: string): Promise<boolean> {
    try {
      const doc = await this.store.getDocument(documentId);
      if (!doc) {
        logger.warn('Document vanished before extraction');
        return false;
      }

      await this.markExtracting(documentId);
      logger.info('Text extraction started');

      const bytes = await this.files.read(doc.file_locator);
      const pair = await this.adapter.extractBoth(bytes);
      const updated = await reconcile(this.store, documentId, pair);

      logger.info('Text extraction completed', {
        layoutSuccess: pair.layout.success,
        visionSuccess: pair.vision.success,
        error: updated.text_processing_error,
      });

      // schedule() records its own failure on the statement's documents
      await this.schedule({
        type: 'extract_transactions',
        correlation_id: getCorrelationId(),
        statement_id: updated.statement_id,
      }).catch((err: unknown) => {
        logger.warn('Transaction parsing not scheduled', { error: errorMessage(err) });
      });
      return pair.layout.success || pair.vision.success;
    } catch (err) {
      logger.error('Text extraction failed', err);
      await this.recordFailure(documentId, {
        text_processing_completed: true,
        text_processing_error: errorMessage(err),
      });
      return false;
    }
  }

  private async runParsing(statementId: string): Promise<boolean> {
    const all = await this.store.listDocuments({ statement_id: statementId }).catch((err: unknown) => {
      logger.error('Could not load statement documents', err);
      return [];
    });
    // Documents still extracting are parsed once their own extraction finishes
    const docs = all.filter((d) => d.text_processing_completed);
    if (docs.length === 0) {
      logger.warn('Statement has no extracted documents to parse', { documents: all.length });
      return false;
    }

    try {
      for (const doc of docs) {
        await this.store.updateDocument(doc.id, {
          processing_status: 'PARSING',
          transaction_processing_completed: false,
          transaction_processing_error: null,
        });
      }
      logger.info('Transaction parsing started', { documents: docs.length });

      const outcome = await this.parser.parseStatement(statementId);

      for (const result of outcome.documents) {
        await this.store.updateDocument(result.document_id, {
          processing_status: 'DONE',
          transaction_processing_completed: true,
          transaction_processing_error: result.error,
        });
      }

      logger.info('Transaction parsing completed', {
        transactions: outcome.transactions.length,
        replaced: outcome.replaced,
        error: outcome.processing_error,
      });
      return outcome.processing_error === null;
    } catch (err) {
      logger.error('Transaction parsing failed', err);
      for (const doc of docs) {
        await this.recordFailure(doc.id, {
          transaction_processing_completed: true,
          transaction_processing_error: errorMessage(err),
        });
      }
      return false;
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async schedule(task: PipelineTask): Promise<void> {
    try {
      await this.scheduler.submit(task);
    } catch (err) {
      logger.error('Failed to schedule task', err, { task: task.type });
      const failure = `Failed to schedule ${task.type}: ${errorMessage(err)}`;
      if (task.type === 'extract_text') {
        await this.recordFailure(task.document_id, {
          text_processing_completed: true,
          text_processing_error: failure,
        });
      } else {
        const docs = await this.store.listDocuments({ statement_id: task.statement_id });
        for (const doc of docs) {
          await this.recordFailure(doc.id, {
            transaction_processing_completed: true,
            transaction_processing_error: failure,
          });
        }
      }
      throw err;
    }
  }

  /**
   * Run `fn` after every earlier upload to the same statement has settled,
   * so the in-flight check and the insert are never interleaved.
   */
  private async withStatementLock<T>(statementId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.uploadLocks.get(statementId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.uploadLocks.set(statementId, tail);
    try {
      return await run;
    } finally {
      if (this.uploadLocks.get(statementId) === tail) {
        this.uploadLocks.delete(statementId);
      }
    }
  }

  private async markExtracting(documentId: string): Promise<void> {
    await this.store.updateDocument(documentId, {
      processing_status: 'EXTRACTING',
      text_processing_completed: false,
      text_processing_error: null,
    });
  }

  /** Move a document to DONE with the failure recorded; logs if even that fails */
  private async recordFailure(
    documentId: string,
    update:
      | { text_processing_completed: true; text_processing_error: string }
      | { transaction_processing_completed: true; transaction_processing_error: string }
  ): Promise<void> {
    try {
      await this.store.updateDocument(documentId, { ...update, processing_status: 'DONE' });
    } catch (err) {
      logger.error('Could not record stage failure', err, { documentId });
    }
  }

  private async removeFileQuietly(locator: string): Promise<void> {
    try {
      await this.files.remove(locator);
    } catch (err) {
      logger.error('Could not remove orphaned file', err, { locator });
    }
  }

  private async requireDocument(documentId: string): Promise<DocumentRecord> {
    const doc = await this.store.getDocument(documentId);
    if (!doc) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    return doc;
  }

  private async requireStatement(statementId: string): Promise<DocumentRecord[]> {
    const docs = await this.store.listDocuments({ statement_id: statementId });
    if (docs.length === 0) {
      throw new NotFoundError(`Statement ${statementId} not found`);
    }
    return docs;
  }
}

/**
 * Postgres Record Store
 *
 * Documents and transactions over `pg`. The statement's transaction set is
 * swapped inside one BEGIN/COMMIT so readers never see a partial set.
 */

import { Pool } from 'pg';
import { validate as isUuid } from 'uuid';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type DocumentFilter,
  type DocumentRecord,
  type DocumentUpdate,
  type NewDocumentRecord,
  type NewTransaction,
  type ProcessingStatus,
  type RecordStore,
  type Transaction,
  type TransactionSource,
} from '@ledgerline/shared';

export function createPool(): Pool {
  return new Pool({
    connectionString: process.env.DATABASE_URL || config.databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

// ============================================================================
// Row shapes as returned by pg
// ============================================================================

// Type aliases (not interfaces) so they satisfy pg's QueryResultRow constraint
type DocumentRow = {
  id: string;
  user_id: string;
  statement_id: string;
  original_filename: string;
  file_locator: string;
  file_size: number;
  uploaded_at: Date;
  updated_at: Date;
  processing_status: ProcessingStatus;
  layout_text: string | null;
  layout_word_count: number;
  layout_page_count: number;
  layout_extraction_success: boolean;
  layout_extraction_error: string | null;
  vision_text: string | null;
  vision_word_count: number;
  vision_page_count: number;
  vision_extraction_success: boolean;
  vision_extraction_error: string | null;
  vision_confidence: number | null;
  text_processing_completed: boolean;
  text_processing_error: string | null;
  transaction_processing_completed: boolean;
  transaction_processing_error: string | null;
};

type TransactionRow = {
  id: string;
  statement_id: string;
  document_id: string;
  /** to_char'd in SQL so no timezone shift */
  transaction_date: string | null;
  description: string;
  /** NUMERIC arrives as a string */
  amount: string;
  transaction_type: string | null;
  balance: string | null;
  reference_number: string | null;
  category: string;
  extraction_source: TransactionSource;
  confidence_score: number;
  llm_raw_response: string | null;
  processing_completed: boolean;
  processing_error: string | null;
  created_at: Date;
};

function toDocument(row: DocumentRow): DocumentRecord {
  return {
    ...row,
    uploaded_at: row.uploaded_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    ...row,
    amount: Number(row.amount),
    balance: row.balance === null ? null : Number(row.balance),
    created_at: row.created_at.toISOString(),
  };
}

const TRANSACTION_COLUMNS = `
  id, statement_id, document_id,
  to_char(transaction_date, 'YYYY-MM-DD') AS transaction_date,
  description, amount, transaction_type, balance, reference_number, category,
  extraction_source, confidence_score, llm_raw_response,
  processing_completed, processing_error, created_at`;

/** Columns an update may touch; keys outside this set are ignored */
const UPDATABLE_DOCUMENT_COLUMNS: ReadonlySet<string> = new Set([
  'user_id',
  'statement_id',
  'original_filename',
  'file_locator',
  'file_size',
  'processing_status',
  'layout_text',
  'layout_word_count',
  'layout_page_count',
  'layout_extraction_success',
  'layout_extraction_error',
  'vision_text',
  'vision_word_count',
  'vision_page_count',
  'vision_extraction_success',
  'vision_extraction_error',
  'vision_confidence',
  'text_processing_completed',
  'text_processing_error',
  'transaction_processing_completed',
  'transaction_processing_error',
]);

export class PgRecordStore implements RecordStore {
  constructor(private readonly pool: Pool) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  async createDocument(doc: NewDocumentRecord): Promise<DocumentRecord> {
    return this.timed('create_document', async () => {
      const result = await this.pool.query<DocumentRow>(
        `INSERT INTO documents (id, user_id, statement_id, original_filename, file_locator, file_size)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING *`,
        [doc.id, doc.user_id, doc.statement_id, doc.original_filename, doc.file_locator, doc.file_size]
      );
      return toDocument(result.rows[0]);
    });
  }

  // Postgres rejects a malformed UUID literal; such an id simply does not exist
  async getDocument(id: string): Promise<DocumentRecord | null> {
    if (!isUuid(id)) return null;
    return this.timed('get_document', async () => {
      const result = await this.pool.query<DocumentRow>('SELECT * FROM documents WHERE id = $1', [id]);
      return result.rows.length > 0 ? toDocument(result.rows[0]) : null;
    });
  }

  async listDocuments(filter: DocumentFilter): Promise<DocumentRecord[]> {
    return this.timed('list_documents', async () => {
      const conditions: string[] = [];
      const params: string[] = [];
      if (filter.statement_id !== undefined) {
        params.push(filter.statement_id);
        conditions.push(`statement_id = $${params.length}`);
      }
      if (filter.user_id !== undefined) {
        params.push(filter.user_id);
        conditions.push(`user_id = $${params.length}`);
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      const result = await this.pool.query<DocumentRow>(
        `SELECT * FROM documents ${where} ORDER BY uploaded_at DESC, id`,
        params
      );
      return result.rows.map(toDocument);
    });
  }

  async updateDocument(id: string, update: DocumentUpdate): Promise<DocumentRecord | null> {
    const entries = Object.entries(update).filter(
      ([column, value]) => UPDATABLE_DOCUMENT_COLUMNS.has(column) && value !== undefined
    );
    if (entries.length === 0) {
      return this.getDocument(id);
    }

    return this.timed('update_document', async () => {
      const assignments = entries.map(([column], i) => `${column} = $${i + 2}`);
      const result = await this.pool.query<DocumentRow>(
        `UPDATE documents SET ${assignments.join(', ')}, updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [id, ...entries.map(([, value]) => value)]
      );
      return result.rows.length > 0 ? toDocument(result.rows[0]) : null;
    });
  }

  async deleteDocument(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    return this.timed('delete_document', async () => {
      const result = await this.pool.query('DELETE FROM documents WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  async listTransactions(statementId: string): Promise<Transaction[]> {
    return this.timed('list_transactions', async () => {
      const result = await this.pool.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS}
         FROM transactions
         WHERE statement_id = $1
         ORDER BY transaction_date DESC NULLS LAST, created_at, id`,
        [statementId]
      );
      return result.rows.map(toTransaction);
    });
  }

  async getTransaction(id: string): Promise<Transaction | null> {
    if (!isUuid(id)) return null;
    return this.timed('get_transaction', async () => {
      const result = await this.pool.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = $1`,
        [id]
      );
      return result.rows.length > 0 ? toTransaction(result.rows[0]) : null;
    });
  }

  async deleteTransaction(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    return this.timed('delete_transaction', async () => {
      const result = await this.pool.query('DELETE FROM transactions WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async replaceTransactions(statementId: string, rows: NewTransaction[]): Promise<Transaction[]> {
    const client = await this.pool.connect();
    const startTime = Date.now();

    try {
      await client.query('BEGIN');
      const deleted = await client.query('DELETE FROM transactions WHERE statement_id = $1', [
        statementId,
      ]);

      for (const row of rows) {
        await client.query(
          `INSERT INTO transactions (
             id, statement_id, document_id, transaction_date, description, amount,
             transaction_type, balance, reference_number, category, extraction_source,
             confidence_score, llm_raw_response, processing_completed, processing_error
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
          [
            row.id,
            statementId,
            row.document_id,
            row.transaction_date,
            row.description,
            row.amount,
            row.transaction_type,
            row.balance,
            row.reference_number,
            row.category,
            row.extraction_source,
            row.confidence_score,
            row.llm_raw_response,
            row.processing_completed,
            row.processing_error,
          ]
        );
      }

      await client.query('COMMIT');

      const duration = (Date.now() - startTime) / 1000;
      dbQueryDurationHistogram.observe({ operation: 'replace_transactions' }, duration);
      logger.info('Replaced statement transactions', {
        deleted: deleted.rowCount ?? 0,
        inserted: rows.length,
        duration_seconds: duration,
      });
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error('Failed to replace transactions', error);
      throw error;
    } finally {
      client.release();
    }

    return this.listTransactions(statementId);
  }

  async deleteTransactions(statementId: string): Promise<number> {
    return this.timed('delete_transactions', async () => {
      const result = await this.pool.query('DELETE FROM transactions WHERE statement_id = $1', [
        statementId,
      ]);
      return result.rowCount ?? 0;
    });
  }

  async deleteTransactionsForDocument(documentId: string): Promise<number> {
    return this.timed('delete_document_transactions', async () => {
      const result = await this.pool.query('DELETE FROM transactions WHERE document_id = $1', [
        documentId,
      ]);
      return result.rowCount ?? 0;
    });
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}

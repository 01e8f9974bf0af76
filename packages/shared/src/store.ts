/**
 * Persistence Interfaces
 *
 * RecordStore holds documents and transactions; FileStore holds the uploaded
 * PDF bytes. The statement-api service implements both (Postgres, local
 * disk); tests use in-memory versions.
 */

import type {
  DocumentFilter,
  DocumentRecord,
  DocumentUpdate,
  NewDocumentRecord,
  NewTransaction,
  Transaction,
} from './types';

export interface RecordStore {
  createDocument(doc: NewDocumentRecord): Promise<DocumentRecord>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  listDocuments(filter: DocumentFilter): Promise<DocumentRecord[]>;
  /** Returns the updated record, or null when the document no longer exists */
  updateDocument(id: string, update: DocumentUpdate): Promise<DocumentRecord | null>;
  deleteDocument(id: string): Promise<boolean>;

  /** Ordered by transaction_date descending, undated rows last */
  listTransactions(statementId: string): Promise<Transaction[]>;
  getTransaction(id: string): Promise<Transaction | null>;
  deleteTransaction(id: string): Promise<boolean>;
  /** Atomically swap the statement's transaction set for `rows` */
  replaceTransactions(statementId: string, rows: NewTransaction[]): Promise<Transaction[]>;
  deleteTransactions(statementId: string): Promise<number>;
  deleteTransactionsForDocument(documentId: string): Promise<number>;

  /** Connectivity probe for /health */
  ping(): Promise<void>;
}

export interface FileStore {
  /** Store bytes, return an opaque locator */
  save(bytes: Buffer, originalFilename: string): Promise<string>;
  read(locator: string): Promise<Buffer>;
  /** Missing files are not an error */
  remove(locator: string): Promise<void>;
}

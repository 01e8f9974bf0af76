/**
 * Shared TypeScript Types
 *
 * Types for the statement processing pipeline: documents, extraction results,
 * transactions and the per-statement summary. Field names match the
 * `documents` / `transactions` tables and the HTTP payloads.
 */

// ============================================================================
// Documents
// ============================================================================

export type ProcessingStatus = 'UPLOADED' | 'EXTRACTING' | 'EXTRACTED' | 'PARSING' | 'DONE';

export type ExtractionMethod = 'layout' | 'vision';

export interface DocumentRecord {
  id: string;
  user_id: string;
  statement_id: string;
  original_filename: string;
  file_locator: string;
  file_size: number;
  uploaded_at: string;
  updated_at: string;
  processing_status: ProcessingStatus;

  // Layout-aware text extraction
  layout_text: string | null;
  layout_word_count: number;
  layout_page_count: number;
  layout_extraction_success: boolean;
  layout_extraction_error: string | null;

  // Vision model transcription
  vision_text: string | null;
  vision_word_count: number;
  vision_page_count: number;
  vision_extraction_success: boolean;
  vision_extraction_error: string | null;
  /** 0-100 */
  vision_confidence: number | null;

  text_processing_completed: boolean;
  text_processing_error: string | null;
  transaction_processing_completed: boolean;
  transaction_processing_error: string | null;
}

export type NewDocumentRecord = Pick<
  DocumentRecord,
  'id' | 'user_id' | 'statement_id' | 'original_filename' | 'file_locator' | 'file_size'
>;

export type DocumentUpdate = Partial<Omit<DocumentRecord, 'id' | 'uploaded_at' | 'updated_at'>>;

export interface DocumentFilter {
  statement_id?: string;
  user_id?: string;
}

// ============================================================================
// Text Extraction
// ============================================================================

/** Raw output of one extraction backend */
export interface BackendOutput {
  text: string;
  page_count: number;
  confidence?: number;
}

export interface ExtractionResult {
  method: ExtractionMethod;
  success: boolean;
  text: string | null;
  word_count: number;
  page_count: number;
  error: string | null;
  /** Vision only, 0-100 */
  confidence: number | null;
}

export interface ExtractionPair {
  layout: ExtractionResult;
  vision: ExtractionResult;
}

export interface ExtractionSide {
  present: boolean;
  success: boolean;
  word_count: number;
  page_count: number;
  text_length: number;
  error: string | null;
}

export interface ExtractionComparison {
  document_id: string;
  layout: ExtractionSide;
  vision: ExtractionSide;
  vision_confidence: number | null;
  /** vision minus layout */
  word_count_delta: number;
  /** Jaccard overlap of lowercase word sets, only when both backends succeeded */
  similarity: number | null;
}

export interface DocumentText {
  document_id: string;
  text_processing_completed: boolean;
  text_processing_error: string | null;
  layout: ExtractionResult;
  vision: ExtractionResult;
}

// ============================================================================
// Transactions
// ============================================================================

export type TransactionSource = 'layout' | 'vision' | 'language_model';

export interface Transaction {
  id: string;
  statement_id: string;
  document_id: string;
  /** ISO YYYY-MM-DD */
  transaction_date: string | null;
  description: string;
  /** Negative = debit */
  amount: number;
  transaction_type: string | null;
  balance: number | null;
  reference_number: string | null;
  category: string;
  extraction_source: TransactionSource;
  /** 0-1 */
  confidence_score: number;
  llm_raw_response: string | null;
  processing_completed: boolean;
  processing_error: string | null;
  created_at: string;
}

export type NewTransaction = Omit<Transaction, 'created_at'>;

export interface DocumentParseResult {
  document_id: string;
  /** Whether the model response for this document could be read */
  parsed: boolean;
  transaction_count: number;
  error: string | null;
}

export interface ParseOutcome {
  statement_id: string;
  transactions: NewTransaction[];
  processing_error: string | null;
  documents: DocumentParseResult[];
  /** False when every document failed and the previous rows were kept */
  replaced: boolean;
}

// ============================================================================
// Summary
// ============================================================================

export interface CategoryTotal {
  count: number;
  amount: number;
}

export interface StatementSummary {
  statement_id: string;
  total_transactions: number;
  total_credits: number;
  total_debits: number;
  net_amount: number;
  categories: Record<string, CategoryTotal>;
  date_range: { earliest: string; latest: string } | null;
}

// ============================================================================
// HTTP
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

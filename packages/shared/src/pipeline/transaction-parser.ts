/**
 * Transaction Parser
 *
 * Turns a statement's extracted text into Transaction rows with one language
 * model call per document. Per-document failures (no text, model error,
 * unreadable response) are reported in the outcome rather than thrown, and
 * an item that fails validation becomes a placeholder row with
 * processing_completed=false.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter, transactionsExtractedCounter } from '../metrics';
import { validateLlmTransaction } from '../schemas';
import { NoTextAvailableError, NotFoundError, ModelResponseUnparseableError, errorMessage } from '../errors';
import { TRANSACTION_EXTRACTION_TEMPLATE, renderTemplate, type RenderedPrompt } from '../templates';
import type { RecordStore } from '../store';
import type {
  DocumentParseResult,
  DocumentRecord,
  ExtractionMethod,
  NewTransaction,
  ParseOutcome,
} from '../types';
import { withTimeout } from './extraction-adapter';
import { parseModelResponse } from './response-parser';
import { categorize, FALLBACK_CATEGORY, getCategoryTable, type CategoryTable } from './categories';
import {
  cleanText,
  normalizeSign,
  normalizeTransactionType,
  parseAmount,
  parseTransactionDate,
  resolveConfidence,
} from './normalize';

export const TRUNCATION_MARKER = '[TEXT TRUNCATED]';
const MAX_DESCRIPTION_LENGTH = 500;
const MAX_FIELD_LENGTH = 255;
const MAX_TYPE_LENGTH = 50;
/** Amounts and balances are stored as NUMERIC(14, 2) */
const MAX_ABS_AMOUNT = 1e12;

export interface LanguageModelClient {
  readonly model: string;
  /** Returns the raw completion text */
  complete(prompt: RenderedPrompt): Promise<string>;
}

export interface TransactionParserOptions {
  maxInputChars: number;
  requestTimeoutMs: number;
  defaultConfidence: number;
  categoryTable?: CategoryTable;
}

export interface SelectedText {
  text: string;
  source: ExtractionMethod;
}

/**
 * Vision text when that backend succeeded with non-blank output, else the
 * layout text, else null.
 */
export function selectText(doc: DocumentRecord): SelectedText | null {
  if (doc.vision_extraction_success && doc.vision_text && doc.vision_text.trim()) {
    return { text: doc.vision_text, source: 'vision' };
  }
  if (doc.layout_text && doc.layout_text.trim()) {
    return { text: doc.layout_text, source: 'layout' };
  }
  return null;
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n\n${TRUNCATION_MARKER}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

interface RowContext {
  statementId: string;
  documentId: string;
  rawResponse: string;
  responseConfidence: unknown;
}

export class TransactionParser {
  constructor(
    private readonly store: RecordStore,
    private readonly llm: LanguageModelClient,
    private readonly options: TransactionParserOptions
  ) {}

  /**
   * Parse every document of the statement whose text extraction has
   * completed. When at least one document's response could be read, the
   * statement's rows are replaced by the union of those documents' rows;
   * otherwise the existing rows are left in place.
   */
  async parseStatement(statementId: string): Promise<ParseOutcome> {
    const all = await this.store.listDocuments({ statement_id: statementId });
    if (all.length === 0) {
      throw new NotFoundError(`Statement ${statementId} has no documents`);
    }
    // A document being re-extracted still carries its previous text
    const documents = all.filter((d) => d.text_processing_completed);

    const transactions: NewTransaction[] = [];
    const results: DocumentParseResult[] = [];

    for (const doc of documents) {
      const { rows, result } = await this.parseDocument(statementId, doc);
      transactions.push(...rows);
      results.push(result);
    }

    const replaced = results.some((r) => r.parsed);
    if (replaced) {
      await this.store.replaceTransactions(statementId, transactions);
    } else {
      logger.warn('No document produced a readable response; keeping existing transactions', {
        documents: documents.length,
      });
    }

    const errors = results
      .filter((r) => r.error !== null)
      .map((r) => `${r.document_id}: ${r.error}`);

    transactionsExtractedCounter.inc(
      { status: 'completed' },
      transactions.filter((t) => t.processing_completed).length
    );
    transactionsExtractedCounter.inc(
      { status: 'failed' },
      transactions.filter((t) => !t.processing_completed).length
    );

    return {
      statement_id: statementId,
      transactions: replaced ? transactions : [],
      processing_error: errors.length > 0 ? errors.join('; ') : null,
      documents: results,
      replaced,
    };
  }

  private async parseDocument(
    statementId: string,
    doc: DocumentRecord
  ): Promise<{ rows: NewTransaction[]; result: DocumentParseResult }> {
    const fail = (error: Error): { rows: NewTransaction[]; result: DocumentParseResult } => {
      logger.warn('Transaction parsing failed for document', {
        documentId: doc.id,
        errorCode: error.name,
        error: error.message,
      });
      return {
        rows: [],
        result: { document_id: doc.id, parsed: false, transaction_count: 0, error: error.message },
      };
    };

    const selected = selectText(doc);
    if (!selected) {
      return fail(new NoTextAvailableError('No extracted text available'));
    }

    const prompt = renderTemplate(TRANSACTION_EXTRACTION_TEMPLATE, {
      original_filename: doc.original_filename,
      statement_text: truncateText(selected.text, this.options.maxInputChars),
    });

    let raw: string;
    try {
      raw = await this.callModel(prompt);
    } catch (err) {
      return fail(err instanceof Error ? err : new Error(errorMessage(err)));
    }

    const parsed = parseModelResponse(raw);
    if (!parsed.ok) {
      return fail(new ModelResponseUnparseableError(parsed.error));
    }

    const context: RowContext = {
      statementId,
      documentId: doc.id,
      rawResponse: raw,
      responseConfidence: parsed.confidence,
    };
    const rows = parsed.items.map((item, index) => this.buildRow(item, index, context));

    logger.info('Transactions parsed from document', {
      documentId: doc.id,
      textSource: selected.source,
      items: parsed.items.length,
      failedItems: rows.filter((r) => !r.processing_completed).length,
    });

    return {
      rows,
      result: { document_id: doc.id, parsed: true, transaction_count: rows.length, error: null },
    };
  }

  private async callModel(prompt: RenderedPrompt): Promise<string> {
    const model = this.llm.model;
    const startTime = Date.now();
    try {
      const raw = await withTimeout(
        this.llm.complete(prompt),
        this.options.requestTimeoutMs,
        `${TRANSACTION_EXTRACTION_TEMPLATE.name} model call`
      );
      llmRequestsCounter.inc({ model, status: 'success' });
      return raw;
    } catch (err) {
      llmRequestsCounter.inc({ model, status: 'error' });
      throw err;
    } finally {
      llmRequestDurationHistogram.observe({ model }, (Date.now() - startTime) / 1000);
    }
  }

  private buildRow(item: unknown, index: number, context: RowContext): NewTransaction {
    const validation = validateLlmTransaction(item);
    if (!validation.valid || !isRecord(item)) {
      const reason = `invalid transaction item: ${(validation.errors ?? ['not an object']).join(', ')}`;
      return this.placeholderRow(index, reason, context);
    }

    const description = cleanText(item.description, MAX_DESCRIPTION_LENGTH);
    if (!description) {
      return this.placeholderRow(index, 'missing description', context);
    }

    const rawAmount = parseAmount(item.amount);
    if (rawAmount === null) {
      return this.placeholderRow(index, `unparseable amount: ${JSON.stringify(item.amount)}`, context);
    }
    if (Math.abs(rawAmount) >= MAX_ABS_AMOUNT) {
      return this.placeholderRow(index, `amount out of range: ${rawAmount}`, context);
    }

    const date = parseTransactionDate(item.transaction_date);
    if (date.reason) {
      logger.warn('Transaction date not recognised, storing null', {
        item: index,
        reason: date.reason,
      });
    }

    const transactionType =
      normalizeTransactionType(item.transaction_type)?.slice(0, MAX_TYPE_LENGTH) ?? null;
    const balance = parseAmount(item.balance);

    return {
      id: uuidv4(),
      statement_id: context.statementId,
      document_id: context.documentId,
      transaction_date: date.date,
      description,
      amount: normalizeSign(rawAmount, transactionType),
      transaction_type: transactionType,
      balance: balance !== null && Math.abs(balance) < MAX_ABS_AMOUNT ? balance : null,
      reference_number: cleanText(item.reference_number, MAX_FIELD_LENGTH),
      category: categorize(description, item.category, this.categoryTable()),
      extraction_source: 'language_model',
      confidence_score: resolveConfidence(
        item.confidence,
        context.responseConfidence,
        this.options.defaultConfidence
      ),
      llm_raw_response: context.rawResponse,
      processing_completed: true,
      processing_error: null,
    };
  }

  private placeholderRow(index: number, reason: string, context: RowContext): NewTransaction {
    logger.warn('Transaction item rejected', { item: index, reason });
    return {
      id: uuidv4(),
      statement_id: context.statementId,
      document_id: context.documentId,
      transaction_date: null,
      description: `Failed to process transaction ${index}: ${reason}`.slice(0, MAX_DESCRIPTION_LENGTH),
      amount: 0,
      transaction_type: null,
      balance: null,
      reference_number: null,
      category: FALLBACK_CATEGORY,
      extraction_source: 'language_model',
      confidence_score: 0,
      llm_raw_response: context.rawResponse,
      processing_completed: false,
      processing_error: reason,
    };
  }

  private categoryTable(): CategoryTable {
    return this.options.categoryTable ?? getCategoryTable();
  }
}

/**
 * Pipeline Core
 */

export {
  TextExtractionAdapter,
  countWords,
  withTimeout,
  type TextExtractionBackend,
  type ExtractionAdapterOptions,
} from './extraction-adapter';
export {
  reconcile,
  extractionFields,
  combinedError,
  storedResult,
  compareExtractions,
  textSimilarity,
} from './reconciler';
export { parseModelResponse, type ParsedModelResponse } from './response-parser';
export {
  DATE_FORMATS,
  DEBIT_LIKE_TYPES,
  CREDIT_LIKE_TYPES,
  parseTransactionDate,
  parseAmount,
  normalizeTransactionType,
  normalizeSign,
  resolveConfidence,
  cleanText,
  type DateParseResult,
} from './normalize';
export {
  FALLBACK_CATEGORY,
  categorize,
  getCategoryTable,
  parseCategoryTable,
  type CategoryRule,
  type CategoryTable,
} from './categories';
export {
  TransactionParser,
  TRUNCATION_MARKER,
  selectText,
  truncateText,
  type LanguageModelClient,
  type TransactionParserOptions,
  type SelectedText,
} from './transaction-parser';
export { summarize } from './summary';
export {
  ProcessingOrchestrator,
  looksLikePdf,
  type UploadedFile,
  type OrchestratorDeps,
} from './orchestrator';

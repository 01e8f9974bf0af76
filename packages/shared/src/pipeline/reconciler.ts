/**
 * Extraction Reconciler
 *
 * Persists both backends' results side by side. No winner is chosen here:
 * the transaction parser decides which text to use, and the comparison view
 * reports how far the two backends agree.
 */

import type { RecordStore } from '../store';
import { NotFoundError } from '../errors';
import type {
  DocumentRecord,
  DocumentUpdate,
  ExtractionComparison,
  ExtractionMethod,
  ExtractionPair,
  ExtractionResult,
  ExtractionSide,
} from '../types';

/**
 * Map a backend pair onto the document's per-backend columns
 */
export function extractionFields(pair: ExtractionPair): DocumentUpdate {
  const { layout, vision } = pair;
  return {
    layout_text: layout.text,
    layout_word_count: layout.word_count,
    layout_page_count: layout.page_count,
    layout_extraction_success: layout.success,
    layout_extraction_error: layout.error,

    vision_text: vision.text,
    vision_word_count: vision.word_count,
    vision_page_count: vision.page_count,
    vision_extraction_success: vision.success,
    vision_extraction_error: vision.error,
    vision_confidence: vision.confidence,
  };
}

export function combinedError(pair: ExtractionPair): string | null {
  if (pair.layout.success || pair.vision.success) return null;
  return `layout: ${pair.layout.error}; vision: ${pair.vision.error}`;
}

/**
 * Write both results and mark text processing complete (status EXTRACTED)
 */
export async function reconcile(
  store: RecordStore,
  documentId: string,
  pair: ExtractionPair
): Promise<DocumentRecord> {
  const updated = await store.updateDocument(documentId, {
    ...extractionFields(pair),
    text_processing_completed: true,
    text_processing_error: combinedError(pair),
    processing_status: 'EXTRACTED',
  });
  if (!updated) {
    throw new NotFoundError(`Document ${documentId} not found`);
  }
  return updated;
}

/**
 * Read one backend's stored result back off the document
 */
export function storedResult(doc: DocumentRecord, method: ExtractionMethod): ExtractionResult {
  if (method === 'layout') {
    return {
      method,
      success: doc.layout_extraction_success,
      text: doc.layout_text,
      word_count: doc.layout_word_count,
      page_count: doc.layout_page_count,
      error: doc.layout_extraction_error,
      confidence: null,
    };
  }
  return {
    method,
    success: doc.vision_extraction_success,
    text: doc.vision_text,
    word_count: doc.vision_word_count,
    page_count: doc.vision_page_count,
    error: doc.vision_extraction_error,
    confidence: doc.vision_confidence,
  };
}

function side(result: ExtractionResult): ExtractionSide {
  return {
    present: result.text !== null && result.text.trim().length > 0,
    success: result.success,
    word_count: result.word_count,
    page_count: result.page_count,
    text_length: result.text?.length ?? 0,
    error: result.error,
  };
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Jaccard overlap of the two texts' lowercase word sets, rounded to 3 places
 */
export function textSimilarity(a: string, b: string): number {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  const union = new Set([...wordsA, ...wordsB]);
  if (union.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  return Math.round((intersection / union.size) * 1000) / 1000;
}

export function compareExtractions(doc: DocumentRecord): ExtractionComparison {
  const layout = storedResult(doc, 'layout');
  const vision = storedResult(doc, 'vision');

  const similarity =
    layout.success && vision.success && layout.text !== null && vision.text !== null
      ? textSimilarity(layout.text, vision.text)
      : null;

  return {
    document_id: doc.id,
    layout: side(layout),
    vision: side(vision),
    vision_confidence: doc.vision_confidence,
    word_count_delta: vision.word_count - layout.word_count,
    similarity,
  };
}

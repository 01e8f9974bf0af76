/**
 * Extraction Reconciler Tests
 */

import {
  reconcile,
  compareExtractions,
  textSimilarity,
  countWords,
  type ExtractionPair,
  type ExtractionResult,
} from '@ledgerline/shared';
import { MemoryRecordStore, seedDocument } from './fakes';

function ok(method: 'layout' | 'vision', text: string, confidence: number | null = null): ExtractionResult {
  return {
    method,
    success: true,
    text,
    word_count: countWords(text),
    page_count: 1,
    error: null,
    confidence,
  };
}

function failed(method: 'layout' | 'vision', error: string): ExtractionResult {
  return {
    method,
    success: false,
    text: null,
    word_count: 0,
    page_count: 0,
    error,
    confidence: null,
  };
}

describe('reconcile', () => {
  it('persists both results verbatim and completes text processing', async () => {
    const store = new MemoryRecordStore();
    await seedDocument(store, 'doc-1', 'stmt-1', { processing_status: 'EXTRACTING' });
    const pair: ExtractionPair = {
      layout: ok('layout', 'Coffee Shop 4.50'),
      vision: ok('vision', 'coffee shop 4.50 balance', 91),
    };

    const doc = await reconcile(store, 'doc-1', pair);

    expect(doc.processing_status).toBe('EXTRACTED');
    expect(doc.text_processing_completed).toBe(true);
    expect(doc.text_processing_error).toBeNull();
    expect(doc.layout_text).toBe('Coffee Shop 4.50');
    expect(doc.layout_word_count).toBe(3);
    expect(doc.vision_text).toBe('coffee shop 4.50 balance');
    expect(doc.vision_word_count).toBe(4);
    expect(doc.vision_confidence).toBe(91);
  });

  it('combines both errors when both backends failed', async () => {
    const store = new MemoryRecordStore();
    await seedDocument(store, 'doc-1', 'stmt-1');

    const doc = await reconcile(store, 'doc-1', {
      layout: failed('layout', 'No text produced'),
      vision: failed('vision', 'vision extraction timed out after 20ms'),
    });

    expect(doc.text_processing_completed).toBe(true);
    expect(doc.text_processing_error).toBe(
      'layout: No text produced; vision: vision extraction timed out after 20ms'
    );
    expect(doc.layout_extraction_success).toBe(false);
    expect(doc.vision_extraction_success).toBe(false);
  });

  it('rejects with NotFoundError for an unknown document', async () => {
    const store = new MemoryRecordStore();

    await expect(
      reconcile(store, 'missing', { layout: ok('layout', 'a'), vision: ok('vision', 'b') })
    ).rejects.toMatchObject({ code: 'not_found', httpStatus: 404 });
  });
});

describe('compareExtractions', () => {
  it('reports word delta and similarity when both succeeded', async () => {
    const store = new MemoryRecordStore();
    await seedDocument(store, 'doc-1', 'stmt-1');
    const doc = await reconcile(store, 'doc-1', {
      layout: ok('layout', 'Coffee Shop 4.50'),
      vision: ok('vision', 'coffee shop 4.50 balance', 91),
    });

    const comparison = compareExtractions(doc);

    expect(comparison).toEqual({
      document_id: 'doc-1',
      layout: {
        present: true,
        success: true,
        word_count: 3,
        page_count: 1,
        text_length: 16,
        error: null,
      },
      vision: {
        present: true,
        success: true,
        word_count: 4,
        page_count: 1,
        text_length: 24,
        error: null,
      },
      vision_confidence: 91,
      word_count_delta: 1,
      similarity: 0.75,
    });
  });

  it('omits similarity when one backend failed', async () => {
    const store = new MemoryRecordStore();
    await seedDocument(store, 'doc-1', 'stmt-1');
    const doc = await reconcile(store, 'doc-1', {
      layout: failed('layout', 'No text produced'),
      vision: ok('vision', 'scanned page text', 80),
    });

    const comparison = compareExtractions(doc);

    expect(comparison.similarity).toBeNull();
    expect(comparison.layout.present).toBe(false);
    expect(comparison.layout.error).toBe('No text produced');
    expect(comparison.word_count_delta).toBe(3);
  });
});

describe('textSimilarity', () => {
  it('is the Jaccard overlap of lowercase word sets', () => {
    expect(textSimilarity('a b c', 'A B C')).toBe(1);
    expect(textSimilarity('a b', 'c d')).toBe(0);
    expect(textSimilarity('a b c', 'a b d')).toBe(0.5);
    expect(textSimilarity('', '')).toBe(0);
  });
});

/**
 * Text Extraction Adapter Tests
 *
 * Both backends always run; each failure is isolated into its own result.
 */

import { TextExtractionAdapter, countWords, type TextExtractionBackend } from '@ledgerline/shared';
import { StubBackend, never, PDF_BYTES } from './fakes';

function adapterFor(
  layout: TextExtractionBackend,
  vision: TextExtractionBackend,
  timeouts = { layoutTimeoutMs: 1000, visionTimeoutMs: 1000 }
): TextExtractionAdapter {
  return new TextExtractionAdapter({ layout, vision, ...timeouts });
}

describe('countWords', () => {
  it('counts whitespace-delimited tokens', () => {
    expect(countWords('  Opening  balance\n\t100.00 ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('TextExtractionAdapter', () => {
  it('returns both results when both backends succeed', async () => {
    const layout = new StubBackend('layout', {
      text: 'Opening balance 100.00\nCoffee 4.50',
      page_count: 1,
    });
    const vision = new StubBackend('vision', {
      text: 'Opening balance 100.00 Coffee 4.50 Closing',
      page_count: 2,
      confidence: 87,
    });

    const { layout: l, vision: v } = await adapterFor(layout, vision).extractBoth(PDF_BYTES);

    expect(l).toEqual({
      method: 'layout',
      success: true,
      text: 'Opening balance 100.00\nCoffee 4.50',
      word_count: 5,
      page_count: 1,
      error: null,
      confidence: null,
    });
    expect(v.success).toBe(true);
    expect(v.word_count).toBe(6);
    expect(v.page_count).toBe(2);
    expect(v.confidence).toBe(87);
  });

  it('still runs vision when layout rejects', async () => {
    const layout = new StubBackend('layout', new Error('Invalid PDF structure'));
    const vision = new StubBackend('vision', { text: 'Scanned text', page_count: 1, confidence: 75 });

    const result = await adapterFor(layout, vision).extractBoth(PDF_BYTES);

    expect(vision.calls).toBe(1);
    expect(result.layout).toEqual({
      method: 'layout',
      success: false,
      text: null,
      word_count: 0,
      page_count: 0,
      error: 'Invalid PDF structure',
      confidence: null,
    });
    expect(result.vision.success).toBe(true);
  });

  it('captures a synchronous throw from a backend', async () => {
    const crashing: TextExtractionBackend = {
      method: 'vision',
      extract: () => {
        throw new Error('client not configured');
      },
    };
    const layout = new StubBackend('layout', { text: 'Some text', page_count: 1 });

    const result = await adapterFor(layout, crashing).extractBoth(PDF_BYTES);

    expect(result.layout.success).toBe(true);
    expect(result.vision.success).toBe(false);
    expect(result.vision.error).toBe('client not configured');
  });

  it('treats blank output as a failure (image-only PDF)', async () => {
    const layout = new StubBackend('layout', { text: ' \n\n ', page_count: 3 });
    const vision = new StubBackend('vision', { text: 'Page one', page_count: 3, confidence: 60 });

    const result = await adapterFor(layout, vision).extractBoth(PDF_BYTES);

    expect(result.layout.success).toBe(false);
    expect(result.layout.error).toBe('No text produced');
    expect(result.layout.word_count).toBe(0);
    expect(result.layout.text).toBeNull();
    expect(result.layout.page_count).toBe(3);
  });

  it('times out a backend that never answers', async () => {
    const layout = new StubBackend('layout', { text: 'Fast text', page_count: 1 });
    const vision = new StubBackend('vision', () => never());

    const result = await adapterFor(layout, vision, {
      layoutTimeoutMs: 1000,
      visionTimeoutMs: 20,
    }).extractBoth(PDF_BYTES);

    expect(result.layout.success).toBe(true);
    expect(result.vision.success).toBe(false);
    expect(result.vision.error).toBe('vision extraction timed out after 20ms');
  });

  it('clamps vision confidence to 0-100', async () => {
    const layout = new StubBackend('layout', { text: 'a', page_count: 1 });
    const high = new StubBackend('vision', { text: 'b', page_count: 1, confidence: 140 });
    const low = new StubBackend('vision', { text: 'b', page_count: 1, confidence: -5 });

    expect((await adapterFor(layout, high).extractBoth(PDF_BYTES)).vision.confidence).toBe(100);
    expect((await adapterFor(layout, low).extractBoth(PDF_BYTES)).vision.confidence).toBe(0);
  });

  it('leaves confidence null when vision reports none', async () => {
    const layout = new StubBackend('layout', { text: 'a', page_count: 1 });
    const vision = new StubBackend('vision', { text: 'b', page_count: 1 });

    const result = await adapterFor(layout, vision).extractBoth(PDF_BYTES);

    expect(result.vision.confidence).toBeNull();
  });
});

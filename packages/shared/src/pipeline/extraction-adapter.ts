/**
 * Text Extraction Adapter
 *
 * Runs both extraction backends against the same PDF bytes. Each call is
 * isolated and bounded by its own timeout: a failure in one backend never
 * prevents the other from running, and the adapter itself never throws.
 */

import { logger } from '../logger';
import { backendDurationHistogram, backendExtractionsCounter } from '../metrics';
import { BackendUnavailableError, errorMessage } from '../errors';
import type { BackendOutput, ExtractionMethod, ExtractionPair, ExtractionResult } from '../types';

export interface TextExtractionBackend {
  readonly method: ExtractionMethod;
  extract(bytes: Buffer): Promise<BackendOutput>;
}

export interface ExtractionAdapterOptions {
  layout: TextExtractionBackend;
  vision: TextExtractionBackend;
  layoutTimeoutMs: number;
  visionTimeoutMs: number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Reject with BackendUnavailableError when `promise` does not settle in time
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new BackendUnavailableError(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function failed(method: ExtractionMethod, error: string): ExtractionResult {
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

function clampConfidence(value: number | undefined): number | null {
  if (value === undefined || !Number.isFinite(value)) return null;
  return Math.min(100, Math.max(0, value));
}

export class TextExtractionAdapter {
  constructor(private readonly options: ExtractionAdapterOptions) {}

  async extractBoth(bytes: Buffer): Promise<ExtractionPair> {
    const [layout, vision] = await Promise.all([
      this.runBackend(this.options.layout, this.options.layoutTimeoutMs, bytes),
      this.runBackend(this.options.vision, this.options.visionTimeoutMs, bytes),
    ]);
    return { layout, vision };
  }

  private async runBackend(
    backend: TextExtractionBackend,
    timeoutMs: number,
    bytes: Buffer
  ): Promise<ExtractionResult> {
    const method = backend.method;
    const startTime = Date.now();

    let result: ExtractionResult;
    try {
      // Wrap in an async thunk so a synchronous throw is captured too
      const output = await withTimeout(
        (async () => backend.extract(bytes))(),
        timeoutMs,
        `${method} extraction`
      );

      if (!output.text || !output.text.trim()) {
        // The page count still describes the document (e.g. a scan)
        result = { ...failed(method, 'No text produced'), page_count: output.page_count };
      } else {
        result = {
          method,
          success: true,
          text: output.text,
          word_count: countWords(output.text),
          page_count: output.page_count,
          error: null,
          confidence: method === 'vision' ? clampConfidence(output.confidence) : null,
        };
      }
    } catch (err) {
      result = failed(method, errorMessage(err));
    }

    backendDurationHistogram.observe({ method }, (Date.now() - startTime) / 1000);
    backendExtractionsCounter.inc({ method, status: result.success ? 'success' : 'failed' });

    if (result.success) {
      logger.info('Backend extraction succeeded', {
        method,
        wordCount: result.word_count,
        pageCount: result.page_count,
        durationMs: Date.now() - startTime,
      });
    } else {
      logger.warn('Backend extraction failed', { method, error: result.error });
    }
    return result;
  }
}

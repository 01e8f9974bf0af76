/**
 * Vision Transcription Backend
 *
 * Sends the PDF itself to a vision-capable OpenAI model and asks for a
 * page-by-page transcription under a strict JSON schema. Works for scanned
 * statements that have no text layer.
 */

import OpenAI from 'openai';
import {
  logger,
  config,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  renderTemplate,
  VISION_TRANSCRIPTION_TEMPLATE,
  VISION_TRANSCRIPTION_SCHEMA,
  type BackendOutput,
  type TextExtractionBackend,
} from '@ledgerline/shared';
import { joinPages, type PageText } from './pdf';

interface Transcription {
  pages: PageText[];
  confidence: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate the structured-output payload
 */
export function parseTranscription(content: string): Transcription {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed) || !Array.isArray(parsed.pages) || typeof parsed.confidence !== 'number') {
    throw new Error('Vision response missing "pages" or "confidence"');
  }

  const pages: PageText[] = [];
  for (const page of parsed.pages) {
    if (!isRecord(page) || typeof page.page_number !== 'number' || typeof page.text !== 'string') {
      throw new Error('Vision response page missing "page_number" or "text"');
    }
    pages.push({ pageNumber: page.page_number, text: page.text });
  }
  pages.sort((a, b) => a.pageNumber - b.pageNumber);

  return { pages, confidence: parsed.confidence };
}

export class OpenAiVisionBackend implements TextExtractionBackend {
  readonly method = 'vision' as const;

  constructor(
    private readonly openai: OpenAI,
    private readonly model: string = config.llmModelVision,
    private readonly timeoutMs: number = config.visionTimeoutMs
  ) {}

  async extract(bytes: Buffer): Promise<BackendOutput> {
    const prompt = renderTemplate(VISION_TRANSCRIPTION_TEMPLATE, {});
    const base64Pdf = bytes.toString('base64');
    const startTime = Date.now();

    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.system },
            {
              role: 'user',
              content: [
                {
                  type: 'file',
                  file: {
                    filename: 'statement.pdf',
                    file_data: `data:application/pdf;base64,${base64Pdf}`,
                  },
                },
                { type: 'text', text: prompt.user },
              ],
            },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: {
              name: VISION_TRANSCRIPTION_TEMPLATE.name,
              strict: true,
              schema: VISION_TRANSCRIPTION_SCHEMA,
            },
          },
          temperature: 0,
        },
        { timeout: this.timeoutMs }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty response from OpenAI vision');
      }

      const transcription = parseTranscription(content);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.info('Vision transcription complete', {
        model: this.model,
        pages: transcription.pages.length,
        confidence: transcription.confidence,
        tokens: response.usage?.total_tokens,
      });

      return {
        text: joinPages(transcription.pages),
        page_count: transcription.pages.length,
        confidence: transcription.confidence,
      };
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      throw error;
    } finally {
      llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
    }
  }
}

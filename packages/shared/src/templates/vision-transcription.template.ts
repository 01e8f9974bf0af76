/**
 * Vision Transcription Template
 *
 * The vision backend receives the PDF itself and transcribes every page.
 * Output is constrained by VISION_TRANSCRIPTION_SCHEMA (structured outputs).
 */

import type { PromptTemplate } from './types';

export const VISION_TRANSCRIPTION_TEMPLATE: PromptTemplate = {
  name: 'vision_transcription',
  description: 'Scanned or digital statement PDF - transcribes the visible text of every page',

  systemPrompt: `You are an OCR engine for financial statements.

Transcribe ALL visible text of every page of the attached PDF, in reading order.
- Preserve table rows on one line each, with columns separated by two spaces
- Keep dates, amounts, signs and reference numbers exactly as printed
- Do not summarise, translate or correct the text
- Report pages in order, numbered from 1

Also report "confidence": how legible the document was overall, from 0 to 100.`,

  userPromptTemplate: `Transcribe the attached statement page by page.`,
};

/** JSON schema for OpenAI structured outputs (strict mode) */
export const VISION_TRANSCRIPTION_SCHEMA = {
  type: 'object',
  properties: {
    pages: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          page_number: { type: 'integer' },
          text: { type: 'string' },
        },
        required: ['page_number', 'text'],
        additionalProperties: false,
      },
    },
    confidence: { type: 'number' },
  },
  required: ['pages', 'confidence'],
  additionalProperties: false,
} as const;

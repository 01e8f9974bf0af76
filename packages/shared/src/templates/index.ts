/**
 * Prompt Templates
 */

export type { PromptTemplate, RenderedPrompt } from './types';
export { TRANSACTION_EXTRACTION_TEMPLATE } from './transaction-extraction.template';
export {
  VISION_TRANSCRIPTION_TEMPLATE,
  VISION_TRANSCRIPTION_SCHEMA,
} from './vision-transcription.template';

import type { PromptTemplate, RenderedPrompt } from './types';

/**
 * Fill {{placeholders}} in the user prompt. Unknown placeholders render empty.
 */
export function renderTemplate(
  template: PromptTemplate,
  values: Record<string, string>
): RenderedPrompt {
  const user = template.userPromptTemplate.replace(
    /\{\{(\w+)\}\}/g,
    (_match, key: string) => values[key] ?? ''
  );
  return { system: template.systemPrompt, user };
}

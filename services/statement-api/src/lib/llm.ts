/**
 * Language Model Client
 *
 * Plain chat completion in JSON mode. The response is returned as raw text;
 * the transaction parser does its own defensive parsing.
 */

import OpenAI from 'openai';
import { config, logger, type LanguageModelClient, type RenderedPrompt } from '@ledgerline/shared';

/**
 * One client for both model backends. Single attempt with a bounded timeout.
 */
export function createOpenAiClient(): OpenAI {
  return new OpenAI({
    apiKey: process.env.OPENAI_API_KEY || config.openaiApiKey,
    timeout: config.llmRequestTimeoutMs,
    maxRetries: 0,
  });
}

export class OpenAiLanguageModelClient implements LanguageModelClient {
  constructor(
    private readonly openai: OpenAI,
    readonly model: string = config.llmModelText
  ) {}

  async complete(prompt: RenderedPrompt): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      response_format: { type: 'json_object' },
      temperature: 0.1,
      max_tokens: 8192,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from language model');
    }

    logger.debug('Language model response received', {
      model: this.model,
      chars: content.length,
      tokens: response.usage?.total_tokens,
      finishReason: response.choices[0]?.finish_reason,
    });
    return content;
  }
}

/**
 * Prompt Template Types
 */

/**
 * A prompt pair for one model task.
 */
export interface PromptTemplate {
  /** Stable name, logged with each model call */
  name: string;

  /** System prompt with the task rules and output format */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{original_filename}}: The uploaded file name
   * - {{statement_text}}: The extracted text (transaction extraction only)
   */
  userPromptTemplate: string;

  /** Human-readable description of the task */
  description: string;
}

export interface RenderedPrompt {
  system: string;
  user: string;
}

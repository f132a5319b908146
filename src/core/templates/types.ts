import type { Message } from '../entities/Conversation.js';

/**
 * Prompt framing that switches off a model's extended reasoning phase.
 * `userSuffix` is appended to the final user turn, `assistantPrefix`
 * pre-seeds the assistant turn.
 */
export interface ThinkModePolicy {
  readonly userSuffix: string;
  readonly assistantPrefix: string;
}

/**
 * Structural delimiters of a flat-prompt model family
 */
export interface PromptTokens {
  readonly prefix: string;
  readonly system: string;
  readonly user: string;
  readonly assistant: string;
}

/**
 * Everything a template needs to render one request
 */
export interface PromptContext {
  systemPrompt: string;
  messages: readonly Message[];
  /** Extended reasoning enabled; suppresses the think-mode framing */
  thinking: boolean;
  /** Falls back to the default policy when unset */
  thinkMode?: ThinkModePolicy;
}

/**
 * Template type identifiers
 */
export type TemplateType = 'glm4';

/**
 * Abstract interface for prompt templates
 * Implementations must be pure: same context, same string.
 */
export interface PromptTemplate {
  /**
   * Render system prompt and history into a single prompt string
   */
  formatPrompt(context: PromptContext): string;

  /**
   * Get the template name
   */
  getName(): string;
}

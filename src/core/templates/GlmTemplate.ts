import type { Role } from '../entities/Conversation.js';
import type { PromptContext, PromptTemplate, PromptTokens } from './types.js';
import { resolveThinkMode } from './ThinkModes.js';

/**
 * GLM-4 special tokens
 */
export const GLM4_TOKENS: PromptTokens = Object.freeze({
  prefix: '[gMASK]<sop>',
  system: '<|system|>',
  user: '<|user|>',
  assistant: '<|assistant|>',
});

/**
 * Flat prompt template for GLM-4 style completion endpoints
 *
 * Format:
 * [gMASK]<sop><|system|>
 * system prompt
 * <|user|>
 * question/nothink
 * <|assistant|>
 * <think></think>
 *
 * System turns inside the history are delimited again, never merged.
 * The think-mode suffix only goes on a user turn that closes the history,
 * so a continuation (history ending in an assistant turn) renders the
 * earlier user turn untouched.
 */
export class GlmTemplate implements PromptTemplate {
  private readonly roleTokens: Readonly<Record<Role, string>>;

  constructor(private readonly tokens: PromptTokens = GLM4_TOKENS) {
    this.roleTokens = {
      system: tokens.system,
      user: tokens.user,
      assistant: tokens.assistant,
    };
  }

  formatPrompt({ systemPrompt, messages, thinking, thinkMode }: PromptContext): string {
    const policy = resolveThinkMode(thinkMode);
    let prompt = this.tokens.prefix;

    if (systemPrompt) {
      prompt += this.turn('system', systemPrompt);
    }

    messages.forEach((msg, index) => {
      const closesHistory = index === messages.length - 1;
      const suffix =
        !thinking && closesHistory && msg.role === 'user' ? policy.userSuffix : '';
      prompt += this.turn(msg.role, msg.content + suffix);
    });

    // Open the assistant turn for the model to fill
    prompt += `${this.tokens.assistant}\n`;

    if (!thinking) {
      prompt += policy.assistantPrefix;
    }

    return prompt;
  }

  getName(): string {
    return 'GLM-4 (flat prompt)';
  }

  private turn(role: Role, content: string): string {
    return `${this.roleTokens[role]}\n${content}\n`;
  }
}

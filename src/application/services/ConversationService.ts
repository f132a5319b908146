import type { Message, Role, Usage } from '../../core/entities/Conversation.js';

/**
 * Conversation state: ordered history plus cumulative usage
 *
 * Entries are never edited in place except by mergeTrailingAssistantPair.
 * Not safe for overlapping async use; one conversation, one caller.
 */
export class ConversationService {
  private messages: Message[] = [];
  private usage: Usage = { inputTokens: 0, outputTokens: 0 };

  /**
   * Append a turn to the end of the history
   */
  appendTurn(role: Role, content: string): void {
    this.messages.push({ role, content });
  }

  /**
   * Fold a continuation back into the reply it continues.
   * While the last two entries are both assistant turns, the later one is
   * appended to the earlier one (earlier right-trimmed, later trimmed, no
   * separator) and removed, so a trailing run of assistant turns collapses
   * into one.
   * @returns whether anything was merged
   */
  mergeTrailingAssistantPair(): boolean {
    let merged = false;

    while (this.endsWithAssistantPair()) {
      const later = this.messages.pop();
      const earlier = this.messages[this.messages.length - 1];
      if (!later) break;

      this.messages[this.messages.length - 1] = {
        role: 'assistant',
        content: earlier.content.trimEnd() + later.content.trim(),
      };
      merged = true;
    }

    return merged;
  }

  private endsWithAssistantPair(): boolean {
    const count = this.messages.length;
    return (
      count >= 2 &&
      this.messages[count - 1].role === 'assistant' &&
      this.messages[count - 2].role === 'assistant'
    );
  }

  /**
   * Get a copy of the history
   */
  getMessages(): Message[] {
    return this.messages.map((msg) => ({ ...msg }));
  }

  getLastMessage(): Message | undefined {
    const last = this.messages[this.messages.length - 1];
    return last ? { ...last } : undefined;
  }

  get size(): number {
    return this.messages.length;
  }

  isEmpty(): boolean {
    return this.messages.length === 0;
  }

  recordUsage(inputTokens: number, outputTokens: number): void {
    this.usage = {
      inputTokens: this.usage.inputTokens + inputTokens,
      outputTokens: this.usage.outputTokens + outputTokens,
    };
  }

  getUsage(): Usage {
    return { ...this.usage };
  }

  /**
   * Drop history and usage
   */
  clear(): void {
    this.messages = [];
    this.usage = { inputTokens: 0, outputTokens: 0 };
  }
}

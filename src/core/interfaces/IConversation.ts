import type { Message, Role, Usage } from '../entities/Conversation.js';
import type { SendResult, StreamCallback } from '../entities/Completion.js';
import type { SamplingOverrides } from '../entities/Settings.js';

export interface SendOptions {
  /** Overrides the conversation's signal for this call */
  signal?: AbortSignal;
  sampling?: SamplingOverrides;
}

/**
 * Interface for a multi-turn conversation against a completion model
 */
export interface IConversation {
  /**
   * Send one turn and wait for the whole reply.
   * An empty `text` answers the standing last user turn, or continues a
   * truncated assistant turn.
   */
  send(text: string, options?: SendOptions): Promise<SendResult>;

  /**
   * Like send, with tokens delivered to `onToken` as they arrive
   */
  sendStreaming(text: string, onToken?: StreamCallback, options?: SendOptions): Promise<SendResult>;

  /**
   * Keep sending until the reply is no longer cut off at max_tokens
   */
  sendUntilDone(text: string, options?: SendOptions): Promise<SendResult>;

  sendStreamingUntilDone(
    text: string,
    onToken?: StreamCallback,
    options?: SendOptions
  ): Promise<SendResult>;

  addMessage(role: Role, content: string): void;

  getMessages(): Message[];

  getUsage(): Usage;

  getSystemPrompt(): string;

  /**
   * Reset history and usage; system prompt and settings stay
   */
  clear(): void;
}

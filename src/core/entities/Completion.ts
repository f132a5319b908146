/**
 * Completion-related domain entities
 */

/**
 * Result of one exchange with the completions endpoint, or of a
 * continuation loop over several of them.
 */
export interface SendResult {
  reply: string;
  /** Normalized stop reason ("end_turn", "max_tokens", ...) */
  stopReason: string;
  inputTokens: number;
  outputTokens: number;
  /**
   * True when outputTokens is a character-count approximation rather than
   * a count reported by the provider.
   */
  estimatedTokens: boolean;
}

/**
 * Per-token callback for streaming sends.
 * Receives each non-empty text increment with done=false, then a final
 * empty call with done=true when the provider signals the end of the stream.
 */
export type StreamCallback = (text: string, done: boolean) => void;

const STOP_REASONS = new Map<string, string>([
  ['stop', 'end_turn'],
  ['length', 'max_tokens'],
  ['tool_calls', 'tool_use'],
]);

/**
 * Map an OpenAI-style finish_reason to the common stop reason vocabulary.
 * Unknown values (and the empty string) pass through unchanged.
 */
export function normalizeStopReason(reason: string): string {
  return STOP_REASONS.get(reason) ?? reason;
}

/** Characters per token used when the provider reports no usage */
export const CHARS_PER_TOKEN_ESTIMATE = 4;

/**
 * Rough output-token estimate for replies that arrived without usage
 * metadata. Not a token count: no tokenizer is involved.
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.floor(text.length / CHARS_PER_TOKEN_ESTIMATE));
}

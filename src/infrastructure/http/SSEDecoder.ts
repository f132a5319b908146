// Tolerant SSE reader for completions streams.
//
//   • Only `data:` lines count; comments and keep-alive blanks are skipped
//   • A malformed chunk is dropped, the stream goes on
//   • `[DONE]` ends the stream and fires the terminal callback
//   • The last non-empty finish_reason wins

import type { ByteStream } from '../../core/interfaces/ICompletionsClient.js';
import type { StreamCallback } from '../../core/entities/Completion.js';
import type { Usage } from '../../core/entities/Conversation.js';
import {
  CancellationError,
  ConversationError,
  TransportError,
  describeError,
  isAbortError,
} from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { StreamChunk, StreamChunkSchema } from './wire.js';

const DATA_PREFIX = 'data:';
const DONE_SENTINEL = '[DONE]';

const logger = createLogger('sse-decoder');

export interface DecodedStream {
  /** Concatenation of every text increment */
  text: string;
  /** Raw finish_reason, '' when the provider never sent one */
  stopReason: string;
  /** Present only when a chunk carried usage */
  usage?: Usage;
  /** Whether the [DONE] sentinel arrived */
  completed: boolean;
}

export interface DecoderState {
  text: string;
  stopReason: string;
  usage?: Usage;
}

function parseChunk(data: string): StreamChunk | null {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = StreamChunkSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Apply one SSE line to the decoder state.
 * @returns true once the stream-end sentinel has been seen
 */
export function processSSELine(
  rawLine: string,
  state: DecoderState,
  onToken?: StreamCallback
): boolean {
  const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
  if (!line.startsWith(DATA_PREFIX)) return false;

  let data = line.slice(DATA_PREFIX.length);
  if (data.startsWith(' ')) data = data.slice(1);

  if (data === DONE_SENTINEL) {
    onToken?.('', true);
    return true;
  }

  const chunk = parseChunk(data);
  if (!chunk) {
    logger.debug('Skipping malformed stream chunk', { length: data.length });
    return false;
  }

  if (chunk.usage) {
    state.usage = {
      inputTokens: chunk.usage.prompt_tokens,
      outputTokens: chunk.usage.completion_tokens,
    };
  }

  const choice = chunk.choices[0];
  if (!choice) return false;

  if (choice.text) {
    state.text += choice.text;
    onToken?.(choice.text, false);
  }

  if (choice.finish_reason) {
    state.stopReason = choice.finish_reason;
  }

  return false;
}

function streamFailure(error: unknown, partial: string, signal?: AbortSignal): ConversationError {
  const failure =
    signal?.aborted || isAbortError(error)
      ? new CancellationError('Stream cancelled', error)
      : new TransportError(`Error reading stream: ${describeError(error)}`, 'stream', {
          cause: error,
        });
  failure.partialReply = partial;
  return failure;
}

/**
 * Consume an SSE body, feeding text increments to `onToken` as they arrive.
 * The callback runs inline with the read loop.
 */
export async function decodeSSEStream(
  source: ByteStream,
  onToken?: StreamCallback,
  signal?: AbortSignal
): Promise<DecodedStream> {
  const state: DecoderState = { text: '', stopReason: '' };
  const decoder = new TextDecoder();
  const iterator = source[Symbol.asyncIterator]();
  let buffer = '';

  try {
    for (;;) {
      let next: IteratorResult<Uint8Array | string>;
      try {
        next = await iterator.next();
      } catch (error) {
        throw streamFailure(error, state.text, signal);
      }
      if (next.done) break;

      const chunk = next.value;
      buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        if (processSSELine(line, state, onToken)) {
          return { ...state, completed: true };
        }
      }

      if (signal?.aborted) {
        throw streamFailure(signal.reason, state.text, signal);
      }
    }
  } finally {
    await iterator.return?.();
  }

  // Trailing line without a final newline
  buffer += decoder.decode();
  const completed = buffer !== '' && processSSELine(buffer, state, onToken);
  return { ...state, completed };
}

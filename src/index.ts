/**
 * Multi-turn conversations against flat-prompt completion endpoints
 */

import { CompletionService } from './application/services/CompletionService.js';
import { CompletionsApiClient } from './infrastructure/http/CompletionsApiClient.js';
import type { ICompletionsClient } from './core/interfaces/ICompletionsClient.js';
import { Config, loadConfig, thinkModeFor } from './config.js';

export interface CreateConversationOptions {
  /** Defaults to loadConfig(), which reads the environment */
  config?: Config;
  /** Defaults to a CompletionsApiClient built from the config */
  client?: ICompletionsClient;
  signal?: AbortSignal;
}

/**
 * Create a conversation wired from configuration
 */
export function createConversation(
  systemPrompt: string,
  options: CreateConversationOptions = {}
): CompletionService {
  const config = options.config ?? loadConfig();

  const client =
    options.client ??
    new CompletionsApiClient({
      retryConfig: {
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.delayMs,
        maxDelayMs: config.retry.delayMs,
        multiplier: 1,
      },
      timeoutMs: config.timeoutMs,
    });

  return new CompletionService({
    client,
    systemPrompt,
    apiKey: config.apiKey,
    endpoint: config.endpoint,
    signal: options.signal,
    settings: {
      model: config.model,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      thinking: config.thinking,
      thinkMode: thinkModeFor(config),
    },
  });
}

export { CompletionService } from './application/services/CompletionService.js';
export type { CompletionServiceOptions } from './application/services/CompletionService.js';
export { ConversationService } from './application/services/ConversationService.js';
export { CompletionsApiClient, DEFAULT_TIMEOUT_MS } from './infrastructure/http/CompletionsApiClient.js';
export type { CompletionsApiClientOptions, FetchFn } from './infrastructure/http/CompletionsApiClient.js';
export { decodeSSEStream, processSSELine } from './infrastructure/http/SSEDecoder.js';
export type { DecodedStream } from './infrastructure/http/SSEDecoder.js';
export {
  DEFAULT_COMPLETIONS_URL,
  buildCompletionBody,
  CompletionResponseSchema,
  StreamChunkSchema,
} from './infrastructure/http/wire.js';
export type { CompletionRequest, CompletionRequestBody, CompletionResponse } from './infrastructure/http/wire.js';
export type { ICompletionsClient, ByteStream } from './core/interfaces/ICompletionsClient.js';
export type { IConversation, SendOptions } from './core/interfaces/IConversation.js';
export type { Message, Role, Usage } from './core/entities/Conversation.js';
export {
  normalizeStopReason,
  estimateTokens,
  CHARS_PER_TOKEN_ESTIMATE,
} from './core/entities/Completion.js';
export type { SendResult, StreamCallback } from './core/entities/Completion.js';
export { DEFAULT_SETTINGS, createSettings, applySampling } from './core/entities/Settings.js';
export type { GenerationSettings, SamplingOverrides } from './core/entities/Settings.js';
export * from './core/templates/index.js';
export * from './core/errors.js';
export { withRetry, DEFAULT_RETRY_CONFIG } from './utils/retry.js';
export type { RetryConfig, RetryLog, RetryOptions } from './utils/retry.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { loadConfig, resolveApiKey, thinkModeFor, API_KEY_ENV, TOKEN_FILE_NAME } from './config.js';
export type { Config, LoadConfigOptions, ApiKeySources, ThinkModeSetting } from './config.js';

import fetch, { RequestInit, Response } from 'node-fetch';
import type { ByteStream, ICompletionsClient } from '../../core/interfaces/ICompletionsClient.js';
import {
  CancellationError,
  ConfigError,
  describeError,
  ProtocolError,
  TransportError,
  isAbortError,
  isRetryableError,
} from '../../core/errors.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig, RetryLog, withRetry } from '../../utils/retry.js';
import { Logger, createLogger } from '../../utils/logger.js';
import {
  CompletionRequest,
  CompletionResponse,
  CompletionResponseSchema,
} from './wire.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface CompletionsApiClientOptions {
  /** Injected for tests; defaults to node-fetch */
  fetch?: FetchFn;
  retryConfig?: RetryConfig;
  /** Whole-exchange timeout for buffered requests, 0 disables. Streams have none. */
  timeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Completions API client
 * - Bearer-token POST against an OpenAI-compatible /completions endpoint
 * - Network failures retried with a fixed delay; HTTP errors and aborts are not
 * - Buffered JSON or raw SSE body
 */
export class CompletionsApiClient implements ICompletionsClient {
  private readonly fetchFn: FetchFn;
  private readonly retryConfig: RetryConfig;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: CompletionsApiClientOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('completions-client');
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const response = await this.post(request, false, signal);
    const raw = await this.readText(response, signal);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ProtocolError(`Error parsing response: ${describeError(error)}`, raw, error);
    }

    const parsed = CompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      throw new ProtocolError(`Unexpected response shape: ${issues}`, raw);
    }

    return parsed.data;
  }

  async stream(request: CompletionRequest, signal?: AbortSignal): Promise<ByteStream> {
    const response = await this.post(request, true, signal);
    return response.body;
  }

  private async post(
    request: CompletionRequest,
    streaming: boolean,
    signal?: AbortSignal
  ): Promise<Response> {
    if (!request.apiKey.trim()) {
      throw new ConfigError('API token not set');
    }
    if (signal?.aborted) {
      throw new CancellationError('Operation cancelled before request', signal.reason);
    }

    // Serialized once; every attempt rebuilds its request from this string
    const payload = JSON.stringify(request.body);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${request.apiKey}`,
    };
    if (streaming) {
      headers.Accept = 'text/event-stream';
    }

    this.logger.debug('Sending completion request', {
      url: request.url,
      model: request.body.model,
      promptChars: request.body.prompt.length,
      stream: streaming,
    });

    let response: Response;
    try {
      response = await withRetry(
        () => this.attempt(request.url, headers, payload, streaming, signal),
        this.retryConfig,
        {
          shouldRetry: isRetryableError,
          signal,
          onLog: (log) => this.logAttempt(log, request),
        }
      );
    } catch (error) {
      if (isRetryableError(error)) {
        this.logger.error('Request failed after retries', {
          url: request.url,
          attempts: this.retryConfig.maxAttempts,
        });
        throw new TransportError(
          `HTTP error after ${this.retryConfig.maxAttempts} attempts: ${describeError(error)}`,
          'network',
          { cause: error }
        );
      }
      throw error;
    }

    if (!response.ok) {
      const body = await this.readText(response, signal);
      this.logger.warn('Completion request rejected', { url: request.url, status: response.status });
      throw new TransportError(`API error (status ${response.status}): ${body}`, 'http', {
        status: response.status,
        body,
      });
    }

    return response;
  }

  private async attempt(
    url: string,
    headers: Record<string, string>,
    payload: string,
    streaming: boolean,
    signal?: AbortSignal
  ): Promise<Response> {
    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (!streaming && this.timeoutMs > 0) signals.push(AbortSignal.timeout(this.timeoutMs));

    try {
      return await this.fetchFn(url, {
        method: 'POST',
        headers,
        body: payload,
        signal: signals.length > 1 ? AbortSignal.any(signals) : signals[0],
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancellationError('Request cancelled', error);
      }
      if (isAbortError(error)) {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`, 'network', {
          cause: error,
        });
      }
      throw new TransportError(`Network error: ${describeError(error)}`, 'network', {
        cause: error,
      });
    }
  }

  private async readText(response: Response, signal?: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new CancellationError('Request cancelled while reading response', error);
      }
      throw new TransportError(`Error reading response: ${describeError(error)}`, 'stream', {
        cause: error,
      });
    }
  }

  private logAttempt(log: RetryLog, request: CompletionRequest): void {
    if (log.success) {
      if (log.attempt > 1) {
        this.logger.info('Request succeeded after retry', { url: request.url, attempt: log.attempt });
      }
      return;
    }

    this.logger.warn('Request attempt failed', {
      url: request.url,
      attempt: log.attempt,
      error: log.error,
      next_retry_in_ms: log.nextRetryInMs,
    });
  }
}

import type {
  CompletionRequest,
  CompletionResponse,
} from '../../infrastructure/http/wire.js';

/**
 * Raw SSE body handed from the transport to the stream decoder
 */
export type ByteStream = AsyncIterable<Uint8Array | string>;

/**
 * Interface for the completions transport
 */
export interface ICompletionsClient {
  /**
   * POST the request and return the decoded, buffered JSON response
   */
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;

  /**
   * POST the request in streaming mode and return the open event stream
   */
  stream(request: CompletionRequest, signal?: AbortSignal): Promise<ByteStream>;
}

/**
 * Error taxonomy for conversation operations
 *
 * Every failure is scoped to the call that raised it; the conversation
 * stays usable afterwards.
 */

export type ConversationErrorCode =
  | 'CONFIG_ERROR'
  | 'TRANSPORT_ERROR'
  | 'PROTOCOL_ERROR'
  | 'CANCELLED';

export abstract class ConversationError extends Error {
  /** Reply text that had already arrived when the call failed */
  partialReply?: string;

  constructor(
    message: string,
    public readonly code: ConversationErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConversationError';
  }
}

/**
 * Missing credential, or nothing to generate from
 */
export class ConfigError extends ConversationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export type TransportErrorKind = 'network' | 'http' | 'stream';

/**
 * Network failure after retries, non-2xx status, or a broken stream
 */
export class TransportError extends ConversationError {
  readonly status?: number;
  readonly body?: string;

  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    options: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, 'TRANSPORT_ERROR', options.cause);
    this.name = 'TransportError';
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * The server answered, but not with something we can use
 */
export class ProtocolError extends ConversationError {
  constructor(
    message: string,
    public readonly body?: string,
    cause?: unknown
  ) {
    super(message, 'PROTOCOL_ERROR', cause);
    this.name = 'ProtocolError';
  }
}

/**
 * Aborted through the caller's AbortSignal. Never retried.
 */
export class CancellationError extends ConversationError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super(message, 'CANCELLED', cause);
    this.name = 'CancellationError';
  }
}

/**
 * Recognize aborts raised by fetch implementations and AbortSignal
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof CancellationError) {
    return true;
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'TimeoutError';
  }
  return false;
}

/**
 * Only network-level transport failures are worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.kind === 'network';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

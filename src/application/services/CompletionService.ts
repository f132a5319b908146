import type { IConversation, SendOptions } from '../../core/interfaces/IConversation.js';
import type { ICompletionsClient } from '../../core/interfaces/ICompletionsClient.js';
import type { Message, Role, Usage } from '../../core/entities/Conversation.js';
import {
  SendResult,
  StreamCallback,
  estimateTokens,
  normalizeStopReason,
} from '../../core/entities/Completion.js';
import {
  GenerationSettings,
  applySampling,
  createSettings,
} from '../../core/entities/Settings.js';
import type { PromptTemplate, ThinkModePolicy } from '../../core/templates/types.js';
import { TemplateFactory } from '../../core/templates/TemplateFactory.js';
import {
  CancellationError,
  ConfigError,
  ConversationError,
  ProtocolError,
} from '../../core/errors.js';
import {
  CompletionRequest,
  DEFAULT_COMPLETIONS_URL,
  buildCompletionBody,
} from '../../infrastructure/http/wire.js';
import { decodeSSEStream } from '../../infrastructure/http/SSEDecoder.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { ConversationService } from './ConversationService.js';

export interface CompletionServiceOptions {
  client: ICompletionsClient;
  systemPrompt?: string;
  apiKey?: string;
  /** Merged over DEFAULT_SETTINGS */
  settings?: Partial<GenerationSettings>;
  endpoint?: string;
  signal?: AbortSignal;
  template?: PromptTemplate;
  logger?: Logger;
}

type Exchange = (input: string) => Promise<SendResult>;

/**
 * Service for conversing with a flat-prompt completions model
 *
 * Each send renders the whole history into one prompt, runs a single
 * exchange and records the reply. A user turn appended before a failed
 * exchange stays in the history; retry with empty text instead of
 * re-sending it.
 */
export class CompletionService implements IConversation {
  private readonly state = new ConversationService();
  private readonly client: ICompletionsClient;
  private readonly systemPrompt: string;
  private readonly apiKey: string;
  private readonly template: PromptTemplate;
  private readonly logger: Logger;
  private settings: GenerationSettings;
  private endpoint: string;
  private signal?: AbortSignal;

  constructor(options: CompletionServiceOptions) {
    this.client = options.client;
    this.systemPrompt = options.systemPrompt ?? '';
    this.apiKey = options.apiKey ?? '';
    this.settings = createSettings(options.settings);
    this.endpoint = options.endpoint ?? '';
    this.signal = options.signal;
    this.template = options.template ?? TemplateFactory.getTemplate('glm4');
    this.logger = options.logger ?? createLogger('conversation');
  }

  async send(text: string, options: SendOptions = {}): Promise<SendResult> {
    return this.exchange(text, options, false);
  }

  async sendStreaming(
    text: string,
    onToken?: StreamCallback,
    options: SendOptions = {}
  ): Promise<SendResult> {
    return this.exchange(text, options, true, onToken);
  }

  async sendUntilDone(text: string, options: SendOptions = {}): Promise<SendResult> {
    return this.continueUntilDone(text, (input) => this.send(input, options));
  }

  async sendStreamingUntilDone(
    text: string,
    onToken?: StreamCallback,
    options: SendOptions = {}
  ): Promise<SendResult> {
    return this.continueUntilDone(text, (input) => this.sendStreaming(input, onToken, options));
  }

  /**
   * Merge consecutive assistant turns left behind by a continuation
   */
  mergeTrailingAssistantPair(): boolean {
    return this.state.mergeTrailingAssistantPair();
  }

  addMessage(role: Role, content: string): void {
    this.state.appendTurn(role, content);
  }

  getMessages(): Message[] {
    return this.state.getMessages();
  }

  getUsage(): Usage {
    return this.state.getUsage();
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  clear(): void {
    this.state.clear();
  }

  getSettings(): GenerationSettings {
    return { ...this.settings, stopSequences: [...this.settings.stopSequences] };
  }

  setModel(model: string): void {
    this.settings = { ...this.settings, model };
  }

  setThinking(enabled: boolean): void {
    this.settings = { ...this.settings, thinking: enabled };
  }

  setThinkMode(policy: ThinkModePolicy): void {
    this.settings = { ...this.settings, thinkMode: policy };
  }

  /**
   * Point requests at another completions URL; '' restores the default
   */
  setEndpoint(url: string): void {
    this.endpoint = url;
  }

  getEndpoint(): string {
    return this.endpoint || DEFAULT_COMPLETIONS_URL;
  }

  setSignal(signal?: AbortSignal): void {
    this.signal = signal;
  }

  /**
   * The single-shot primitive behind every send variant
   */
  private async exchange(
    text: string,
    options: SendOptions,
    streaming: boolean,
    onToken?: StreamCallback
  ): Promise<SendResult> {
    const signal = options.signal ?? this.signal;
    if (signal?.aborted) {
      throw new CancellationError('Operation cancelled before send', signal.reason);
    }
    if (!this.apiKey.trim()) {
      throw new ConfigError('API token not set');
    }

    if (text !== '') {
      this.state.appendTurn('user', text);
    } else if (this.state.isEmpty()) {
      throw new ConfigError('Cannot generate: no messages in conversation');
    }
    // Empty text with a trailing user turn answers it; with a trailing
    // assistant turn the model continues that reply.

    const settings = applySampling(this.settings, options.sampling);
    const prompt = this.template.formatPrompt({
      systemPrompt: this.systemPrompt,
      messages: this.state.getMessages(),
      thinking: settings.thinking,
      thinkMode: settings.thinkMode,
    });

    const request: CompletionRequest = {
      url: this.getEndpoint(),
      apiKey: this.apiKey,
      body: buildCompletionBody(prompt, settings, { stream: streaming }),
    };

    const result = streaming
      ? await this.runStreaming(request, signal, onToken)
      : await this.runBuffered(request, signal);

    this.state.appendTurn('assistant', result.reply);
    this.state.recordUsage(result.inputTokens, result.outputTokens);

    this.logger.debug('Completion finished', {
      model: settings.model,
      stream: streaming,
      stopReason: result.stopReason,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      estimatedTokens: result.estimatedTokens,
    });

    return result;
  }

  private async runBuffered(request: CompletionRequest, signal?: AbortSignal): Promise<SendResult> {
    const response = await this.client.complete(request, signal);

    const choice = response.choices[0];
    if (!choice) {
      throw new ProtocolError('No choices in response');
    }

    return {
      reply: choice.text,
      stopReason: normalizeStopReason(choice.finish_reason ?? ''),
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      estimatedTokens: false,
    };
  }

  private async runStreaming(
    request: CompletionRequest,
    signal?: AbortSignal,
    onToken?: StreamCallback
  ): Promise<SendResult> {
    const body = await this.client.stream(request, signal);
    const decoded = await decodeSSEStream(body, onToken, signal);

    // Streams rarely carry usage; fall back to the character estimate
    const usage = decoded.usage;

    return {
      reply: decoded.text,
      stopReason: normalizeStopReason(decoded.stopReason),
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage ? usage.outputTokens : estimateTokens(decoded.text),
      estimatedTokens: usage === undefined,
    };
  }

  private async continueUntilDone(text: string, exchange: Exchange): Promise<SendResult> {
    let reply = '';
    let stopReason = '';
    let inputTokens = 0;
    let outputTokens = 0;
    let estimatedTokens = false;
    let input = text;

    for (;;) {
      let part: SendResult;
      try {
        part = await exchange(input);
      } catch (error) {
        if (error instanceof ConversationError) {
          error.partialReply = reply + (error.partialReply ?? '');
        }
        throw error;
      }

      reply += part.reply;
      stopReason = part.stopReason;
      inputTokens += part.inputTokens;
      outputTokens += part.outputTokens;
      estimatedTokens = estimatedTokens || part.estimatedTokens;

      this.state.mergeTrailingAssistantPair();

      if (stopReason !== 'max_tokens') {
        break;
      }

      this.logger.debug('Reply truncated at max_tokens, continuing', { replyChars: reply.length });
      input = '';
    }

    return { reply, stopReason, inputTokens, outputTokens, estimatedTokens };
  }
}

/**
 * Wire format of the OpenAI-compatible completions endpoint
 */

import { z } from 'zod';
import type { GenerationSettings } from '../../core/entities/Settings.js';

export const DEFAULT_COMPLETIONS_URL = 'https://text.novelai.net/oa/v1/completions';

/**
 * Request body. Numeric fields left at zero are omitted so the server
 * keeps its own defaults.
 */
export interface CompletionRequestBody {
  model: string;
  prompt: string;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  min_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  repetition_penalty?: number;
  stream?: boolean;
  stream_options?: { include_usage: boolean };
  stop?: string[];
}

/**
 * A fully prepared request; serialized once, replayed on every attempt
 */
export interface CompletionRequest {
  url: string;
  apiKey: string;
  body: CompletionRequestBody;
}

const nonZero = (value: number): number | undefined => (value !== 0 ? value : undefined);

export function buildCompletionBody(
  prompt: string,
  settings: GenerationSettings,
  options: { stream: boolean }
): CompletionRequestBody {
  return {
    model: settings.model,
    prompt,
    max_tokens: nonZero(settings.maxTokens),
    temperature: nonZero(settings.temperature),
    top_p: nonZero(settings.topP),
    top_k: nonZero(settings.topK),
    min_p: nonZero(settings.minP),
    frequency_penalty: nonZero(settings.frequencyPenalty),
    presence_penalty: nonZero(settings.presencePenalty),
    repetition_penalty: nonZero(settings.repetitionPenalty),
    // undefined fields vanish in JSON.stringify
    stream: options.stream ? true : undefined,
    stream_options: options.stream ? { include_usage: true } : undefined,
    stop: settings.stopSequences.length > 0 ? [...settings.stopSequences] : undefined,
  };
}

const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().default(0),
  completion_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().optional(),
});

export const CompletionResponseSchema = z.object({
  id: z.string().optional(),
  object: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().int().optional(),
      text: z.string().default(''),
      finish_reason: z.string().nullish(),
    })
  ),
  usage: UsageSchema.nullish(),
});

export type CompletionResponse = z.infer<typeof CompletionResponseSchema>;

/**
 * One SSE data payload. Same choice shape as the buffered response;
 * usage usually only rides on the terminal chunk.
 */
export const StreamChunkSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().optional(),
        text: z.string().nullish(),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: UsageSchema.nullish(),
});

export type StreamChunk = z.infer<typeof StreamChunkSchema>;

import type { ThinkModePolicy } from '../templates/types.js';
import { THINK_MODE_GLM46 } from '../templates/ThinkModes.js';

/**
 * Generation parameters sent with every request
 */
export interface GenerationSettings {
  /** Model identifier (e.g. "glm-4-6", "llama-3-erato-v1") */
  model: string;
  maxTokens: number;
  /** Randomness, 0.0 to 2.0 */
  temperature: number;
  topP: number;
  topK: number;
  minP: number;
  frequencyPenalty: number;
  presencePenalty: number;
  repetitionPenalty: number;
  stopSequences: string[];
  /** Let the model emit its <think> reasoning phase */
  thinking: boolean;
  thinkMode?: ThinkModePolicy;
}

/**
 * Per-call sampling overrides. Unset or zero fields keep the
 * conversation's settings.
 */
export interface SamplingOverrides {
  temperature?: number;
  topP?: number;
  topK?: number;
  maxTokens?: number;
}

export const DEFAULT_SETTINGS: Readonly<GenerationSettings> = Object.freeze({
  model: 'glm-4-6',
  maxTokens: 2048,
  temperature: 1.0,
  topP: 0,
  topK: 0,
  minP: 0,
  frequencyPenalty: 0,
  presencePenalty: 0,
  repetitionPenalty: 0,
  stopSequences: ['<|user|>', '<|system|>'],
  thinking: false, // faster replies
  thinkMode: THINK_MODE_GLM46,
});

/**
 * Build a settings object from the defaults plus overrides
 */
export function createSettings(overrides: Partial<GenerationSettings> = {}): GenerationSettings {
  const settings = { ...DEFAULT_SETTINGS, ...overrides };
  return { ...settings, stopSequences: [...settings.stopSequences] };
}

/**
 * Apply per-call sampling overrides on top of the active settings
 */
export function applySampling(
  settings: GenerationSettings,
  sampling?: SamplingOverrides
): GenerationSettings {
  if (!sampling) {
    return settings;
  }

  const pick = (override: number | undefined, current: number): number =>
    override !== undefined && override !== 0 ? override : current;

  return {
    ...settings,
    temperature: pick(sampling.temperature, settings.temperature),
    topP: pick(sampling.topP, settings.topP),
    topK: pick(sampling.topK, settings.topK),
    maxTokens: pick(sampling.maxTokens, settings.maxTokens),
  };
}

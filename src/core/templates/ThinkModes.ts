import type { ThinkModePolicy } from './types.js';

// GLM-4.5 / 4.6: "/nothink" on the user turn plus an empty think block
export const THINK_MODE_GLM46: ThinkModePolicy = Object.freeze({
  userSuffix: '/nothink',
  assistantPrefix: '<think></think>\n',
});

// GLM-4.7 only needs the closing tag to skip reasoning
export const THINK_MODE_GLM47: ThinkModePolicy = Object.freeze({
  userSuffix: '/nothink',
  assistantPrefix: '</think>',
});

// Models without a reasoning phase
export const THINK_MODE_NONE: ThinkModePolicy = Object.freeze({
  userSuffix: '',
  assistantPrefix: '',
});

export const DEFAULT_THINK_MODE = THINK_MODE_GLM46;

export type ThinkModeName = 'glm46' | 'glm47' | 'none';

export const THINK_MODES: Readonly<Record<ThinkModeName, ThinkModePolicy>> = Object.freeze({
  glm46: THINK_MODE_GLM46,
  glm47: THINK_MODE_GLM47,
  none: THINK_MODE_NONE,
});

/**
 * Effective policy for a request. An unset policy means the default one,
 * never "no framing".
 */
export function resolveThinkMode(policy?: ThinkModePolicy): ThinkModePolicy {
  return policy ?? DEFAULT_THINK_MODE;
}

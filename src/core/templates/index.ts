/**
 * Template system for rendering conversations into flat prompts
 */
export type {
  PromptTemplate,
  PromptContext,
  PromptTokens,
  ThinkModePolicy,
  TemplateType,
} from './types.js';
export { GlmTemplate, GLM4_TOKENS } from './GlmTemplate.js';
export {
  THINK_MODE_GLM46,
  THINK_MODE_GLM47,
  THINK_MODE_NONE,
  THINK_MODES,
  DEFAULT_THINK_MODE,
  resolveThinkMode,
} from './ThinkModes.js';
export type { ThinkModeName } from './ThinkModes.js';
export { TemplateFactory } from './TemplateFactory.js';

import type { PromptTemplate, TemplateType, ThinkModePolicy } from './types.js';
import { GlmTemplate } from './GlmTemplate.js';
import { THINK_MODE_GLM46, THINK_MODE_GLM47, THINK_MODE_NONE } from './ThinkModes.js';

/**
 * Factory for prompt templates and model-family defaults
 */
export class TemplateFactory {
  private static templates: Map<TemplateType, PromptTemplate> = new Map([
    ['glm4', new GlmTemplate()],
  ]);

  /**
   * Get a template instance by type
   */
  static getTemplate(type: TemplateType): PromptTemplate {
    const template = this.templates.get(type);
    if (!template) {
      throw new Error(`Unknown template type: ${type}`);
    }
    return template;
  }

  /**
   * Pick the think-mode policy that matches a model identifier
   * Patterns:
   * - glm-4-7, glm-4.7 -> closing </think> prefill
   * - any other glm -> empty <think></think> prefill
   * - default -> no framing (model has no reasoning phase)
   */
  static detectThinkMode(modelName: string): ThinkModePolicy {
    const name = modelName.toLowerCase();

    if (name.includes('glm-4-7') || name.includes('glm-4.7') || name.includes('glm47')) {
      return THINK_MODE_GLM47;
    }

    if (name.includes('glm')) {
      return THINK_MODE_GLM46;
    }

    return THINK_MODE_NONE;
  }
}

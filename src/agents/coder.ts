import type { InferenceClient } from '../ollama/types';
import type { Retriever } from '../retrieval/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { errorMessage, silentLogger } from '../orchestrator/logger';
import { ContextBuilder } from './context-builder';
import { extractCode } from './code-extraction';
import type { TargetProfile } from './profiles';
import { pygameProfile } from './profiles';
import { getCodeGenerationPrompt, getCodeGenerationSystemPrompt } from './prompts/code-generation';

export interface CodeGeneratorOptions {
  model: string;
  profile?: TargetProfile;
}

/**
 * Produces a full replacement of the program for one modification.
 * Inference failures never escape: the profile's fallback skeleton comes back instead.
 */
export class CodeGenerator {
  private profile: TargetProfile;

  constructor(
    private client: InferenceClient,
    private retriever: Retriever,
    private options: CodeGeneratorOptions,
    private logger: WorkflowLogger = silentLogger,
  ) {
    this.profile = options.profile ?? pygameProfile;
  }

  get modelId(): string {
    return this.options.model;
  }

  async generate(currentCode: string, modification: string, temperature = 0.2, maxTokens = 1000): Promise<string> {
    if (!modification.trim()) {
      throw new TypeError('Modification must not be empty');
    }

    const templates = await this.retriever.search(modification, 'code_templates', 2);
    const plans = await this.retriever.search(modification, 'task_plans', 1);
    const grounding = ContextBuilder.build([
      { title: 'CODE TEMPLATES', hits: templates, maxChars: 400 },
      { title: 'RELATED PLANS', hits: plans, maxChars: 300 },
    ]);

    let code: string;
    try {
      const reply = await this.client.generate({
        model: this.options.model,
        system: getCodeGenerationSystemPrompt(this.profile, grounding),
        prompt: getCodeGenerationPrompt(this.profile, currentCode, modification),
        temperature,
        maxTokens,
      });
      code = extractCode(reply.response, this.profile.fenceLanguages);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error('Code generation failed, returning fallback skeleton', { error: reason });
      return this.profile.fallbackSource(reason);
    }

    if (!code) {
      this.logger.warn('Model returned no code, returning fallback skeleton');
      return this.profile.fallbackSource('empty reply');
    }

    const problems = this.sanityCheck(code);
    if (problems.length > 0) {
      this.logger.warn('Generated code failed sanity check', { missing: problems });
    }

    this.logger.info(`Generated ${code.length} chars for: ${modification}`);
    return code;
  }

  /** Required markers that are absent; informational only */
  sanityCheck(code: string): string[] {
    return [this.profile.importLine, this.profile.windowCall].filter((marker) => !code.includes(marker));
  }
}

/**
 * Stand-alone prompt operations: validation, metadata extraction and improvement.
 * None of them claims the agent; they may run beside a generation.
 */

import type { IAgentRepository } from '../repositories/IAgentRepository.js';
import type { ProviderRegistry } from '../providers/ProviderRegistry.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AgentHandle, IModelProvider } from '../providers/IModelProvider.js';
import type {
  ImprovedPromptResponse,
  ProjectMetadataResponse,
  ValidationResponse,
} from '../types/api.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { rowToHandle } from './mappers.js';

export class PromptService {
  constructor(
    private readonly agentRepo: IAgentRepository,
    private readonly providers: ProviderRegistry,
    private readonly logProvider: ILogProvider
  ) {}

  /** Short prompts come back invalid without a provider call. */
  async validatePrompt(prompt: string, agentId: string, signal?: AbortSignal): Promise<ValidationResponse> {
    if (typeof prompt !== 'string') {
      throw new ValidationError('prompt must be a string');
    }
    const { adapter, handle } = await this.resolveAgent(agentId);
    const result = await adapter.validatePrompt(prompt, handle, { signal });

    this.logProvider.debug('Prompt validated', {
      agentId,
      isValid: result.isValid,
      confidenceScore: result.confidenceScore,
    });

    return { ...result };
  }

  async extractMetadata(prompt: string, agentId: string, signal?: AbortSignal): Promise<ProjectMetadataResponse> {
    requirePrompt(prompt);
    const { adapter, handle } = await this.resolveAgent(agentId);
    const metadata = await adapter.extractMetadata(prompt, handle, { signal });
    return { ...metadata, technologies: [...metadata.technologies] };
  }

  /** Validates first so the improvement can address the reported issues. */
  async improvePrompt(prompt: string, agentId: string, signal?: AbortSignal): Promise<ImprovedPromptResponse> {
    requirePrompt(prompt);
    const { adapter, handle } = await this.resolveAgent(agentId);

    const validation = await adapter.validatePrompt(prompt, handle, { signal });
    const improvedPrompt = await adapter.improvePrompt(prompt, handle, validation, { signal });

    this.logProvider.info('Prompt improved', { agentId, confidenceScore: validation.confidenceScore });

    return { originalPrompt: prompt, improvedPrompt, validation: { ...validation } };
  }

  private async resolveAgent(agentId: string): Promise<{ adapter: IModelProvider; handle: AgentHandle }> {
    const row = await this.agentRepo.findById(agentId);
    if (!row) {
      throw new NotFoundError(`Agent "${agentId}" not found`);
    }
    return { adapter: this.providers.resolve(row.model_provider), handle: rowToHandle(row) };
  }
}

function requirePrompt(prompt: string): void {
  if (typeof prompt !== 'string' || prompt.trim().length === 0) {
    throw new ValidationError('prompt is required');
  }
}

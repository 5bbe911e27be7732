/**
 * Agent registration, configuration and status management.
 */

import { randomUUID } from 'node:crypto';
import type { IAgentRepository } from '../repositories/IAgentRepository.js';
import type { ProviderRegistry } from '../providers/ProviderRegistry.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AgentRow } from '../types/database.js';
import {
  AGENT_STATUSES,
  AGENT_TYPES,
  MODEL_PROVIDERS,
  type AgentStatus,
} from '../types/models.js';
import type {
  AgentResponse,
  CreateAgentRequest,
  ListAgentsRequest,
  ListResponse,
  ProviderModelsResponse,
  UpdateAgentRequest,
} from '../types/api.js';
import {
  AgentBusyError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import { AGENT_PRESETS } from './agent-presets.js';
import { INITIAL_AGENT_STATUSES, canTransitionAgent } from './lifecycle.js';
import { agentToResponse, rowToAgent } from './mappers.js';
import { resolvePagination } from './pagination.js';

const MAX_NAME_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 1000;
/** Concurrent writers can move the status between our read and our swap. */
const MAX_STATUS_SWAP_ATTEMPTS = 3;
/** Configuration may change in any status but busy. */
const IDLE_AGENT_STATUSES = AGENT_STATUSES.filter((s) => s !== 'busy');

export class AgentService {
  constructor(
    private readonly agentRepo: IAgentRepository,
    private readonly providers: ProviderRegistry,
    private readonly logProvider: ILogProvider
  ) {}

  async createAgent(input: CreateAgentRequest): Promise<AgentResponse> {
    this.validateCreate(input);

    const adapter = this.providers.resolve(input.modelProvider);
    const preset = AGENT_PRESETS[input.agentType];

    // Rejects bad temperature, maxTokens or model before anything is stored.
    const handle = adapter.createAgent({
      modelProvider: input.modelProvider,
      modelId: input.modelId,
      temperature: input.temperature ?? preset.temperature,
      maxTokens: input.maxTokens ?? Math.min(preset.maxTokens, adapter.maxTokensLimit),
      instructions: input.instructions ?? [],
    });

    const row = await this.agentRepo.insert({
      id: randomUUID(),
      name: input.name.trim(),
      description: input.description?.trim() ?? '',
      agent_type: input.agentType,
      model_provider: handle.modelProvider,
      model_id: handle.modelId,
      temperature: handle.temperature,
      max_tokens: handle.maxTokens,
      instructions: handle.instructions,
      status: input.status ?? 'inactive',
    });

    this.logProvider.info('Agent created', {
      agentId: row.id,
      agentType: row.agent_type,
      provider: row.model_provider,
      modelId: row.model_id,
    });

    return agentToResponse(rowToAgent(row));
  }

  async getAgent(id: string): Promise<AgentResponse> {
    return agentToResponse(rowToAgent(await this.requireAgent(id)));
  }

  async listAgents(input: ListAgentsRequest): Promise<ListResponse<AgentResponse>> {
    if (input.agentType !== undefined && !AGENT_TYPES.includes(input.agentType)) {
      throw new ValidationError(`agentType must be one of: ${AGENT_TYPES.join(', ')}`);
    }
    if (input.modelProvider !== undefined && !MODEL_PROVIDERS.includes(input.modelProvider)) {
      throw new ValidationError(`modelProvider must be one of: ${MODEL_PROVIDERS.join(', ')}`);
    }
    if (input.status !== undefined && !AGENT_STATUSES.includes(input.status)) {
      throw new ValidationError(`status must be one of: ${AGENT_STATUSES.join(', ')}`);
    }

    const page = resolvePagination(input);
    const rows = await this.agentRepo.list(
      { agentType: input.agentType, modelProvider: input.modelProvider, status: input.status },
      page
    );

    return { items: rows.map((r) => agentToResponse(rowToAgent(r))), ...page };
  }

  /**
   * Change configuration. The result is re-validated against the provider,
   * so the model stays within the provider's supported set.
   */
  async updateAgent(id: string, input: UpdateAgentRequest): Promise<AgentResponse> {
    const current = await this.requireAgent(id);
    if (current.status === 'busy') {
      throw new AgentBusyError(id);
    }
    if (input.name !== undefined) this.validateName(input.name);
    if (input.description !== undefined) this.validateDescription(input.description);

    const handle = this.providers.resolve(current.model_provider).createAgent({
      modelProvider: current.model_provider,
      modelId: input.modelId ?? current.model_id,
      temperature: input.temperature ?? current.temperature,
      maxTokens: input.maxTokens ?? current.max_tokens,
      instructions: input.instructions ?? current.instructions,
    });

    const updated = await this.agentRepo.update(
      id,
      {
        ...(input.name !== undefined && { name: input.name.trim() }),
        ...(input.description !== undefined && { description: input.description.trim() }),
        model_id: handle.modelId,
        temperature: handle.temperature,
        max_tokens: handle.maxTokens,
        instructions: handle.instructions,
      },
      IDLE_AGENT_STATUSES
    );
    if (!updated) {
      // A generation claimed the agent, or it was deleted, after the read above.
      await this.requireAgent(id);
      throw new AgentBusyError(id);
    }

    this.logProvider.info('Agent updated', { agentId: id });
    return agentToResponse(rowToAgent(updated));
  }

  async updateAgentStatus(id: string, status: AgentStatus): Promise<AgentResponse> {
    if (!AGENT_STATUSES.includes(status)) {
      throw new ValidationError(`status must be one of: ${AGENT_STATUSES.join(', ')}`);
    }
    if (status === 'busy') {
      throw new InvalidStateError('The busy status is managed by document generation');
    }

    for (let attempt = 0; attempt < MAX_STATUS_SWAP_ATTEMPTS; attempt++) {
      const current = await this.requireAgent(id);
      if (current.status === status) {
        return agentToResponse(rowToAgent(current));
      }
      if (current.status === 'busy' && status !== 'error') {
        throw new AgentBusyError(id);
      }
      if (!canTransitionAgent(current.status, status)) {
        throw new InvalidStateError(`Agent cannot move from ${current.status} to ${status}`, {
          from: current.status,
          to: status,
        });
      }

      const updated = await this.agentRepo.compareAndSetStatus(id, [current.status], status);
      if (updated) {
        this.logProvider.info('Agent status changed', { agentId: id, from: current.status, to: status });
        return agentToResponse(rowToAgent(updated));
      }
    }

    throw new InvalidStateError(`Agent "${id}" status changed concurrently; retry the request`);
  }

  /** Documents keep their generatingAgentId; nothing cascades. */
  async deleteAgent(id: string): Promise<boolean> {
    const deleted = await this.agentRepo.delete(id);
    if (deleted) {
      this.logProvider.info('Agent deleted', { agentId: id });
    }
    return deleted;
  }

  listProviders(): ProviderModelsResponse[] {
    return this.providers.list().map((adapter) => ({
      provider: adapter.provider,
      models: [...adapter.supportedModels],
      maxTokens: adapter.maxTokensLimit,
    }));
  }

  // ── Private ──

  private async requireAgent(id: string): Promise<AgentRow> {
    const row = await this.agentRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Agent "${id}" not found`);
    }
    return row;
  }

  private validateCreate(input: CreateAgentRequest): void {
    this.validateName(input.name);
    if (input.description !== undefined) this.validateDescription(input.description);

    if (!AGENT_TYPES.includes(input.agentType)) {
      throw new ValidationError(`agentType must be one of: ${AGENT_TYPES.join(', ')}`);
    }
    if (input.status !== undefined && !INITIAL_AGENT_STATUSES.includes(input.status)) {
      throw new ValidationError(`status must be one of: ${INITIAL_AGENT_STATUSES.join(', ')}`);
    }
    if (input.instructions !== undefined && !input.instructions.every((i) => typeof i === 'string')) {
      throw new ValidationError('instructions must be a list of strings');
    }
  }

  private validateName(name: string): void {
    if (!name || name.trim().length === 0) {
      throw new ValidationError('name is required');
    }
    if (name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`name must be ${MAX_NAME_LENGTH} characters or less`);
    }
  }

  private validateDescription(description: string): void {
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      throw new ValidationError(`description must be ${MAX_DESCRIPTION_LENGTH} characters or less`);
    }
  }
}

/**
 * Process-memory implementation of IAgentRepository.
 */

import type { IAgentRepository, AgentFilter } from './IAgentRepository.js';
import type { AgentPatch, AgentRow, NewAgentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { AgentStatus } from '../types/models.js';
import { InMemoryStore, type InMemoryStoreOptions } from './InMemoryStore.js';

export class InMemoryAgentRepository implements IAgentRepository {
  private readonly store: InMemoryStore<AgentRow>;

  constructor(options: InMemoryStoreOptions<AgentRow>) {
    this.store = new InMemoryStore(options);
  }

  async insert(row: NewAgentRow): Promise<AgentRow> {
    const now = new Date().toISOString();
    return this.store.insert({ ...row, created_at: now, updated_at: now });
  }

  async findById(id: string): Promise<AgentRow | null> {
    return this.store.get(id);
  }

  async list(filter: AgentFilter, options: PaginationOptions): Promise<AgentRow[]> {
    return this.store.list(
      (row) =>
        (filter.agentType === undefined || row.agent_type === filter.agentType) &&
        (filter.modelProvider === undefined || row.model_provider === filter.modelProvider) &&
        (filter.status === undefined || row.status === filter.status),
      options.limit,
      options.offset
    );
  }

  async update(id: string, data: AgentPatch, expectedStatuses?: readonly AgentStatus[]): Promise<AgentRow | null> {
    return this.store.update(
      id,
      () => data,
      (current) => expectedStatuses === undefined || expectedStatuses.includes(current.status)
    );
  }

  async compareAndSetStatus(
    id: string,
    expected: readonly AgentStatus[],
    next: AgentStatus
  ): Promise<AgentRow | null> {
    return this.store.update(
      id,
      () => ({ status: next }),
      (current) => expected.includes(current.status)
    );
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async count(): Promise<number> {
    return this.store.size;
  }
}

/**
 * Supabase implementation of IAgentRepository.
 * Table `agents`; column names match AgentRow.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { AgentFilter, IAgentRepository } from './IAgentRepository.js';
import type { AgentPatch, AgentRow, NewAgentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { AgentStatus } from '../types/models.js';
import { evictOldest, type SupabaseRepositoryOptions } from './supabase-capacity.js';

const TABLE = 'agents';

export class SupabaseAgentRepository implements IAgentRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly options: SupabaseRepositoryOptions<AgentRow>
  ) {}

  async insert(row: NewAgentRow): Promise<AgentRow> {
    const now = new Date().toISOString();
    const { data, error } = await this.db
      .from(TABLE)
      .insert({ ...row, created_at: now, updated_at: now })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert agent: ${error.message}`);
    await evictOldest<AgentRow>(this.db, TABLE, this.options);
    return data as AgentRow;
  }

  async findById(id: string): Promise<AgentRow | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find agent: ${error.message}`);
    return data as AgentRow | null;
  }

  async list(filter: AgentFilter, options: PaginationOptions): Promise<AgentRow[]> {
    let query = this.db.from(TABLE).select('*');
    if (filter.agentType) query = query.eq('agent_type', filter.agentType);
    if (filter.modelProvider) query = query.eq('model_provider', filter.modelProvider);
    if (filter.status) query = query.eq('status', filter.status);

    const { data, error } = await query
      .order('created_at', { ascending: true })
      .order('id', { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list agents: ${error.message}`);
    return (data ?? []) as AgentRow[];
  }

  async update(id: string, data: AgentPatch, expectedStatuses?: readonly AgentStatus[]): Promise<AgentRow | null> {
    let query = this.db
      .from(TABLE)
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id);
    if (expectedStatuses) query = query.in('status', [...expectedStatuses]);

    const { data: updated, error } = await query.select().maybeSingle();

    if (error) throw new Error(`Failed to update agent: ${error.message}`);
    return updated as AgentRow | null;
  }

  async compareAndSetStatus(
    id: string,
    expected: readonly AgentStatus[],
    next: AgentStatus
  ): Promise<AgentRow | null> {
    // A single filtered UPDATE: the database serializes concurrent writers.
    const { data, error } = await this.db
      .from(TABLE)
      .update({ status: next, updated_at: new Date().toISOString() })
      .eq('id', id)
      .in('status', [...expected])
      .select()
      .maybeSingle();

    if (error) throw new Error(`Failed to swap agent status: ${error.message}`);
    return data as AgentRow | null;
  }

  async delete(id: string): Promise<boolean> {
    const { data, error } = await this.db.from(TABLE).delete().eq('id', id).select('id');

    if (error) throw new Error(`Failed to delete agent: ${error.message}`);
    return (data ?? []).length > 0;
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count agents: ${error.message}`);
    return count ?? 0;
  }
}

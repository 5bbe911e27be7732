/**
 * Agent data access interface.
 */

import type { AgentRow, AgentPatch, NewAgentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { AgentStatus, AgentType, ModelProvider } from '../types/models.js';

/** Equality filters; omitted fields match everything. */
export interface AgentFilter {
  agentType?: AgentType;
  modelProvider?: ModelProvider;
  status?: AgentStatus;
}

export interface IAgentRepository {
  /** Stores over capacity evict their oldest row before inserting. */
  insert(row: NewAgentRow): Promise<AgentRow>;

  findById(id: string): Promise<AgentRow | null>;

  /** Rows in insertion order. */
  list(filter: AgentFilter, options: PaginationOptions): Promise<AgentRow[]>;

  /**
   * With `expectedStatuses`, the patch applies only while the status is one of
   * them, checked in the same atomic step as the write. Returns null when the
   * row is missing or the status did not match.
   */
  update(id: string, data: AgentPatch, expectedStatuses?: readonly AgentStatus[]): Promise<AgentRow | null>;

  /**
   * Set `status` to `next` only if it currently is one of `expected`.
   * Atomic: of several concurrent callers expecting the same status, one wins.
   * Returns the updated row, or null when the row is missing or the status did not match.
   */
  compareAndSetStatus(id: string, expected: readonly AgentStatus[], next: AgentStatus): Promise<AgentRow | null>;

  delete(id: string): Promise<boolean>;

  count(): Promise<number>;
}

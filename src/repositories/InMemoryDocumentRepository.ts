/**
 * Process-memory implementation of IDocumentRepository.
 */

import type { IDocumentRepository, DocumentFilter } from './IDocumentRepository.js';
import type { DocumentPatch, DocumentRow, NewDocumentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { DocumentStatus } from '../types/models.js';
import { countWords } from '../services/lifecycle.js';
import { InMemoryStore, type InMemoryStoreOptions } from './InMemoryStore.js';

export class InMemoryDocumentRepository implements IDocumentRepository {
  private readonly store: InMemoryStore<DocumentRow>;

  constructor(options: InMemoryStoreOptions<DocumentRow>) {
    this.store = new InMemoryStore(options);
  }

  async insert(row: NewDocumentRow): Promise<DocumentRow> {
    const now = new Date().toISOString();
    return this.store.insert({
      ...row,
      word_count: countWords(row.content),
      created_at: now,
      updated_at: now,
    });
  }

  async findById(id: string): Promise<DocumentRow | null> {
    return this.store.get(id);
  }

  async list(filter: DocumentFilter, options: PaginationOptions): Promise<DocumentRow[]> {
    return this.store.list(
      (row) =>
        (filter.documentType === undefined || row.document_type === filter.documentType) &&
        (filter.status === undefined || row.status === filter.status) &&
        (filter.agentId === undefined || row.generating_agent_id === filter.agentId) &&
        (filter.projectName === undefined || row.project_metadata?.project_name === filter.projectName),
      options.limit,
      options.offset
    );
  }

  async update(
    id: string,
    data: DocumentPatch,
    expectedStatuses?: readonly DocumentStatus[]
  ): Promise<DocumentRow | null> {
    return this.store.update(
      id,
      () => (data.content === undefined ? data : { ...data, word_count: countWords(data.content) }),
      (current) => expectedStatuses === undefined || expectedStatuses.includes(current.status)
    );
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async count(): Promise<number> {
    return this.store.size;
  }
}

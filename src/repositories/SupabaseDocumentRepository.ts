/**
 * Supabase implementation of IDocumentRepository.
 * Table `project_documents`; column names match DocumentRow.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { DocumentFilter, IDocumentRepository } from './IDocumentRepository.js';
import type { DocumentPatch, DocumentRow, NewDocumentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { DocumentStatus } from '../types/models.js';
import { countWords } from '../services/lifecycle.js';
import { evictOldest, type SupabaseRepositoryOptions } from './supabase-capacity.js';

const TABLE = 'project_documents';

export class SupabaseDocumentRepository implements IDocumentRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly options: SupabaseRepositoryOptions<DocumentRow>
  ) {}

  async insert(row: NewDocumentRow): Promise<DocumentRow> {
    const now = new Date().toISOString();
    const { data, error } = await this.db
      .from(TABLE)
      .insert({ ...row, word_count: countWords(row.content), created_at: now, updated_at: now })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert document: ${error.message}`);
    await evictOldest<DocumentRow>(this.db, TABLE, this.options);
    return data as DocumentRow;
  }

  async findById(id: string): Promise<DocumentRow | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find document: ${error.message}`);
    return data as DocumentRow | null;
  }

  async list(filter: DocumentFilter, options: PaginationOptions): Promise<DocumentRow[]> {
    let query = this.db.from(TABLE).select('*');
    if (filter.documentType) query = query.eq('document_type', filter.documentType);
    if (filter.status) query = query.eq('status', filter.status);
    if (filter.agentId) query = query.eq('generating_agent_id', filter.agentId);
    if (filter.projectName) query = query.eq('project_metadata->>project_name', filter.projectName);

    const { data, error } = await query
      .order('created_at', { ascending: true })
      .order('id', { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list documents: ${error.message}`);
    return (data ?? []) as DocumentRow[];
  }

  async update(
    id: string,
    data: DocumentPatch,
    expectedStatuses?: readonly DocumentStatus[]
  ): Promise<DocumentRow | null> {
    const patch =
      data.content === undefined ? data : { ...data, word_count: countWords(data.content) };

    let query = this.db
      .from(TABLE)
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq('id', id);
    if (expectedStatuses) query = query.in('status', [...expectedStatuses]);

    const { data: updated, error } = await query.select().maybeSingle();

    if (error) throw new Error(`Failed to update document: ${error.message}`);
    return updated as DocumentRow | null;
  }

  async delete(id: string): Promise<boolean> {
    const { data, error } = await this.db.from(TABLE).delete().eq('id', id).select('id');

    if (error) throw new Error(`Failed to delete document: ${error.message}`);
    return (data ?? []).length > 0;
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count documents: ${error.message}`);
    return count ?? 0;
  }
}

/**
 * Project document data access interface.
 * Implementations derive `word_count` from `content` on every write.
 */

import type { DocumentPatch, DocumentRow, NewDocumentRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { DocumentStatus, DocumentType } from '../types/models.js';

export interface DocumentFilter {
  documentType?: DocumentType;
  status?: DocumentStatus;
  agentId?: string;
  /** Matches `project_metadata.project_name` exactly. */
  projectName?: string;
}

export interface IDocumentRepository {
  insert(row: NewDocumentRow): Promise<DocumentRow>;

  findById(id: string): Promise<DocumentRow | null>;

  list(filter: DocumentFilter, options: PaginationOptions): Promise<DocumentRow[]>;

  /** Like IAgentRepository.update: `expectedStatuses` guards the write atomically. */
  update(
    id: string,
    data: DocumentPatch,
    expectedStatuses?: readonly DocumentStatus[]
  ): Promise<DocumentRow | null>;

  delete(id: string): Promise<boolean>;

  count(): Promise<number>;
}

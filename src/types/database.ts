/**
 * Row types mirroring the storage schema (`agents`, `project_documents`).
 * Kept separate so storage can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type {
  AgentStatus,
  AgentType,
  ComplexityLevel,
  DocumentStatus,
  DocumentType,
  ModelProvider,
} from './models.js';

export interface AgentRow {
  id: string;
  name: string;
  description: string;
  agent_type: AgentType;
  model_provider: ModelProvider;
  model_id: string;
  temperature: number;
  max_tokens: number;
  instructions: string[];
  status: AgentStatus;
  created_at: string;
  updated_at: string;
}

/** JSON column shape of `project_documents.project_metadata`. */
export interface ProjectMetadataColumn {
  project_name: string;
  description: string;
  project_type: string;
  technologies: string[];
  complexity_level: ComplexityLevel;
  estimated_duration: string;
}

export interface DocumentRow {
  id: string;
  title: string;
  content: string;
  document_type: DocumentType;
  status: DocumentStatus;
  word_count: number;
  generating_agent_id: string;
  project_metadata: ProjectMetadataColumn | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export type NewAgentRow = Omit<AgentRow, 'created_at' | 'updated_at'>;
/** `word_count` is derived from `content` by the repository. */
export type NewDocumentRow = Omit<DocumentRow, 'created_at' | 'updated_at' | 'word_count'>;

/** Columns a caller may change after insert. */
export type AgentPatch = Partial<Omit<AgentRow, 'id' | 'created_at' | 'updated_at'>>;
export type DocumentPatch = Partial<
  Omit<DocumentRow, 'id' | 'created_at' | 'updated_at' | 'generating_agent_id' | 'word_count'>
>;

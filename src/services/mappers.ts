/**
 * Conversions between row, domain and API shapes.
 */

import type { AgentRow, DocumentRow, ProjectMetadataColumn } from '../types/database.js';
import type { Agent, ProjectDocument, ProjectMetadata } from '../types/models.js';
import type { AgentResponse, DocumentResponse } from '../types/api.js';
import type { AgentHandle } from '../providers/IModelProvider.js';

export function rowToAgent(row: AgentRow): Agent {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    agentType: row.agent_type,
    modelProvider: row.model_provider,
    modelId: row.model_id,
    temperature: row.temperature,
    maxTokens: row.max_tokens,
    instructions: [...row.instructions],
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function agentToResponse(agent: Agent): AgentResponse {
  return {
    id: agent.id,
    name: agent.name,
    description: agent.description,
    agentType: agent.agentType,
    modelProvider: agent.modelProvider,
    modelId: agent.modelId,
    temperature: agent.temperature,
    maxTokens: agent.maxTokens,
    instructions: [...agent.instructions],
    status: agent.status,
    createdAt: agent.createdAt.toISOString(),
    updatedAt: agent.updatedAt.toISOString(),
  };
}

/** The provider-facing slice of a stored agent. */
export function rowToHandle(row: AgentRow): AgentHandle {
  return {
    modelProvider: row.model_provider,
    modelId: row.model_id,
    temperature: row.temperature,
    maxTokens: row.max_tokens,
    instructions: [...row.instructions],
  };
}

export function metadataToColumn(metadata: ProjectMetadata): ProjectMetadataColumn {
  return {
    project_name: metadata.projectName,
    description: metadata.description,
    project_type: metadata.projectType,
    technologies: [...metadata.technologies],
    complexity_level: metadata.complexityLevel,
    estimated_duration: metadata.estimatedDuration,
  };
}

export function columnToMetadata(column: ProjectMetadataColumn): ProjectMetadata {
  return {
    projectName: column.project_name,
    description: column.description,
    projectType: column.project_type,
    technologies: [...column.technologies],
    complexityLevel: column.complexity_level,
    estimatedDuration: column.estimated_duration,
  };
}

export function rowToDocument(row: DocumentRow): ProjectDocument {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    documentType: row.document_type,
    status: row.status,
    wordCount: row.word_count,
    generatingAgentId: row.generating_agent_id,
    projectMetadata: row.project_metadata ? columnToMetadata(row.project_metadata) : null,
    errorMessage: row.error_message,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function documentToResponse(document: ProjectDocument): DocumentResponse {
  return {
    id: document.id,
    title: document.title,
    content: document.content,
    documentType: document.documentType,
    status: document.status,
    wordCount: document.wordCount,
    generatingAgentId: document.generatingAgentId,
    projectMetadata: document.projectMetadata ? { ...document.projectMetadata } : null,
    errorMessage: document.errorMessage,
    createdAt: document.createdAt.toISOString(),
    updatedAt: document.updatedAt.toISOString(),
  };
}

/**
 * Request and response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AgentStatus,
  AgentType,
  ComplexityLevel,
  DocumentStatus,
  DocumentType,
  ModelProvider,
} from './models.js';

// ── Requests ──

export interface CreateAgentRequest {
  name: string;
  description?: string;
  agentType: AgentType;
  modelProvider: ModelProvider;
  modelId: string;
  /** Defaults to the agent type's preset. */
  temperature?: number;
  /** Defaults to the agent type's preset, clamped to the provider cap. */
  maxTokens?: number;
  instructions?: string[];
  status?: AgentStatus;
}

/** Fields omitted are left unchanged. Provider and type are fixed at creation. */
export interface UpdateAgentRequest {
  name?: string;
  description?: string;
  modelId?: string;
  temperature?: number;
  maxTokens?: number;
  instructions?: string[];
}

export interface UpdateAgentStatusRequest {
  status: AgentStatus;
}

export interface Pagination {
  limit?: number;
  offset?: number;
}

export interface ListAgentsRequest extends Pagination {
  agentType?: AgentType;
  modelProvider?: ModelProvider;
  status?: AgentStatus;
}

export interface GenerateDocumentRequest {
  prompt: string;
  agentId: string;
  documentType: DocumentType;
  projectName?: string;
  additionalContext?: string;
}

export interface ListDocumentsRequest extends Pagination {
  documentType?: DocumentType;
  status?: DocumentStatus;
  agentId?: string;
  projectName?: string;
}

export interface UpdateDocumentRequest {
  content: string;
  title?: string;
}

export interface PromptRequest {
  prompt: string;
  agentId: string;
}

// ── Responses ──

export interface AgentResponse {
  id: string;
  name: string;
  description: string;
  agentType: AgentType;
  modelProvider: ModelProvider;
  modelId: string;
  temperature: number;
  maxTokens: number;
  instructions: string[];
  status: AgentStatus;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectMetadataResponse {
  projectName: string;
  description: string;
  projectType: string;
  technologies: string[];
  complexityLevel: ComplexityLevel;
  estimatedDuration: string;
}

export interface DocumentResponse {
  id: string;
  title: string;
  content: string;
  documentType: DocumentType;
  status: DocumentStatus;
  wordCount: number;
  generatingAgentId: string;
  projectMetadata: ProjectMetadataResponse | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ListResponse<T> {
  items: T[];
  limit: number;
  offset: number;
}

export interface ProviderModelsResponse {
  provider: ModelProvider;
  models: string[];
  maxTokens: number;
}

export interface ValidationResponse {
  isValid: boolean;
  confidenceScore: number;
  suggestions: string[];
  issues: string[];
}

export interface ImprovedPromptResponse {
  originalPrompt: string;
  improvedPrompt: string;
  validation: ValidationResponse;
}

export interface QualityResponse {
  documentId: string;
  qualityScore: number;
  issues: string[];
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_PROVIDER'
  | 'AGENT_BUSY'
  | 'INVALID_STATE'
  | 'PROVIDER_UNAVAILABLE'
  | 'CONTENT_TOO_LARGE'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

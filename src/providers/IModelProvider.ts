/**
 * Model provider interface.
 * One implementation per provider family; services never branch on the provider.
 */

import type {
  DocumentType,
  ModelProvider,
  ProjectMetadata,
  QualityReport,
  ValidationResult,
} from '../types/models.js';

/** The slice of an agent a provider needs to run an operation. */
export interface AgentHandle {
  modelProvider: ModelProvider;
  modelId: string;
  temperature: number;
  maxTokens: number;
  instructions: string[];
}

export type AgentConfig = AgentHandle;

export interface GenerationInput {
  prompt: string;
  documentType: DocumentType;
  metadata: ProjectMetadata;
}

/** The slice of a document quality analysis reads. */
export interface QualityInput {
  title: string;
  documentType: DocumentType;
  content: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface IModelProvider {
  readonly provider: ModelProvider;
  readonly supportedModels: readonly string[];
  /** Largest `maxTokens` an agent on this provider may ask for. */
  readonly maxTokensLimit: number;

  /**
   * Validate an agent configuration for this provider. No network traffic.
   * @throws InvalidConfigError, UnsupportedModelError
   */
  createAgent(config: AgentConfig): AgentHandle;

  validatePrompt(prompt: string, agent: AgentHandle, options?: CallOptions): Promise<ValidationResult>;

  /** @throws ProviderUnavailableError rather than returning partial metadata */
  extractMetadata(prompt: string, agent: AgentHandle, options?: CallOptions): Promise<ProjectMetadata>;

  /** Returns Markdown; repeated calls may legitimately differ. */
  generateMarkdownDocument(
    input: GenerationInput,
    agent: AgentHandle,
    options?: CallOptions
  ): Promise<string>;

  analyzeQuality(document: QualityInput, agent: AgentHandle, options?: CallOptions): Promise<QualityReport>;

  improvePrompt(
    originalPrompt: string,
    agent: AgentHandle,
    validation?: ValidationResult,
    options?: CallOptions
  ): Promise<string>;
}

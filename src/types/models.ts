/**
 * Domain models as the services see them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Enumerations ──

export const AGENT_TYPES = [
  'markdown_generator',
  'code_analyzer',
  'project_planner',
  'document_writer',
  'mvp_specialist',
] as const;
export type AgentType = (typeof AGENT_TYPES)[number];

export const MODEL_PROVIDERS = ['groq', 'openai', 'anthropic'] as const;
export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

export const AGENT_STATUSES = ['inactive', 'active', 'busy', 'error', 'maintenance'] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

export const DOCUMENT_TYPES = [
  'readme',
  'api_documentation',
  'architecture_analysis',
  'project_roadmap',
  'technical_specification',
  'user_guide',
  'deployment_guide',
] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const DOCUMENT_STATUSES = [
  'draft',
  'in_progress',
  'completed',
  'failed',
  'reviewing',
  'published',
] as const;
export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export const COMPLEXITY_LEVELS = ['low', 'medium', 'high'] as const;
export type ComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];

// ── Entities ──

export interface Agent {
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
  createdAt: Date;
  updatedAt: Date;
}

export interface ProjectDocument {
  id: string;
  title: string;
  /** Markdown body. */
  content: string;
  documentType: DocumentType;
  status: DocumentStatus;
  /** Whitespace-token count of `content`. */
  wordCount: number;
  /** Weak reference: the agent may have been deleted since. */
  generatingAgentId: string;
  projectMetadata: ProjectMetadata | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

// ── Value Objects ──

export interface ProjectMetadata {
  projectName: string;
  description: string;
  projectType: string;
  technologies: string[];
  complexityLevel: ComplexityLevel;
  estimatedDuration: string;
}

export interface ValidationResult {
  isValid: boolean;
  /** 0.0 – 1.0 */
  confidenceScore: number;
  suggestions: string[];
  issues: string[];
}

export interface QualityReport {
  /** 0.0 – 1.0 */
  qualityScore: number;
  issues: string[];
}

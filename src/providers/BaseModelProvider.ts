/**
 * Shared implementation of IModelProvider.
 * Subclasses supply `complete()`, a single chat completion against their API;
 * everything else (config checks, prompts, parsing, retries, content limits)
 * is provider-independent.
 */

import {
  ContentLimitError,
  InvalidConfigError,
  ProviderUnavailableError,
  UnsupportedModelError,
} from '../errors.js';
import type { GenerationSettings, RetryPolicy } from '../config.js';
import { countWords } from '../services/lifecycle.js';
import type { ModelProvider, ProjectMetadata, QualityReport, ValidationResult } from '../types/models.js';
import type { ILogProvider } from './ILogProvider.js';
import type {
  AgentConfig,
  AgentHandle,
  CallOptions,
  GenerationInput,
  IModelProvider,
  QualityInput,
} from './IModelProvider.js';
import {
  SYSTEM_PROMPTS,
  generationPrompt,
  generationSystemPrompt,
  improvementPrompt,
  metadataPrompt,
  qualityPrompt,
  validationPrompt,
} from './prompts.js';
import {
  MetadataSchema,
  QualityVerdictSchema,
  ValidationVerdictSchema,
  parseReply,
  stripMarkdownFence,
} from './responses.js';
import { withRetry } from './retry.js';

const MIN_PROMPT_LENGTH = 10;
const MIN_DOCUMENT_WORDS = 50;
const MAX_TEMPERATURE = 2;

/** One chat completion: a system message and a user message. */
export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

export interface BaseModelProviderOptions {
  models: readonly string[];
  maxTokensLimit: number;
  retry: RetryPolicy;
  generation: GenerationSettings;
  logProvider?: ILogProvider;
  /** Backoff sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export abstract class BaseModelProvider implements IModelProvider {
  abstract readonly provider: ModelProvider;
  readonly supportedModels: readonly string[];
  readonly maxTokensLimit: number;

  protected readonly retry: RetryPolicy;
  protected readonly generation: GenerationSettings;
  protected readonly logProvider?: ILogProvider;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: BaseModelProviderOptions) {
    this.supportedModels = [...options.models];
    this.maxTokensLimit = options.maxTokensLimit;
    this.retry = options.retry;
    this.generation = options.generation;
    this.logProvider = options.logProvider;
    this.sleep = options.sleep;
  }

  /**
   * Run one completion and return the reply text.
   * Must throw ProviderCallError with `transient` set for API failures.
   */
  protected abstract complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;

  createAgent(config: AgentConfig): AgentHandle {
    if (config.modelProvider !== this.provider) {
      throw new InvalidConfigError(
        `Provider "${this.provider}" cannot host an agent configured for "${config.modelProvider}"`
      );
    }
    if (!this.supportedModels.includes(config.modelId)) {
      throw new UnsupportedModelError(this.provider, config.modelId, this.supportedModels);
    }
    if (!Number.isFinite(config.temperature) || config.temperature < 0 || config.temperature > MAX_TEMPERATURE) {
      throw new InvalidConfigError(`temperature must be between 0 and ${MAX_TEMPERATURE}`, {
        temperature: config.temperature,
      });
    }
    if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1 || config.maxTokens > this.maxTokensLimit) {
      throw new InvalidConfigError(`maxTokens must be an integer between 1 and ${this.maxTokensLimit}`, {
        maxTokens: config.maxTokens,
      });
    }

    return {
      modelProvider: config.modelProvider,
      modelId: config.modelId,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      instructions: [...config.instructions],
    };
  }

  async validatePrompt(prompt: string, agent: AgentHandle, options?: CallOptions): Promise<ValidationResult> {
    if (prompt.trim().length < MIN_PROMPT_LENGTH) {
      return {
        isValid: false,
        confidenceScore: 0,
        issues: ['Prompt is too short to describe a project'],
        suggestions: ['Describe what the project does, who it is for and the main technologies'],
      };
    }

    const reply = await this.call(
      'validatePrompt',
      {
        model: agent.modelId,
        system: SYSTEM_PROMPTS.validation,
        user: validationPrompt(prompt),
        temperature: 0.1,
        maxTokens: 1000,
      },
      options
    );

    const verdict = parseReply(ValidationVerdictSchema, reply);
    if (!verdict) {
      this.logProvider?.warn('Unparseable validation reply', { provider: this.provider });
      return {
        isValid: false,
        confidenceScore: 0.5,
        issues: ['Could not interpret the validation response'],
        suggestions: ['Rephrase the prompt with more detail about the project'],
      };
    }

    return {
      isValid: verdict.is_valid,
      confidenceScore: verdict.confidence,
      issues: verdict.issues,
      suggestions: verdict.suggestions,
    };
  }

  async extractMetadata(prompt: string, agent: AgentHandle, options?: CallOptions): Promise<ProjectMetadata> {
    const reply = await this.call(
      'extractMetadata',
      {
        model: agent.modelId,
        system: SYSTEM_PROMPTS.metadata,
        user: metadataPrompt(prompt),
        temperature: 0.1,
        maxTokens: 800,
      },
      options
    );

    const parsed = parseReply(MetadataSchema, reply);
    if (!parsed) {
      throw new ProviderUnavailableError(`${this.provider} returned malformed project metadata`);
    }

    return {
      projectName: parsed.project_name,
      description: parsed.description,
      projectType: parsed.project_type,
      technologies: [...new Set(parsed.technologies.map((t) => t.trim()).filter((t) => t.length > 0))],
      complexityLevel: parsed.complexity_level,
      estimatedDuration: parsed.estimated_duration,
    };
  }

  async generateMarkdownDocument(
    input: GenerationInput,
    agent: AgentHandle,
    options?: CallOptions
  ): Promise<string> {
    const reply = await this.call(
      'generateMarkdownDocument',
      {
        model: agent.modelId,
        system: generationSystemPrompt(agent.instructions),
        user: generationPrompt(input),
        temperature: agent.temperature,
        maxTokens: agent.maxTokens,
      },
      options
    );

    const content = stripMarkdownFence(reply);
    if (content.length === 0) {
      throw new ProviderUnavailableError(`${this.provider} returned an empty document`);
    }

    const limit = this.generation.maxContentLength;
    if (content.length <= limit) return content;

    if (this.generation.contentOverflow === 'fail') {
      throw new ContentLimitError(content.length, limit);
    }
    this.logProvider?.warn('Generated content truncated', {
      provider: this.provider,
      length: content.length,
      limit,
    });
    return truncate(content, limit);
  }

  async analyzeQuality(document: QualityInput, agent: AgentHandle, options?: CallOptions): Promise<QualityReport> {
    const structural = structuralIssues(document.content);
    if (document.content.trim().length === 0) {
      return { qualityScore: 0, issues: structural };
    }
    const structuralScore = Math.max(0, 1 - 0.25 * structural.length);

    const reply = await this.call(
      'analyzeQuality',
      {
        model: agent.modelId,
        system: SYSTEM_PROMPTS.quality,
        user: qualityPrompt(document),
        temperature: 0.1,
        maxTokens: 800,
      },
      options
    );

    const verdict = parseReply(QualityVerdictSchema, reply);
    if (!verdict) {
      return { qualityScore: structuralScore, issues: structural };
    }

    return {
      qualityScore: round2((verdict.overall_score / 10 + structuralScore) / 2),
      issues: [...new Set([...structural, ...verdict.issues])],
    };
  }

  async improvePrompt(
    originalPrompt: string,
    agent: AgentHandle,
    validation?: ValidationResult,
    options?: CallOptions
  ): Promise<string> {
    const reply = await this.call(
      'improvePrompt',
      {
        model: agent.modelId,
        system: SYSTEM_PROMPTS.improvement,
        user: improvementPrompt(originalPrompt, validation),
        temperature: 0.3,
        maxTokens: 1000,
      },
      options
    );

    const improved = reply.trim();
    return improved.length > 0 ? improved : originalPrompt;
  }

  // ── Private ──

  private call(operation: string, request: CompletionRequest, options?: CallOptions): Promise<string> {
    const label = `${this.provider} ${operation}`;
    return withRetry((signal) => this.complete(request, signal), {
      ...this.retry,
      label,
      signal: options?.signal,
      sleep: this.sleep,
      onRetry: (attempt, error, delayMs) => {
        this.logProvider?.warn('Retrying provider call', {
          provider: this.provider,
          operation,
          attempt,
          delayMs,
          error: error.message,
        });
      },
    });
  }
}

function structuralIssues(content: string): string[] {
  if (content.trim().length === 0) return ['Document is empty'];

  const issues: string[] = [];
  if (!/^#{1,6}\s+\S/m.test(content)) {
    issues.push('Document has no Markdown headings');
  }
  if (countWords(content) < MIN_DOCUMENT_WORDS) {
    issues.push(`Document is shorter than ${MIN_DOCUMENT_WORDS} words`);
  }
  return issues;
}

/** Cut to at most `limit` UTF-16 units without splitting a surrogate pair. */
export function truncate(text: string, limit: number): string {
  const end = limit > 0 && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
  return text.slice(0, end);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

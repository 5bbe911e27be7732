/**
 * Document generation and lifecycle.
 *
 * Generation pipeline:
 *   1. Reject blank prompts and unknown document types
 *   2. Claim the agent (active → busy); one generation per agent at a time
 *   3. Validate the prompt, improving it once when it scores low
 *   4. Extract project metadata
 *   5. Persist a draft, move it to in_progress, generate
 *   6. Store the result as completed, or as failed with the error message
 *   7. Release the agent (busy → active) on every exit path
 */

import { randomUUID } from 'node:crypto';
import type { IAgentRepository } from '../repositories/IAgentRepository.js';
import type { IDocumentRepository } from '../repositories/IDocumentRepository.js';
import type { ProviderRegistry } from '../providers/ProviderRegistry.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AgentHandle, CallOptions, IModelProvider } from '../providers/IModelProvider.js';
import type { GenerationSettings } from '../config.js';
import type { AgentRow, DocumentRow, NewDocumentRow } from '../types/database.js';
import {
  DOCUMENT_STATUSES,
  DOCUMENT_TYPES,
  type DocumentStatus,
  type ProjectMetadata,
} from '../types/models.js';
import type {
  DocumentResponse,
  GenerateDocumentRequest,
  ListDocumentsRequest,
  ListResponse,
  QualityResponse,
  UpdateDocumentRequest,
} from '../types/api.js';
import {
  AgentBusyError,
  AppError,
  CancelledError,
  ContentLimitError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import { EDITABLE_DOCUMENT_STATUSES, canTransitionDocument, documentTitle } from './lifecycle.js';
import { documentToResponse, metadataToColumn, rowToDocument, rowToHandle } from './mappers.js';
import { resolvePagination } from './pagination.js';

const MAX_PROJECT_NAME_LENGTH = 200;
const MAX_TITLE_LENGTH = 300;

interface ClaimedAgent {
  row: AgentRow;
  adapter: IModelProvider;
  handle: AgentHandle;
}

export class DocumentService {
  constructor(
    private readonly agentRepo: IAgentRepository,
    private readonly documentRepo: IDocumentRepository,
    private readonly providers: ProviderRegistry,
    private readonly logProvider: ILogProvider,
    private readonly settings: GenerationSettings
  ) {}

  async generateDocument(input: GenerateDocumentRequest, signal?: AbortSignal): Promise<DocumentResponse> {
    this.validateGenerate(input);
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const agent = await this.claimAgent(input.agentId);
    try {
      return await this.runGeneration(input, agent, { signal });
    } finally {
      await this.releaseAgent(agent.row.id);
    }
  }

  async getDocument(id: string): Promise<DocumentResponse> {
    return documentToResponse(rowToDocument(await this.requireDocument(id)));
  }

  async listDocuments(input: ListDocumentsRequest): Promise<ListResponse<DocumentResponse>> {
    if (input.documentType !== undefined && !DOCUMENT_TYPES.includes(input.documentType)) {
      throw new ValidationError(`documentType must be one of: ${DOCUMENT_TYPES.join(', ')}`);
    }
    if (input.status !== undefined && !DOCUMENT_STATUSES.includes(input.status)) {
      throw new ValidationError(`status must be one of: ${DOCUMENT_STATUSES.join(', ')}`);
    }

    const page = resolvePagination(input);
    const rows = await this.documentRepo.list(
      {
        documentType: input.documentType,
        status: input.status,
        agentId: input.agentId,
        projectName: input.projectName,
      },
      page
    );

    return { items: rows.map((r) => documentToResponse(rowToDocument(r))), ...page };
  }

  /** Manual edit. The word count follows the new content. */
  async updateDocumentContent(id: string, input: UpdateDocumentRequest): Promise<DocumentResponse> {
    if (typeof input.content !== 'string') {
      throw new ValidationError('content must be a string');
    }
    if (input.content.length > this.settings.maxContentLength) {
      throw new ContentLimitError(input.content.length, this.settings.maxContentLength);
    }
    if (input.title !== undefined && (input.title.trim().length === 0 || input.title.length > MAX_TITLE_LENGTH)) {
      throw new ValidationError(`title must be between 1 and ${MAX_TITLE_LENGTH} characters`);
    }

    const current = await this.requireDocument(id);
    if (!EDITABLE_DOCUMENT_STATUSES.includes(current.status)) {
      throw new InvalidStateError(`Document in status ${current.status} cannot be edited`, {
        status: current.status,
      });
    }

    const updated = await this.documentRepo.update(
      id,
      {
        content: input.content,
        ...(input.title !== undefined && { title: input.title.trim() }),
      },
      EDITABLE_DOCUMENT_STATUSES
    );
    if (!updated) {
      throw await this.lostUpdateError(id, 'edited');
    }
    return documentToResponse(rowToDocument(updated));
  }

  reviewDocument(id: string): Promise<DocumentResponse> {
    return this.transition(id, 'reviewing');
  }

  publishDocument(id: string): Promise<DocumentResponse> {
    return this.transition(id, 'published');
  }

  async deleteDocument(id: string): Promise<boolean> {
    const deleted = await this.documentRepo.delete(id);
    if (deleted) {
      this.logProvider.info('Document deleted', { documentId: id });
    }
    return deleted;
  }

  /** Score a stored document with `agentId`, or with the agent that generated it. */
  async analyzeQuality(documentId: string, agentId?: string, signal?: AbortSignal): Promise<QualityResponse> {
    const document = await this.requireDocument(documentId);
    const ownerId = agentId ?? document.generating_agent_id;
    const agent = await this.agentRepo.findById(ownerId);
    if (!agent) {
      throw new NotFoundError(`Agent "${ownerId}" not found`);
    }

    const report = await this.providers.resolve(agent.model_provider).analyzeQuality(
      { title: document.title, documentType: document.document_type, content: document.content },
      rowToHandle(agent),
      { signal }
    );

    this.logProvider.info('Document quality analyzed', {
      documentId,
      agentId: agent.id,
      qualityScore: report.qualityScore,
    });

    return { documentId, qualityScore: report.qualityScore, issues: report.issues };
  }

  // ── Generation ──

  private async runGeneration(
    input: GenerateDocumentRequest,
    agent: ClaimedAgent,
    options: CallOptions
  ): Promise<DocumentResponse> {
    const { adapter, handle } = agent;
    const log = { agentId: agent.row.id, documentType: input.documentType };

    this.logProvider.info('Document generation started', log);

    const prompt = await this.preparePrompt(input.prompt, adapter, handle, options, log);
    const metadata = await this.resolveMetadata(prompt, input, adapter, handle, options);

    const draft: NewDocumentRow = {
      id: randomUUID(),
      title: documentTitle(metadata.projectName, input.documentType),
      content: '',
      document_type: input.documentType,
      status: 'draft',
      generating_agent_id: agent.row.id,
      project_metadata: metadataToColumn(metadata),
      error_message: null,
    };
    await this.documentRepo.insert(draft);
    await this.save({ ...draft, status: 'in_progress' });

    const generationInput = {
      prompt: input.additionalContext?.trim()
        ? `${prompt}\n\nAdditional context:\n${input.additionalContext.trim()}`
        : prompt,
      documentType: input.documentType,
      metadata,
    };

    let content: string;
    try {
      content = await adapter.generateMarkdownDocument(generationInput, handle, options);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      try {
        await this.save({ ...draft, status: 'failed', error_message: message });
      } catch (saveErr) {
        this.logProvider.error('Failed to store failed document', {
          ...log,
          documentId: draft.id,
          error: saveErr instanceof Error ? saveErr.message : String(saveErr),
        });
      }
      this.logProvider.error('Document generation failed', { ...log, documentId: draft.id, error: message });
      if (err instanceof AppError) {
        err.details = { ...err.details, documentId: draft.id };
      }
      throw err;
    }

    const completed = await this.save({ ...draft, status: 'completed', content });
    this.logProvider.info('Document generation completed', {
      ...log,
      documentId: completed.id,
      wordCount: completed.word_count,
    });

    return documentToResponse(rowToDocument(completed));
  }

  /** Returns the prompt generation should use. */
  private async preparePrompt(
    prompt: string,
    adapter: IModelProvider,
    handle: AgentHandle,
    options: CallOptions,
    log: Record<string, unknown>
  ): Promise<string> {
    const validation = await adapter.validatePrompt(prompt, handle, options);
    const weak = !validation.isValid || validation.confidenceScore < this.settings.qualityThreshold;

    if (weak && this.settings.autoImprovePrompts) {
      const improved = await adapter.improvePrompt(prompt, handle, validation, options);
      this.logProvider.info('Prompt improved before generation', {
        ...log,
        confidenceScore: validation.confidenceScore,
      });
      return improved;
    }

    if (!validation.isValid) {
      throw new ValidationError('Prompt is not specific enough to generate a document', {
        confidenceScore: validation.confidenceScore,
        issues: validation.issues,
        suggestions: validation.suggestions,
      });
    }
    return prompt;
  }

  private async resolveMetadata(
    prompt: string,
    input: GenerateDocumentRequest,
    adapter: IModelProvider,
    handle: AgentHandle,
    options: CallOptions
  ): Promise<ProjectMetadata> {
    const metadata = await adapter.extractMetadata(prompt, handle, options);
    const projectName = input.projectName?.trim();
    return projectName ? { ...metadata, projectName } : metadata;
  }

  /**
   * Write the full document state. A row evicted while generation ran is
   * inserted again so the result is not lost.
   */
  private async save(row: NewDocumentRow): Promise<DocumentRow> {
    const updated = await this.documentRepo.update(row.id, {
      title: row.title,
      content: row.content,
      document_type: row.document_type,
      status: row.status,
      project_metadata: row.project_metadata,
      error_message: row.error_message,
    });
    if (updated) return updated;

    this.logProvider.warn('Document evicted during generation; storing it again', { documentId: row.id });
    return this.documentRepo.insert(row);
  }

  // ── Agent claim ──

  private async claimAgent(agentId: string): Promise<ClaimedAgent> {
    const row = await this.agentRepo.compareAndSetStatus(agentId, ['active'], 'busy');
    if (!row) {
      const current = await this.agentRepo.findById(agentId);
      if (!current) {
        throw new NotFoundError(`Agent "${agentId}" not found`);
      }
      if (current.status === 'busy') {
        throw new AgentBusyError(agentId);
      }
      throw new InvalidStateError(`Agent "${agentId}" is ${current.status}; only active agents can generate`, {
        status: current.status,
      });
    }

    try {
      return { row, adapter: this.providers.resolve(row.model_provider), handle: rowToHandle(row) };
    } catch (err) {
      await this.releaseAgent(agentId);
      throw err;
    }
  }

  /** busy → active, unless someone moved the agent to error meanwhile. */
  private async releaseAgent(agentId: string): Promise<void> {
    try {
      const released = await this.agentRepo.compareAndSetStatus(agentId, ['busy'], 'active');
      if (!released) {
        this.logProvider.info('Agent left its busy state during generation', { agentId });
      }
    } catch (err) {
      this.logProvider.error('Failed to release agent', {
        agentId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // ── Private ──

  private async transition(id: string, to: DocumentStatus): Promise<DocumentResponse> {
    const current = await this.requireDocument(id);
    if (!canTransitionDocument(current.status, to)) {
      throw new InvalidStateError(`Document cannot move from ${current.status} to ${to}`, {
        from: current.status,
        to,
      });
    }

    const updated = await this.documentRepo.update(id, { status: to }, [current.status]);
    if (!updated) {
      throw await this.lostUpdateError(id, `moved to ${to}`);
    }
    this.logProvider.info('Document status changed', { documentId: id, from: current.status, to });
    return documentToResponse(rowToDocument(updated));
  }

  /** Why a guarded write matched no row: the document is gone, or its status moved on. */
  private async lostUpdateError(id: string, action: string): Promise<AppError> {
    const current = await this.documentRepo.findById(id);
    if (!current) {
      return new NotFoundError(`Document "${id}" not found`);
    }
    return new InvalidStateError(`Document in status ${current.status} cannot be ${action}`, {
      status: current.status,
    });
  }

  private async requireDocument(id: string): Promise<DocumentRow> {
    const row = await this.documentRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Document "${id}" not found`);
    }
    return row;
  }

  private validateGenerate(input: GenerateDocumentRequest): void {
    if (typeof input.prompt !== 'string' || input.prompt.trim().length === 0) {
      throw new ValidationError('prompt is required');
    }
    if (!DOCUMENT_TYPES.includes(input.documentType)) {
      throw new ValidationError(`documentType must be one of: ${DOCUMENT_TYPES.join(', ')}`);
    }
    if (typeof input.agentId !== 'string' || input.agentId.length === 0) {
      throw new ValidationError('agentId is required');
    }
    if (input.projectName !== undefined && input.projectName.length > MAX_PROJECT_NAME_LENGTH) {
      throw new ValidationError(`projectName must be ${MAX_PROJECT_NAME_LENGTH} characters or less`);
    }
  }
}

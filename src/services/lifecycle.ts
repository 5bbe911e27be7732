/**
 * Agent and document state machines, plus the derived document fields.
 */

import type { AgentStatus, DocumentStatus, DocumentType } from '../types/models.js';

/**
 * Status changes a caller may request explicitly.
 * `active ⇄ busy` is reserved for generation and never appears here.
 */
const AGENT_TRANSITIONS: Record<AgentStatus, readonly AgentStatus[]> = {
  inactive: ['active', 'error'],
  active: ['inactive', 'error'],
  busy: ['error'],
  error: ['maintenance'],
  maintenance: ['active', 'error'],
};

const DOCUMENT_TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  draft: ['in_progress'],
  in_progress: ['completed', 'failed'],
  completed: ['reviewing'],
  reviewing: ['published'],
  failed: [],
  published: [],
};

/** Statuses a caller may assign when creating an agent. */
export const INITIAL_AGENT_STATUSES: readonly AgentStatus[] = [
  'inactive',
  'active',
  'error',
  'maintenance',
];

/** Document content may only be edited while the document is in one of these. */
export const EDITABLE_DOCUMENT_STATUSES: readonly DocumentStatus[] = ['draft', 'completed', 'reviewing'];

export function canTransitionAgent(from: AgentStatus, to: AgentStatus): boolean {
  return AGENT_TRANSITIONS[from].includes(to);
}

export function canTransitionDocument(from: DocumentStatus, to: DocumentStatus): boolean {
  return DOCUMENT_TRANSITIONS[from].includes(to);
}

/** Whitespace-token count. Blank content counts as zero words. */
export function countWords(content: string): number {
  const trimmed = content.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/** "api_documentation" → "Api Documentation" */
export function documentTypeLabel(documentType: DocumentType): string {
  return documentType
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function documentTitle(projectName: string, documentType: DocumentType): string {
  return `${projectName} - ${documentTypeLabel(documentType)}`;
}

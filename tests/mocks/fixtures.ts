/**
 * Shared wiring for service and router tests: in-memory repositories,
 * a buffered logger and one scripted provider per model provider.
 */

import { InMemoryAgentRepository } from '../../src/repositories/InMemoryAgentRepository.js';
import { InMemoryDocumentRepository } from '../../src/repositories/InMemoryDocumentRepository.js';
import { ProviderRegistry } from '../../src/providers/ProviderRegistry.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { DEFAULT_GENERATION_SETTINGS, type GenerationSettings } from '../../src/config.js';
import type { NewAgentRow, NewDocumentRow } from '../../src/types/database.js';
import { MockModelProvider } from './MockModelProvider.js';

export interface TestBed {
  agentRepo: InMemoryAgentRepository;
  documentRepo: InMemoryDocumentRepository;
  logProvider: ConsoleLogProvider;
  groq: MockModelProvider;
  openai: MockModelProvider;
  providers: ProviderRegistry;
  generation: GenerationSettings;
}

export function createTestBed(options: { maxItems?: number; generation?: Partial<GenerationSettings> } = {}): TestBed {
  const logProvider = new ConsoleLogProvider();
  const generation = { ...DEFAULT_GENERATION_SETTINGS, ...options.generation };
  const groq = new MockModelProvider({ provider: 'groq', generation, logProvider });
  const openai = new MockModelProvider({ provider: 'openai', generation, logProvider });

  return {
    agentRepo: new InMemoryAgentRepository({ maxItems: options.maxItems ?? 100 }),
    documentRepo: new InMemoryDocumentRepository({ maxItems: options.maxItems ?? 100 }),
    logProvider,
    groq,
    openai,
    providers: new ProviderRegistry([groq, openai]),
    generation,
  };
}

export function agentRow(overrides: Partial<NewAgentRow> = {}): NewAgentRow {
  return {
    id: 'agent-1',
    name: 'Readme Writer',
    description: 'Writes READMEs',
    agent_type: 'markdown_generator',
    model_provider: 'groq',
    model_id: 'llama-3.1-8b-instant',
    temperature: 0.3,
    max_tokens: 4000,
    instructions: [],
    status: 'active',
    ...overrides,
  };
}

export function documentRow(overrides: Partial<NewDocumentRow> = {}): NewDocumentRow {
  return {
    id: 'doc-1',
    title: 'TaskFlow - Readme',
    content: '# TaskFlow\n\nA task tracker.',
    document_type: 'readme',
    status: 'completed',
    generating_agent_id: 'agent-1',
    project_metadata: null,
    error_message: null,
    ...overrides,
  };
}

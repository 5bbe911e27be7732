/**
 * Production container.
 * Configuration comes from the environment; repositories are in-memory
 * unless AGENTS_STORAGE=supabase.
 */

import { createClient } from '@supabase/supabase-js';
import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConsoleLogProvider, createProviderRegistry, type ILogProvider } from './providers/index.js';
import type { IAgentRepository } from './repositories/IAgentRepository.js';
import type { IDocumentRepository } from './repositories/IDocumentRepository.js';
import { InMemoryAgentRepository } from './repositories/InMemoryAgentRepository.js';
import { InMemoryDocumentRepository } from './repositories/InMemoryDocumentRepository.js';
import { SupabaseAgentRepository } from './repositories/SupabaseAgentRepository.js';
import { SupabaseDocumentRepository } from './repositories/SupabaseDocumentRepository.js';

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const logProvider = new ConsoleLogProvider({ outputToConsole: config.logToConsole, minLevel: 'info' });
  const providers = createProviderRegistry(config, logProvider);

  if (providers.list().length === 0) {
    logProvider.warn('No model provider has an API key; generation endpoints will fail', {});
  }

  cached = createContainer({
    ...createRepositories(config, logProvider),
    providers,
    logProvider,
    generation: config.generation,
  });

  return cached;
}

/** Drop the cached container. Tests use this between environments. */
export function resetProductionContainer(): void {
  cached = null;
}

function createRepositories(
  config: AppConfig,
  logProvider: ILogProvider
): { agentRepo: IAgentRepository; documentRepo: IDocumentRepository } {
  const agentOptions = {
    maxItems: config.repositoryMaxItems,
    onEvict: (row: { id: string }) => logProvider.warn('Agent evicted at capacity', { agentId: row.id }),
  };
  const documentOptions = {
    maxItems: config.repositoryMaxItems,
    onEvict: (row: { id: string }) => logProvider.warn('Document evicted at capacity', { documentId: row.id }),
  };

  if (config.storage === 'supabase' && config.supabase) {
    const db = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
      auth: { persistSession: false },
    });
    return {
      agentRepo: new SupabaseAgentRepository(db, agentOptions),
      documentRepo: new SupabaseDocumentRepository(db, documentOptions),
    };
  }

  return {
    agentRepo: new InMemoryAgentRepository(agentOptions),
    documentRepo: new InMemoryDocumentRepository(documentOptions),
  };
}

/**
 * Dependency wiring.
 * Constructs every service from its repositories and providers. Production
 * passes Supabase or in-memory repositories and real provider adapters;
 * tests pass in-memory stand-ins.
 */

import type { IAgentRepository } from './repositories/IAgentRepository.js';
import type { IDocumentRepository } from './repositories/IDocumentRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ProviderRegistry } from './providers/ProviderRegistry.js';
import type { Middleware } from './middleware/pipeline.js';
import type { GenerationSettings } from './config.js';
import { DEFAULT_GENERATION_SETTINGS } from './config.js';
import { AgentService } from './services/AgentService.js';
import { DocumentService } from './services/DocumentService.js';
import { PromptService } from './services/PromptService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  agentService: AgentService;
  documentService: DocumentService;
  promptService: PromptService;
  providers: ProviderRegistry;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  agentRepo: IAgentRepository;
  documentRepo: IDocumentRepository;
  providers: ProviderRegistry;
  logProvider: ILogProvider;
  generation?: GenerationSettings;
}): Container {
  const agentService = new AgentService(deps.agentRepo, deps.providers, deps.logProvider);
  const documentService = new DocumentService(
    deps.agentRepo,
    deps.documentRepo,
    deps.providers,
    deps.logProvider,
    deps.generation ?? DEFAULT_GENERATION_SETTINGS
  );
  const promptService = new PromptService(deps.agentRepo, deps.providers, deps.logProvider);
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    agentService,
    documentService,
    promptService,
    providers: deps.providers,
    logProvider: deps.logProvider,
    logging,
  };
}

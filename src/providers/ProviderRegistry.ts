/**
 * Provider selection.
 * Built once at startup from the configured providers and never modified,
 * so lookups need no synchronization.
 */

import { UnsupportedProviderError } from '../errors.js';
import type { AppConfig } from '../config.js';
import { PROVIDER_MAX_TOKENS } from '../config.js';
import { MODEL_PROVIDERS, type ModelProvider } from '../types/models.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import type { ILogProvider } from './ILogProvider.js';
import type { IModelProvider } from './IModelProvider.js';
import { OpenAICompatibleProvider } from './OpenAICompatibleProvider.js';

export class ProviderRegistry {
  private readonly providers: ReadonlyMap<ModelProvider, IModelProvider>;

  constructor(providers: Iterable<IModelProvider>) {
    const map = new Map<ModelProvider, IModelProvider>();
    for (const provider of providers) {
      map.set(provider.provider, provider);
    }
    this.providers = map;
  }

  /** @throws UnsupportedProviderError */
  resolve(provider: string): IModelProvider {
    const adapter = isModelProvider(provider) ? this.providers.get(provider) : undefined;
    if (!adapter) {
      throw new UnsupportedProviderError(provider);
    }
    return adapter;
  }

  has(provider: string): boolean {
    return isModelProvider(provider) && this.providers.has(provider);
  }

  /** Registered providers, in declaration order. */
  list(): IModelProvider[] {
    return MODEL_PROVIDERS.flatMap((p) => {
      const adapter = this.providers.get(p);
      return adapter ? [adapter] : [];
    });
  }
}

export function isModelProvider(value: string): value is ModelProvider {
  return (MODEL_PROVIDERS as readonly string[]).includes(value);
}

/** Build the registry for every provider that has credentials in `config`. */
export function createProviderRegistry(config: AppConfig, logProvider?: ILogProvider): ProviderRegistry {
  const shared = {
    retry: config.retry,
    generation: config.generation,
    logProvider,
  };

  const adapters: IModelProvider[] = [];

  for (const provider of MODEL_PROVIDERS) {
    const settings = config.providers[provider];
    if (!settings) continue;

    const base = {
      ...shared,
      models: settings.models,
      maxTokensLimit: PROVIDER_MAX_TOKENS[provider],
      apiKey: settings.apiKey,
      baseUrl: settings.baseUrl,
    };

    adapters.push(
      provider === 'anthropic'
        ? new AnthropicProvider(base)
        : new OpenAICompatibleProvider({ ...base, provider })
    );
  }

  return new ProviderRegistry(adapters);
}

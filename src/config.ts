/**
 * Process configuration.
 * Read from the environment once at startup; read-only afterwards.
 */

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import type { ModelProvider } from './types/models.js';

export const DEFAULT_SUPPORTED_MODELS: Record<ModelProvider, readonly string[]> = {
  groq: [
    'llama-3.1-405b-reasoning',
    'llama-3.1-8b-instant',
    'llama-3.2-1b-preview',
    'llama-3.2-3b-preview',
    'llama-3.2-11b-text-preview',
    'llama-3.2-90b-text-preview',
    'llama-3.3-70b-versatile',
    'llama3-groq-70b-8192-tool-use-preview',
    'llama3-groq-8b-8192-tool-use-preview',
    'llama3-70b-8192',
    'llama3-8b-8192',
    'mixtral-8x7b-32768',
    'gemma2-9b-it',
    'meta-llama/llama-4-scout-17b-16e-instruct',
  ],
  openai: ['gpt-4o', 'gpt-4o-mini', 'gpt-4.1', 'gpt-4.1-mini', 'gpt-4-turbo', 'gpt-4', 'gpt-3.5-turbo'],
  anthropic: [
    'claude-3-5-sonnet-latest',
    'claude-3-5-haiku-latest',
    'claude-3-opus-latest',
    'claude-3-haiku-20240307',
    'claude-sonnet-4-20250514',
  ],
};

/** Output-token ceiling each provider accepts for a single completion. */
export const PROVIDER_MAX_TOKENS: Record<ModelProvider, number> = {
  groq: 8192,
  openai: 16384,
  anthropic: 8192,
};

const DEFAULT_BASE_URLS: Partial<Record<ModelProvider, string>> = {
  groq: 'https://api.groq.com/openai/v1',
  anthropic: 'https://api.anthropic.com',
};

export interface ProviderSettings {
  apiKey: string;
  /** Undefined means the client library's default endpoint. */
  baseUrl?: string;
  models: readonly string[];
}

export type ContentOverflowPolicy = 'truncate' | 'fail';

export interface GenerationSettings {
  maxContentLength: number;
  contentOverflow: ContentOverflowPolicy;
  /** Prompts scoring below this are improved when autoImprovePrompts is on. */
  qualityThreshold: number;
  autoImprovePrompts: boolean;
}

export interface RetryPolicy {
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Total attempts, including the first. */
  attempts: number;
  /** Base delay; doubled after every failed attempt. */
  delayMs: number;
}

export interface AppConfig {
  /** Only providers with an API key are present. */
  providers: Partial<Record<ModelProvider, ProviderSettings>>;
  generation: GenerationSettings;
  retry: RetryPolicy;
  repositoryMaxItems: number;
  storage: 'memory' | 'supabase';
  supabase: { url: string; serviceRoleKey: string } | null;
  logToConsole: boolean;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  maxContentLength: 50_000,
  contentOverflow: 'truncate',
  qualityThreshold: 0.7,
  autoImprovePrompts: true,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: 30_000,
  attempts: 3,
  delayMs: 1_000,
};

export const DEFAULT_REPOSITORY_MAX_ITEMS = 10_000;

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const modelList = z
  .string()
  .optional()
  .transform((v) =>
    v
      ? v
          .split(',')
          .map((m) => m.trim())
          .filter((m) => m.length > 0)
      : undefined
  );

const EnvSchema = z.object({
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: optionalString.pipe(z.string().url().optional()),
  GROQ_MODELS: modelList,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_MODELS: modelList,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_BASE_URL: optionalString.pipe(z.string().url().optional()),
  ANTHROPIC_MODELS: modelList,
  AGENTS_MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(DEFAULT_GENERATION_SETTINGS.maxContentLength),
  AGENTS_CONTENT_OVERFLOW: z.enum(['truncate', 'fail']).default(DEFAULT_GENERATION_SETTINGS.contentOverflow),
  AGENTS_QUALITY_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_GENERATION_SETTINGS.qualityThreshold),
  AGENTS_AUTO_IMPROVE_PROMPTS: flag.default('true'),
  AGENTS_REPOSITORY_MAX_ITEMS: z.coerce.number().int().positive().default(DEFAULT_REPOSITORY_MAX_ITEMS),
  AGENTS_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_RETRY_POLICY.timeoutMs),
  AGENTS_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_RETRY_POLICY.attempts),
  AGENTS_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.delayMs),
  AGENTS_STORAGE: z.enum(['memory', 'supabase']).default('memory'),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  LOG_TO_CONSOLE: flag.default('true'),
});

type Env = z.infer<typeof EnvSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidConfigError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }

  const e = parsed.data;

  if (e.AGENTS_STORAGE === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new InvalidConfigError(
      'AGENTS_STORAGE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  return {
    providers: providerSettings(e),
    generation: {
      maxContentLength: e.AGENTS_MAX_CONTENT_LENGTH,
      contentOverflow: e.AGENTS_CONTENT_OVERFLOW,
      qualityThreshold: e.AGENTS_QUALITY_THRESHOLD,
      autoImprovePrompts: e.AGENTS_AUTO_IMPROVE_PROMPTS,
    },
    retry: {
      timeoutMs: e.AGENTS_PROVIDER_TIMEOUT_MS,
      attempts: e.AGENTS_RETRY_ATTEMPTS,
      delayMs: e.AGENTS_RETRY_DELAY_MS,
    },
    repositoryMaxItems: e.AGENTS_REPOSITORY_MAX_ITEMS,
    storage: e.AGENTS_STORAGE,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    logToConsole: e.LOG_TO_CONSOLE,
  };
}

function providerSettings(e: Env): Partial<Record<ModelProvider, ProviderSettings>> {
  const entries: Array<[ModelProvider, string | undefined, string | undefined, string[] | undefined]> = [
    ['groq', e.GROQ_API_KEY, e.GROQ_BASE_URL, e.GROQ_MODELS],
    ['openai', e.OPENAI_API_KEY, e.OPENAI_BASE_URL, e.OPENAI_MODELS],
    ['anthropic', e.ANTHROPIC_API_KEY, e.ANTHROPIC_BASE_URL, e.ANTHROPIC_MODELS],
  ];

  const result: Partial<Record<ModelProvider, ProviderSettings>> = {};
  for (const [provider, apiKey, baseUrl, models] of entries) {
    if (!apiKey) continue;
    result[provider] = {
      apiKey,
      baseUrl: baseUrl ?? DEFAULT_BASE_URLS[provider],
      models: models && models.length > 0 ? models : DEFAULT_SUPPORTED_MODELS[provider],
    };
  }
  return result;
}

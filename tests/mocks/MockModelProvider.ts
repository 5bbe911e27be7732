/**
 * Scripted model provider.
 * Runs the real BaseModelProvider logic (config checks, parsing, retries)
 * over canned replies instead of an HTTP API. Replies are queued per
 * operation; when a queue is empty the operation's default reply is used.
 */

import { BaseModelProvider, type CompletionRequest } from '../../src/providers/BaseModelProvider.js';
import { SYSTEM_PROMPTS } from '../../src/providers/prompts.js';
import {
  DEFAULT_GENERATION_SETTINGS,
  DEFAULT_SUPPORTED_MODELS,
  PROVIDER_MAX_TOKENS,
  type GenerationSettings,
  type RetryPolicy,
} from '../../src/config.js';
import type { ILogProvider } from '../../src/providers/ILogProvider.js';
import type { ModelProvider } from '../../src/types/models.js';

export type Operation = 'validation' | 'metadata' | 'generation' | 'quality' | 'improvement';

export type ScriptedReply =
  | string
  | Error
  | ((request: CompletionRequest, signal: AbortSignal) => Promise<string>);

export const DEFAULT_REPLIES: Record<Operation, string> = {
  validation: '{"is_valid": true, "confidence": 0.9, "issues": [], "suggestions": []}',
  metadata: JSON.stringify({
    project_name: 'TaskFlow',
    description: 'A task tracker for small teams',
    project_type: 'web_app',
    technologies: ['React', 'Node.js'],
    complexity_level: 'medium',
    estimated_duration: '6 weeks',
  }),
  generation: '# TaskFlow\n\n## Overview\n\nTaskFlow helps small teams track their work.',
  quality: '{"overall_score": 8, "issues": []}',
  improvement: 'Write a README for TaskFlow, a React and Node.js task tracker for small teams.',
};

export const TEST_RETRY_POLICY: RetryPolicy = { timeoutMs: 1000, attempts: 3, delayMs: 0 };

export interface MockModelProviderOptions {
  provider?: ModelProvider;
  models?: readonly string[];
  generation?: Partial<GenerationSettings>;
  retry?: Partial<RetryPolicy>;
  logProvider?: ILogProvider;
}

export class MockModelProvider extends BaseModelProvider {
  readonly provider: ModelProvider;
  readonly calls: Array<{ operation: Operation; request: CompletionRequest }> = [];
  private readonly queues = new Map<Operation, ScriptedReply[]>();

  constructor(options: MockModelProviderOptions = {}) {
    const provider = options.provider ?? 'groq';
    super({
      models: options.models ?? DEFAULT_SUPPORTED_MODELS[provider],
      maxTokensLimit: PROVIDER_MAX_TOKENS[provider],
      retry: { ...TEST_RETRY_POLICY, ...options.retry },
      generation: { ...DEFAULT_GENERATION_SETTINGS, ...options.generation },
      logProvider: options.logProvider,
      sleep: async () => {},
    });
    this.provider = provider;
  }

  /** Queue replies for an operation, consumed in order. */
  reply(operation: Operation, ...replies: ScriptedReply[]): this {
    const queue = this.queues.get(operation) ?? [];
    queue.push(...replies);
    this.queues.set(operation, queue);
    return this;
  }

  callsFor(operation: Operation): CompletionRequest[] {
    return this.calls.filter((c) => c.operation === operation).map((c) => c.request);
  }

  protected async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const operation = operationOf(request.system);
    this.calls.push({ operation, request });

    const next = this.queues.get(operation)?.shift() ?? DEFAULT_REPLIES[operation];
    if (typeof next === 'string') return next;
    if (next instanceof Error) throw next;
    return next(request, signal);
  }
}

function operationOf(system: string): Operation {
  switch (system) {
    case SYSTEM_PROMPTS.validation:
      return 'validation';
    case SYSTEM_PROMPTS.metadata:
      return 'metadata';
    case SYSTEM_PROMPTS.quality:
      return 'quality';
    case SYSTEM_PROMPTS.improvement:
      return 'improvement';
    default:
      return 'generation';
  }
}

/** A promise with its resolver exposed, for holding a call open. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

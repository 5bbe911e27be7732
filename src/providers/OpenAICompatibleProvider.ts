/**
 * Provider for OpenAI-shaped chat completion APIs.
 * Serves both OpenAI and Groq; they differ only in base URL, key and model list.
 */

import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ModelProvider } from '../types/models.js';
import { BaseModelProvider, type BaseModelProviderOptions, type CompletionRequest } from './BaseModelProvider.js';
import { ProviderCallError } from './retry.js';

/** The one client call this provider makes. */
export type CreateChatCompletion = (
  body: ChatCompletionCreateParamsNonStreaming,
  options: { signal: AbortSignal; timeout: number }
) => Promise<ChatCompletion>;

export interface OpenAICompatibleProviderOptions extends BaseModelProviderOptions {
  provider: Extract<ModelProvider, 'openai' | 'groq'>;
  apiKey: string;
  /** Omit for api.openai.com. */
  baseUrl?: string;
  /** Replaces the SDK client call; tests script replies with it. */
  createCompletion?: CreateChatCompletion;
}

export class OpenAICompatibleProvider extends BaseModelProvider {
  readonly provider: Extract<ModelProvider, 'openai' | 'groq'>;
  private readonly createCompletion: CreateChatCompletion;

  constructor(options: OpenAICompatibleProviderOptions) {
    super(options);
    this.provider = options.provider;

    if (options.createCompletion) {
      this.createCompletion = options.createCompletion;
    } else {
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        // Retries are owned by withRetry so every provider shares one policy.
        maxRetries: 0,
      });
      this.createCompletion = (body, requestOptions) => client.chat.completions.create(body, requestOptions);
    }
  }

  protected async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    try {
      const response = await this.createCompletion(
        {
          model: request.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal, timeout: this.retry.timeoutMs }
      );

      return response.choices[0]?.message.content ?? '';
    } catch (err) {
      throw classifyError(err);
    }
  }
}

function classifyError(err: unknown): ProviderCallError {
  if (err instanceof OpenAI.APIUserAbortError) {
    return new ProviderCallError('request aborted', false);
  }
  // Connection failures and SDK-side timeouts carry no status.
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderCallError(err.message, true);
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const transient = status === undefined || status === 429 || status >= 500;
    return new ProviderCallError(err.message, transient, status);
  }
  return new ProviderCallError(err instanceof Error ? err.message : String(err), false);
}

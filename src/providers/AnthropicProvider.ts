/**
 * Anthropic provider.
 * Calls the Messages API directly with fetch; no SDK dependency.
 */

import type { BaseModelProviderOptions, CompletionRequest } from './BaseModelProvider.js';
import { BaseModelProvider } from './BaseModelProvider.js';
import { ProviderCallError } from './retry.js';

const DEFAULT_BASE_URL = 'https://api.anthropic.com';
const API_VERSION = '2023-06-01';
/** Error bodies are cut to this length before they reach a message. */
const MAX_ERROR_BODY = 200;

interface AnthropicContentBlock {
  type?: string;
  text?: string;
}

interface AnthropicResponse {
  content?: AnthropicContentBlock[];
}

export interface AnthropicProviderOptions extends BaseModelProviderOptions {
  apiKey: string;
  baseUrl?: string;
}

export class AnthropicProvider extends BaseModelProvider {
  readonly provider = 'anthropic' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: AnthropicProviderOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  protected async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        signal,
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify({
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: anthropicTemperature(request.temperature),
          system: request.system,
          messages: [{ role: 'user', content: request.user }],
        }),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ProviderCallError('request aborted', false);
      }
      // fetch rejects only on network failure
      throw new ProviderCallError(err instanceof Error ? err.message : String(err), true);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      const transient = res.status === 429 || res.status >= 500;
      throw new ProviderCallError(
        `Anthropic API error (${res.status}): ${body.slice(0, MAX_ERROR_BODY)}`,
        transient,
        res.status
      );
    }

    const data = (await res.json()) as AnthropicResponse;
    return (data.content ?? [])
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => block.text)
      .join('');
  }
}

/**
 * Agents take temperatures in 0..2; the Messages API accepts 0..1.
 * The agent's range is halved so relative settings keep their order.
 */
export function anthropicTemperature(temperature: number): number {
  return Math.min(1, Math.max(0, temperature / 2));
}

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { AnthropicProvider, anthropicTemperature } from '../../src/providers/AnthropicProvider.js';
import { DEFAULT_GENERATION_SETTINGS, DEFAULT_SUPPORTED_MODELS } from '../../src/config.js';
import { ProviderUnavailableError } from '../../src/errors.js';
import type { AgentHandle } from '../../src/providers/IModelProvider.js';

const agent: AgentHandle = {
  modelProvider: 'anthropic',
  modelId: 'claude-3-5-haiku-latest',
  temperature: 0.2,
  maxTokens: 1500,
  instructions: [],
};

function messageResponse(...texts: string[]): Response {
  return new Response(
    JSON.stringify({ content: texts.map((text) => ({ type: 'text', text })) }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

describe('AnthropicProvider', () => {
  let mockFetch: Mock<typeof fetch>;
  let provider: AnthropicProvider;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
    provider = new AnthropicProvider({
      apiKey: 'test-key',
      baseUrl: 'https://anthropic.test/',
      models: DEFAULT_SUPPORTED_MODELS.anthropic,
      maxTokensLimit: 8192,
      retry: { timeoutMs: 1000, attempts: 2, delayMs: 0 },
      generation: DEFAULT_GENERATION_SETTINGS,
      sleep: async () => {},
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post to the Messages API with key and version headers', async () => {
    mockFetch.mockResolvedValueOnce(messageResponse('{"is_valid": true, "confidence": 0.8}'));

    await provider.validatePrompt('A CLI that renames photos by date', agent);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://anthropic.test/v1/messages');
    expect(init?.method).toBe('POST');
    const headers = new Headers(init?.headers);
    expect(headers.get('x-api-key')).toBe('test-key');
    expect(headers.get('anthropic-version')).toBe('2023-06-01');

    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 1000,
      temperature: 0.05,
      messages: [{ role: 'user' }],
    });
  });

  it('should halve the agent temperature into the range the API accepts', async () => {
    mockFetch.mockResolvedValueOnce(messageResponse('# Renamer\n\nUsage'));

    await provider.generateMarkdownDocument(
      {
        prompt: 'A CLI that renames photos by date',
        documentType: 'readme',
        metadata: {
          projectName: 'Renamer',
          description: 'Renames photos',
          projectType: 'cli',
          technologies: [],
          complexityLevel: 'low',
          estimatedDuration: '1 week',
        },
      },
      { ...agent, temperature: 1.5 }
    );

    const body: unknown = JSON.parse(String(mockFetch.mock.calls[0][1]?.body));
    expect(body).toMatchObject({ temperature: 0.75, max_tokens: 1500 });
  });

  it.each([
    [0, 0],
    [1, 0.5],
    [2, 1],
  ])('should map agent temperature %d to %d', (from, to) => {
    expect(anthropicTemperature(from)).toBe(to);
  });

  it('should join the text blocks of the reply', async () => {
    mockFetch.mockResolvedValueOnce(messageResponse('Rename photos ', 'by EXIF date.'));
    await expect(provider.improvePrompt('photo renamer', agent)).resolves.toBe('Rename photos by EXIF date.');
  });

  it('should retry a 529 overload and succeed', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('overloaded', { status: 529 }))
      .mockResolvedValueOnce(messageResponse('Better prompt'));

    await expect(provider.improvePrompt('photo renamer', agent)).resolves.toBe('Better prompt');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should retry network failures', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed')).mockResolvedValueOnce(messageResponse('ok'));

    await expect(provider.improvePrompt('photo renamer', agent)).resolves.toBe('ok');
  });

  it('should fail without retrying on a 400', async () => {
    mockFetch.mockResolvedValue(new Response('{"error": "bad model"}', { status: 400 }));

    const err = await provider.improvePrompt('photo renamer', agent).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderUnavailableError);
    expect(err).toMatchObject({
      message: 'anthropic improvePrompt failed after 1 attempt(s): Anthropic API error (400): {"error": "bad model"}',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should report exhaustion after repeated server errors', async () => {
    mockFetch.mockImplementation(async () => new Response('down', { status: 503 }));

    await expect(provider.improvePrompt('photo renamer', agent)).rejects.toThrow(
      'anthropic improvePrompt failed after 2 attempt(s): Anthropic API error (503): down'
    );
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});

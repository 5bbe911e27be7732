import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createContainer } from '../../src/container.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';
import type { AgentResponse, DocumentResponse } from '../../src/types/api.js';
import { createTestBed, type TestBed } from '../mocks/fixtures.js';

const BASE = 'http://localhost/api/v1';

describe('API Router', () => {
  let bed: TestBed;
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;

  function ctx(): HandlerContext {
    return { requestId: 'req-1' };
  }

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    const init: RequestInit = { method };
    if (body !== undefined) {
      init.headers = { 'Content-Type': 'application/json' };
      init.body = JSON.stringify(body);
    }
    return handle(new Request(`${BASE}${path}`, init), ctx());
  }

  async function createAgent(overrides: Record<string, unknown> = {}): Promise<AgentResponse> {
    const res = await send('POST', '/agents', {
      name: 'Readme Writer',
      agentType: 'markdown_generator',
      modelProvider: 'groq',
      modelId: 'llama-3.1-8b-instant',
      status: 'active',
      ...overrides,
    });
    expect(res.status).toBe(201);
    return (await res.json()) as AgentResponse;
  }

  async function generate(agentId: string): Promise<Response> {
    return send('POST', '/documents', {
      prompt: 'A web app that helps small teams track tasks, built with React and Node.js',
      agentId,
      documentType: 'readme',
    });
  }

  beforeEach(() => {
    bed = createTestBed();
    const container = createContainer({
      agentRepo: bed.agentRepo,
      documentRepo: bed.documentRepo,
      providers: bed.providers,
      logProvider: bed.logProvider,
      generation: bed.generation,
    });
    handle = createRouter(container).handle;
  });

  describe('agents', () => {
    it('should create an agent', async () => {
      const agent = await createAgent();

      expect(agent).toMatchObject({
        name: 'Readme Writer',
        agentType: 'markdown_generator',
        modelProvider: 'groq',
        modelId: 'llama-3.1-8b-instant',
        status: 'active',
      });
      expect(await bed.agentRepo.count()).toBe(1);
    });

    it('should reject a body missing required fields', async () => {
      const res = await send('POST', '/agents', { agentType: 'markdown_generator' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_REQUEST', message: 'name is required; modelProvider is required; modelId is required' },
      });
    });

    it('should reject a provider without a registered adapter', async () => {
      const res = await send('POST', '/agents', {
        name: 'Writer',
        agentType: 'markdown_generator',
        modelProvider: 'anthropic',
        modelId: 'claude-3-5-haiku-latest',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'UNSUPPORTED_PROVIDER' } });
    });

    it('should reject a model the provider does not serve', async () => {
      const res = await send('POST', '/agents', {
        name: 'Writer',
        agentType: 'markdown_generator',
        modelProvider: 'groq',
        modelId: 'gpt-4o',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_CONFIG', message: 'Model "gpt-4o" is not supported by provider "groq"' },
      });
    });

    it('should get, list and update an agent', async () => {
      const agent = await createAgent();

      const got = await send('GET', `/agents/${agent.id}`);
      expect(((await got.json()) as AgentResponse).id).toBe(agent.id);

      const listed = await send('GET', '/agents?modelProvider=groq&limit=5');
      expect(await listed.json()).toMatchObject({ limit: 5, offset: 0, items: [{ id: agent.id }] });

      const updated = await send('PATCH', `/agents/${agent.id}`, { temperature: 1.2, name: 'Guide Writer' });
      expect(updated.status).toBe(200);
      expect(await updated.json()).toMatchObject({ name: 'Guide Writer', temperature: 1.2 });
    });

    it('should reject a malformed query parameter', async () => {
      const res = await send('GET', '/agents?limit=abc');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { message: 'limit must be a number' } });
    });

    it('should change status along the state machine only', async () => {
      const agent = await createAgent();

      const ok = await send('PATCH', `/agents/${agent.id}/status`, { status: 'inactive' });
      expect(await ok.json()).toMatchObject({ status: 'inactive' });

      const bad = await send('PATCH', `/agents/${agent.id}/status`, { status: 'maintenance' });
      expect(bad.status).toBe(409);
      expect(await bad.json()).toMatchObject({ error: { code: 'INVALID_STATE' } });
    });

    it('should delete an agent once', async () => {
      const agent = await createAgent();

      expect((await send('DELETE', `/agents/${agent.id}`)).status).toBe(204);

      const again = await send('DELETE', `/agents/${agent.id}`);
      expect(again.status).toBe(404);
      expect(await again.json()).toEqual({
        error: { code: 'NOT_FOUND', message: `Agent "${agent.id}" not found` },
      });
    });

    it('should list registered providers', async () => {
      const res = await send('GET', '/providers');
      const body = (await res.json()) as { items: Array<{ provider: string; maxTokens: number }> };

      expect(body.items.map((p) => [p.provider, p.maxTokens])).toEqual([
        ['groq', 8192],
        ['openai', 16384],
      ]);
    });
  });

  describe('documents', () => {
    it('should generate, review and publish a document', async () => {
      const agent = await createAgent();

      const created = await generate(agent.id);
      expect(created.status).toBe(201);
      const document = (await created.json()) as DocumentResponse;
      expect(document).toMatchObject({
        title: 'TaskFlow - Readme',
        status: 'completed',
        wordCount: 11,
        generatingAgentId: agent.id,
        errorMessage: null,
      });

      const reviewed = await send('POST', `/documents/${document.id}/review`);
      expect(await reviewed.json()).toMatchObject({ status: 'reviewing' });

      const published = await send('POST', `/documents/${document.id}/publish`);
      expect(await published.json()).toMatchObject({ status: 'published' });

      const listed = await send('GET', '/documents?status=published');
      expect(await listed.json()).toMatchObject({ items: [{ id: document.id }] });

      const agentAfter = await send('GET', `/agents/${agent.id}`);
      expect(await agentAfter.json()).toMatchObject({ status: 'active' });
    });

    it('should list documents for one project', async () => {
      const agent = await createAgent();
      const document = (await (await generate(agent.id)).json()) as DocumentResponse;

      const matching = await send('GET', '/documents?projectName=TaskFlow');
      expect(await matching.json()).toMatchObject({ items: [{ id: document.id }] });

      const other = await send('GET', '/documents?projectName=Renamer');
      expect(await other.json()).toMatchObject({ items: [] });
    });

    it('should refuse publishing before review', async () => {
      const agent = await createAgent();
      const document = (await (await generate(agent.id)).json()) as DocumentResponse;

      const res = await send('POST', `/documents/${document.id}/publish`);

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_STATE', message: 'Document cannot move from completed to published' },
      });
    });

    it('should answer 409 while the agent is busy', async () => {
      const agent = await createAgent();
      await bed.agentRepo.compareAndSetStatus(agent.id, ['active'], 'busy');

      const res = await generate(agent.id);

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ error: { code: 'AGENT_BUSY', details: { agentId: agent.id } } });
      expect(await bed.documentRepo.count()).toBe(0);
    });

    it('should reject an unknown document type before calling a provider', async () => {
      const agent = await createAgent();

      const res = await send('POST', '/documents', { prompt: 'A CLI', agentId: agent.id, documentType: 'poem' });

      expect(res.status).toBe(400);
      expect(bed.groq.calls).toHaveLength(0);
    });

    it('should edit content and recount words', async () => {
      const agent = await createAgent();
      const document = (await (await generate(agent.id)).json()) as DocumentResponse;

      const res = await send('PUT', `/documents/${document.id}/content`, { content: '# Notes\n\nshort', title: 'Notes' });

      expect(await res.json()).toMatchObject({ title: 'Notes', content: '# Notes\n\nshort', wordCount: 3 });
    });

    it('should score a document with an empty body', async () => {
      const agent = await createAgent();
      const document = (await (await generate(agent.id)).json()) as DocumentResponse;

      const res = await send('POST', `/documents/${document.id}/quality`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        documentId: document.id,
        issues: ['Document is shorter than 50 words'],
      });
    });

    it('should 404 a missing document', async () => {
      const res = await send('GET', '/documents/nope');
      expect(res.status).toBe(404);
    });
  });

  describe('prompts', () => {
    it('should mark a short prompt invalid without a provider call', async () => {
      const agent = await createAgent();

      const res = await send('POST', '/prompts/validate', { prompt: 'app', agentId: agent.id });

      expect(await res.json()).toMatchObject({ isValid: false, confidenceScore: 0 });
      expect(bed.groq.calls).toHaveLength(0);
    });

    it('should extract metadata', async () => {
      const agent = await createAgent();

      const res = await send('POST', '/prompts/metadata', { prompt: 'A task tracker for small teams', agentId: agent.id });

      expect(await res.json()).toMatchObject({ projectName: 'TaskFlow', technologies: ['React', 'Node.js'] });
    });

    it('should improve a prompt', async () => {
      const agent = await createAgent();

      const res = await send('POST', '/prompts/improve', { prompt: 'A task tracker for small teams', agentId: agent.id });

      expect(await res.json()).toMatchObject({
        originalPrompt: 'A task tracker for small teams',
        improvedPrompt: 'Write a README for TaskFlow, a React and Node.js task tracker for small teams.',
      });
    });
  });

  describe('routing', () => {
    it('should accept a trailing slash', async () => {
      const res = await send('GET', '/agents/');
      expect(res.status).toBe(200);
    });

    it('should reject a percent-encoded id that does not decode', async () => {
      const res = await send('GET', '/agents/%E0%A4%A');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'Malformed agents id in path' },
      });
    });

    it('should answer 405 with the allowed methods', async () => {
      const res = await send('PUT', '/agents');

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST, GET');
    });

    it('should answer 404 for unknown paths', async () => {
      const res = await send('GET', '/widgets');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/widgets' },
      });
    });

    it('should log each routed request with its id', async () => {
      await send('GET', '/agents');

      expect(bed.logProvider.events.at(-1)).toMatchObject({ path: '/api/v1/agents', status: 200, requestId: 'req-1' });
    });
  });
});

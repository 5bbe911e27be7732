import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryAgentRepository } from '../../src/repositories/InMemoryAgentRepository.js';
import { agentRow } from '../mocks/fixtures.js';

describe('InMemoryAgentRepository', () => {
  let repo: InMemoryAgentRepository;

  beforeEach(() => {
    repo = new InMemoryAgentRepository({ maxItems: 10 });
  });

  it('should stamp created_at and updated_at on insert', async () => {
    const row = await repo.insert(agentRow());

    expect(row.created_at).toBe(row.updated_at);
    expect(Number.isNaN(Date.parse(row.created_at))).toBe(false);
    expect(await repo.findById('agent-1')).toEqual(row);
  });

  it('should filter by type, provider and status', async () => {
    await repo.insert(agentRow({ id: 'a' }));
    await repo.insert(agentRow({ id: 'b', model_provider: 'openai', model_id: 'gpt-4o' }));
    await repo.insert(agentRow({ id: 'c', status: 'inactive' }));
    await repo.insert(agentRow({ id: 'd', agent_type: 'code_analyzer' }));

    const page = { limit: 10, offset: 0 };
    expect((await repo.list({ modelProvider: 'openai' }, page)).map((r) => r.id)).toEqual(['b']);
    expect((await repo.list({ status: 'active', modelProvider: 'groq' }, page)).map((r) => r.id)).toEqual(['a', 'd']);
    expect((await repo.list({ agentType: 'code_analyzer' }, page)).map((r) => r.id)).toEqual(['d']);
    expect(await repo.count()).toBe(4);
  });

  describe('compareAndSetStatus', () => {
    it('should swap when the current status is expected', async () => {
      await repo.insert(agentRow({ status: 'active' }));

      const row = await repo.compareAndSetStatus('agent-1', ['active'], 'busy');

      expect(row?.status).toBe('busy');
    });

    it('should refuse when the status differs', async () => {
      await repo.insert(agentRow({ status: 'inactive' }));

      expect(await repo.compareAndSetStatus('agent-1', ['active'], 'busy')).toBeNull();
      expect((await repo.findById('agent-1'))?.status).toBe('inactive');
    });

    it('should let exactly one of several concurrent callers win', async () => {
      await repo.insert(agentRow({ status: 'active' }));

      const results = await Promise.all(
        Array.from({ length: 5 }, () => repo.compareAndSetStatus('agent-1', ['active'], 'busy'))
      );

      expect(results.filter((r) => r !== null)).toHaveLength(1);
    });

    it('should return null for a missing agent', async () => {
      expect(await repo.compareAndSetStatus('missing', ['active'], 'busy')).toBeNull();
    });
  });

  describe('update with expected statuses', () => {
    it('should refuse a write once the agent left the expected statuses', async () => {
      await repo.insert(agentRow({ status: 'busy' }));

      expect(await repo.update('agent-1', { temperature: 0.9 }, ['active', 'inactive'])).toBeNull();
      expect((await repo.findById('agent-1'))?.temperature).toBe(0.3);
    });

    it('should write without expected statuses whatever the status', async () => {
      await repo.insert(agentRow({ status: 'busy' }));
      expect((await repo.update('agent-1', { temperature: 0.9 }))?.temperature).toBe(0.9);
    });
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { errorHandler } from '../../src/middleware/error-handler.js';
import { pipeline, type Handler } from '../../src/middleware/pipeline.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';

describe('createLoggingMiddleware', () => {
  let logProvider: ConsoleLogProvider;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
  });

  function respondWith(status: number): Handler {
    return async () => new Response(null, { status });
  }

  it('should log one event per request with the request id', async () => {
    const wrapped = createLoggingMiddleware(logProvider)(respondWith(200));

    await wrapped(new Request('http://test/api/v1/agents?limit=5'), { requestId: 'req-7' });

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/agents',
      status: 200,
      requestId: 'req-7',
    });
    expect(logProvider.events[0].message).toMatch(/^GET \/api\/v1\/agents → 200 \(\d+ms\)$/);
  });

  it.each([
    [201, 'info'],
    [404, 'warn'],
    [409, 'warn'],
    [503, 'error'],
  ])('should log status %i at %s', async (status, level) => {
    await createLoggingMiddleware(logProvider)(respondWith(status))(new Request('http://test/'), {
      requestId: 'req-1',
    });

    expect(logProvider.events[0].level).toBe(level);
  });

  it('should log the hidden cause of a 500', async () => {
    const failing: Handler = async () => {
      throw new Error('connection reset');
    };
    const wrapped = pipeline(createLoggingMiddleware(logProvider), errorHandler)(failing);

    const res = await wrapped(new Request('http://test/api/v1/documents', { method: 'POST' }), {
      requestId: 'req-1',
    });

    expect(res.status).toBe(500);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      fields: { error: 'connection reset' },
    });
  });

  it('should log and rethrow when nothing handles the error', async () => {
    const failing: Handler = async () => {
      throw new Error('boom');
    };
    const wrapped = createLoggingMiddleware(logProvider)(failing);

    await expect(wrapped(new Request('http://test/x', { method: 'DELETE' }), { requestId: 'req-1' })).rejects.toThrow(
      'boom'
    );
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      method: 'DELETE',
      path: '/x',
      status: 500,
      fields: { error: 'boom' },
    });
  });
});

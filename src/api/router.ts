/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic - works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { jsonResponse } from '../middleware/json.js';
import { createAgentHandlers } from './agents.js';
import { createDocumentHandlers } from './documents.js';
import { createPromptHandlers } from './prompts.js';

export interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ID = '[^/]+';

function path(template: string): RegExp {
  return new RegExp(`^/api/v1/${template.replaceAll(':id', ID)}/?$`);
}

export function createRouter(container: Container) {
  const agents = createAgentHandlers(container);
  const documents = createDocumentHandlers(container);
  const prompts = createPromptHandlers(container);

  const routes: Route[] = [
    // Agents
    { method: 'POST', pattern: path('agents'), handler: agents.create },
    { method: 'GET', pattern: path('agents'), handler: agents.list },
    { method: 'GET', pattern: path('agents/:id'), handler: agents.get },
    { method: 'PATCH', pattern: path('agents/:id'), handler: agents.update },
    { method: 'DELETE', pattern: path('agents/:id'), handler: agents.remove },
    { method: 'PATCH', pattern: path('agents/:id/status'), handler: agents.updateStatus },
    { method: 'GET', pattern: path('providers'), handler: agents.providers },

    // Documents
    { method: 'POST', pattern: path('documents'), handler: documents.generate },
    { method: 'GET', pattern: path('documents'), handler: documents.list },
    { method: 'GET', pattern: path('documents/:id'), handler: documents.get },
    { method: 'DELETE', pattern: path('documents/:id'), handler: documents.remove },
    { method: 'PUT', pattern: path('documents/:id/content'), handler: documents.updateContent },
    { method: 'POST', pattern: path('documents/:id/review'), handler: documents.review },
    { method: 'POST', pattern: path('documents/:id/publish'), handler: documents.publish },
    { method: 'POST', pattern: path('documents/:id/quality'), handler: documents.quality },

    // Prompts
    { method: 'POST', pattern: path('prompts/validate'), handler: prompts.validate },
    { method: 'POST', pattern: path('prompts/metadata'), handler: prompts.metadata },
    { method: 'POST', pattern: path('prompts/improve'), handler: prompts.improve },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const { pathname } = new URL(req.url);
    const method = req.method;

    const matching = routes.filter((r) => r.pattern.test(pathname));
    const route = matching.find((r) => r.method === method);
    if (route) {
      return route.handler(req, ctx);
    }

    // Path matches but method doesn't
    if (matching.length > 0) {
      return jsonResponse(
        {
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        },
        405,
        { Allow: matching.map((r) => r.method).join(', ') }
      );
    }

    return jsonResponse(
      {
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${pathname}`,
        },
      },
      404
    );
  };

  return { handle, routes };
}

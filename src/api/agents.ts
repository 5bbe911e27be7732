/**
 * Agent endpoints.
 * POST   /api/v1/agents              - Create an agent
 * GET    /api/v1/agents              - List agents
 * GET    /api/v1/agents/:id          - Get an agent
 * PATCH  /api/v1/agents/:id          - Update an agent's configuration
 * PATCH  /api/v1/agents/:id/status   - Change an agent's status
 * DELETE /api/v1/agents/:id          - Delete an agent
 */

import { pipeline, errorHandler, validateBody, jsonResponse } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type {
  CreateAgentRequest,
  UpdateAgentRequest,
  UpdateAgentStatusRequest,
} from '../types/api.js';
import { AGENT_STATUSES, AGENT_TYPES, MODEL_PROVIDERS } from '../types/models.js';
import { NotFoundError } from '../errors.js';
import { enumParam, numberParam, pathId, queryParams } from './params.js';

const createSchema: BodySchema = {
  name: { type: 'string', required: true, nonEmpty: true, maxLength: 100 },
  description: { type: 'string', maxLength: 1000 },
  agentType: { type: 'string', required: true, enum: AGENT_TYPES },
  modelProvider: { type: 'string', required: true, enum: MODEL_PROVIDERS },
  modelId: { type: 'string', required: true, nonEmpty: true },
  temperature: { type: 'number' },
  maxTokens: { type: 'number', integer: true },
  instructions: { type: 'array', stringItems: true },
  status: { type: 'string', enum: AGENT_STATUSES },
};

const updateSchema: BodySchema = {
  name: { type: 'string', nonEmpty: true, maxLength: 100 },
  description: { type: 'string', maxLength: 1000 },
  modelId: { type: 'string', nonEmpty: true },
  temperature: { type: 'number' },
  maxTokens: { type: 'number', integer: true },
  instructions: { type: 'array', stringItems: true },
};

const statusSchema: BodySchema = {
  status: { type: 'string', required: true, enum: AGENT_STATUSES },
};

export function createAgentHandlers(container: Container) {
  const base = pipeline(container.logging, errorHandler);

  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(createSchema)
  )(async (req) => {
    const body = (await req.json()) as CreateAgentRequest;
    const result = await container.agentService.createAgent(body);
    return jsonResponse(result, 201);
  });

  const list: Handler = base(async (req) => {
    const params = queryParams(req);
    const result = await container.agentService.listAgents({
      agentType: enumParam(params, 'agentType', AGENT_TYPES),
      modelProvider: enumParam(params, 'modelProvider', MODEL_PROVIDERS),
      status: enumParam(params, 'status', AGENT_STATUSES),
      limit: numberParam(params, 'limit'),
      offset: numberParam(params, 'offset'),
    });
    return jsonResponse(result);
  });

  const get: Handler = base(async (req) => {
    const result = await container.agentService.getAgent(pathId(req, 'agents'));
    return jsonResponse(result);
  });

  const update: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(updateSchema)
  )(async (req) => {
    const body = (await req.json()) as UpdateAgentRequest;
    const result = await container.agentService.updateAgent(pathId(req, 'agents'), body);
    return jsonResponse(result);
  });

  const updateStatus: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(statusSchema)
  )(async (req) => {
    const body = (await req.json()) as UpdateAgentStatusRequest;
    const result = await container.agentService.updateAgentStatus(pathId(req, 'agents'), body.status);
    return jsonResponse(result);
  });

  const remove: Handler = base(async (req) => {
    const id = pathId(req, 'agents');
    const deleted = await container.agentService.deleteAgent(id);
    if (!deleted) {
      throw new NotFoundError(`Agent "${id}" not found`);
    }
    return new Response(null, { status: 204 });
  });

  const providers: Handler = base(async () => {
    return jsonResponse({ items: container.agentService.listProviders() });
  });

  return { create, list, get, update, updateStatus, remove, providers };
}

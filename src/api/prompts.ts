/**
 * Prompt endpoints.
 * POST /api/v1/prompts/validate  - Judge whether a prompt can drive generation
 * POST /api/v1/prompts/metadata  - Extract project metadata from a prompt
 * POST /api/v1/prompts/improve   - Rewrite a prompt to be more specific
 */

import { pipeline, errorHandler, validateBody, jsonResponse } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { PromptRequest } from '../types/api.js';

const validateSchema: BodySchema = {
  prompt: { type: 'string', required: true },
  agentId: { type: 'string', required: true, nonEmpty: true },
};

const promptSchema: BodySchema = {
  prompt: { type: 'string', required: true, nonEmpty: true },
  agentId: { type: 'string', required: true, nonEmpty: true },
};

export function createPromptHandlers(container: Container) {
  const validate: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(validateSchema)
  )(async (req) => {
    const body = (await req.json()) as PromptRequest;
    return jsonResponse(await container.promptService.validatePrompt(body.prompt, body.agentId, req.signal));
  });

  const metadata: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(promptSchema)
  )(async (req) => {
    const body = (await req.json()) as PromptRequest;
    return jsonResponse(await container.promptService.extractMetadata(body.prompt, body.agentId, req.signal));
  });

  const improve: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(promptSchema)
  )(async (req) => {
    const body = (await req.json()) as PromptRequest;
    return jsonResponse(await container.promptService.improvePrompt(body.prompt, body.agentId, req.signal));
  });

  return { validate, metadata, improve };
}

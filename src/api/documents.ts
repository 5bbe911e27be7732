/**
 * Document endpoints.
 * POST   /api/v1/documents               - Generate a document
 * GET    /api/v1/documents               - List documents
 * GET    /api/v1/documents/:id           - Get a document
 * PUT    /api/v1/documents/:id/content   - Edit a document's content
 * POST   /api/v1/documents/:id/review    - completed → reviewing
 * POST   /api/v1/documents/:id/publish   - reviewing → published
 * POST   /api/v1/documents/:id/quality   - Score a document
 * DELETE /api/v1/documents/:id           - Delete a document
 */

import { pipeline, errorHandler, validateBody, jsonResponse } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { GenerateDocumentRequest, UpdateDocumentRequest } from '../types/api.js';
import { DOCUMENT_STATUSES, DOCUMENT_TYPES } from '../types/models.js';
import { NotFoundError } from '../errors.js';
import { enumParam, numberParam, optionalBody, pathId, queryParams, stringParam } from './params.js';

const generateSchema: BodySchema = {
  prompt: { type: 'string', required: true, nonEmpty: true },
  agentId: { type: 'string', required: true, nonEmpty: true },
  documentType: { type: 'string', required: true, enum: DOCUMENT_TYPES },
  projectName: { type: 'string', maxLength: 200 },
  additionalContext: { type: 'string' },
};

const contentSchema: BodySchema = {
  content: { type: 'string', required: true },
  title: { type: 'string', nonEmpty: true, maxLength: 300 },
};

const qualitySchema: BodySchema = {
  agentId: { type: 'string', nonEmpty: true },
};

export function createDocumentHandlers(container: Container) {
  const base = pipeline(container.logging, errorHandler);

  const generate: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(generateSchema)
  )(async (req) => {
    const body = (await req.json()) as GenerateDocumentRequest;
    const result = await container.documentService.generateDocument(body, req.signal);
    return jsonResponse(result, 201);
  });

  const list: Handler = base(async (req) => {
    const params = queryParams(req);
    const result = await container.documentService.listDocuments({
      documentType: enumParam(params, 'documentType', DOCUMENT_TYPES),
      status: enumParam(params, 'status', DOCUMENT_STATUSES),
      agentId: stringParam(params, 'agentId'),
      projectName: stringParam(params, 'projectName'),
      limit: numberParam(params, 'limit'),
      offset: numberParam(params, 'offset'),
    });
    return jsonResponse(result);
  });

  const get: Handler = base(async (req) => {
    return jsonResponse(await container.documentService.getDocument(pathId(req, 'documents')));
  });

  const updateContent: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(contentSchema)
  )(async (req) => {
    const body = (await req.json()) as UpdateDocumentRequest;
    const result = await container.documentService.updateDocumentContent(pathId(req, 'documents'), body);
    return jsonResponse(result);
  });

  const review: Handler = base(async (req) => {
    return jsonResponse(await container.documentService.reviewDocument(pathId(req, 'documents')));
  });

  const publish: Handler = base(async (req) => {
    return jsonResponse(await container.documentService.publishDocument(pathId(req, 'documents')));
  });

  const quality: Handler = base(async (req) => {
    const body = await optionalBody(req, qualitySchema);
    const result = await container.documentService.analyzeQuality(
      pathId(req, 'documents'),
      typeof body.agentId === 'string' ? body.agentId : undefined,
      req.signal
    );
    return jsonResponse(result);
  });

  const remove: Handler = base(async (req) => {
    const id = pathId(req, 'documents');
    if (!(await container.documentService.deleteDocument(id))) {
      throw new NotFoundError(`Document "${id}" not found`);
    }
    return new Response(null, { status: 204 });
  });

  return { generate, list, get, updateContent, review, publish, quality, remove };
}

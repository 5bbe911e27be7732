/**
 * Typed application errors.
 * Each carries a stable code and HTTP status; the error handler middleware
 * maps them to JSON bodies. Anything that is not an AppError becomes a 500.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly statusCode: number,
    message: string,
    /** Mutable so callers can attach context (e.g. a document id) before rethrowing. */
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', 400, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', 404, message);
  }
}

/** Agent configuration outside the allowed ranges. */
export class InvalidConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', 400, message, details);
  }
}

export class UnsupportedModelError extends InvalidConfigError {
  constructor(provider: string, modelId: string, supported: readonly string[]) {
    super(`Model "${modelId}" is not supported by provider "${provider}"`, {
      provider,
      modelId,
      supportedModels: [...supported],
    });
  }
}

export class UnsupportedProviderError extends AppError {
  constructor(provider: string) {
    super('UNSUPPORTED_PROVIDER', 400, `No adapter is registered for provider "${provider}"`, {
      provider,
    });
  }
}

/** A generation is already in flight for this agent. */
export class AgentBusyError extends AppError {
  constructor(agentId: string) {
    super('AGENT_BUSY', 409, `Agent "${agentId}" is busy with another generation`, {
      agentId,
    });
  }
}

/** The requested status change is not part of the entity's state machine. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_STATE', 409, message, details);
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROVIDER_UNAVAILABLE', 503, message, details);
  }
}

export class ContentLimitError extends AppError {
  constructor(length: number, limit: number) {
    super(
      'CONTENT_TOO_LARGE',
      422,
      `Generated content is ${length} characters, limit is ${limit}`,
      { length, limit }
    );
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Operation was cancelled') {
    super('CANCELLED', 499, message);
  }
}

import type { FastifyInstance } from 'fastify';
import { isAgentError, type ErrorKind } from '../agent/errors.js';

export enum ErrorCode {
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_NOT_ACTIVE = 'SESSION_NOT_ACTIVE',
  APP_NOT_FOUND = 'APP_NOT_FOUND',
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_TASK = 'INVALID_TASK',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class ApiError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }

  toResponse() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

/** HTTP status for an agent error surfaced through the API. */
export function statusForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'InvalidTask':
    case 'InvalidConfig':
      return 400;
    case 'DeviceUnreachable':
    case 'VlmUnavailable':
      return 503;
    default:
      return 500;
  }
}

export function installErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ApiError) {
      reply.status(error.statusCode).send(error.toResponse());
    } else if (isAgentError(error)) {
      reply.status(statusForKind(error.kind)).send({
        error: { code: error.kind, message: error.message },
      });
    } else if (error.statusCode && error.statusCode < 500) {
      // body parse errors and the like
      reply.status(error.statusCode).send({
        error: { code: ErrorCode.INVALID_REQUEST, message: error.message },
      });
    } else {
      app.log.error(error);
      reply.status(500).send({
        error: {
          code: ErrorCode.INTERNAL_ERROR,
          message: 'Internal server error',
        },
      });
    }
  });
}

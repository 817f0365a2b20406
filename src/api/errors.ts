import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { BenchError, ParameterMismatchError } from '../core/errors.js';
import type { ApiError } from './types.js';

/**
 * Map a thrown error onto the reply status and an ApiError body.
 */
export function errorReply(reply: FastifyReply, err: unknown): ApiError {
  if (err instanceof ZodError) {
    reply.status(400);
    return {
      error: 'INVALID_REQUEST',
      message: 'Request body failed validation',
      details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }
  if (err instanceof ParameterMismatchError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message, details: { errors: err.errors, warnings: err.warnings } };
  }
  if (err instanceof BenchError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.log.error({ err }, 'Unhandled request error');
  reply.status(500);
  return { error: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) };
}

export function notFound(reply: FastifyReply, error: string, message: string): ApiError {
  reply.status(404);
  return { error, message };
}

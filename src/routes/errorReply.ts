import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../config.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';
import { appErrorToEnvelope } from '../http/errorEnvelope.js';

export interface DebugQuery {
  debug?: string;
}

export function isDebugRequest(query: DebugQuery): boolean {
  return query.debug === '1' || config.debug;
}

/**
 * Logs an error and replies with its envelope: `{ error: ErrorEnvelope }`.
 */
export function sendError(
  fastify: FastifyInstance,
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  debugEnabled: boolean
) {
  const appError = mapError(error);
  const requestId = request.id;

  const logPayload: Record<string, unknown> = {
    msg: 'Request error',
    category: appError.category,
    code: appError.code,
    requestId,
    httpStatus: appError.httpStatus,
  };

  if (config.debug && appError.details) {
    logPayload.details = sanitizeForLogging(appError.details);
  }

  if (appError.category === 'VALIDATION' || appError.category === 'NOT_FOUND') {
    fastify.log.warn(logPayload);
  } else {
    fastify.log.error(logPayload);
  }

  return reply.status(appError.httpStatus).send({
    error: appErrorToEnvelope(appError, requestId, debugEnabled),
  });
}

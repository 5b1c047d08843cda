import type { FastifyInstance } from 'fastify';
import type { IPhoneStore } from '../catalog/index.js';
import { AppError } from '../errors/index.js';
import { isDebugRequest, sendError, type DebugQuery } from './errorReply.js';

export interface PhoneRouteOptions {
  store: IPhoneStore;
}

export async function phoneRoutes(fastify: FastifyInstance, options: PhoneRouteOptions) {
  const { store } = options;

  fastify.get<{ Querystring: DebugQuery }>('/v1/phones', async (request, reply) => {
    try {
      return reply.send(store.listAll());
    } catch (error) {
      return sendError(fastify, request, reply, error, isDebugRequest(request.query));
    }
  });

  fastify.get<{
    Params: { modelName: string };
    Querystring: DebugQuery;
  }>('/v1/phones/:modelName', async (request, reply) => {
    try {
      const record = store.getByExactOrSubstringName(request.params.modelName);
      if (!record) {
        throw AppError.phoneNotFound(request.params.modelName);
      }
      return reply.send(record);
    } catch (error) {
      return sendError(fastify, request, reply, error, isDebugRequest(request.query));
    }
  });
}

import type { FastifyInstance } from 'fastify';
import type { GenerationChain } from '../advisor/index.js';
import type { IPhoneStore, PhoneStoreType } from '../catalog/index.js';
import { mapError } from '../errors/index.js';

export const SERVICE_INFO = {
  name: 'Phone Advisor API',
  version: '1.0.0',
  description: 'Ask questions about Samsung phones',
} as const;

export interface MetaRouteOptions {
  store: IPhoneStore;
  storeType: PhoneStoreType;
  generator?: GenerationChain;
}

export async function metaRoutes(fastify: FastifyInstance, options: MetaRouteOptions) {
  const { store, storeType, generator } = options;

  fastify.get('/', async (_request, reply) => {
    return reply.send({
      ...SERVICE_INFO,
      endpoints: {
        'POST /v1/ask': 'Ask a question about Samsung phones',
        'GET /v1/phones': 'List all phones in the catalog',
        'GET /v1/phones/:modelName': 'Get one phone by model name',
        'GET /v1/health': 'Check service health',
      },
    });
  });

  fastify.get('/v1/health', async (_request, reply) => {
    const generatorInfo = {
      enabled: generator?.enabled ?? false,
      models: generator?.strategyNames ?? [],
    };

    try {
      return reply.send({
        status: 'ok',
        catalog: { store: storeType, phoneCount: store.count() },
        generator: generatorInfo,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      const appError = mapError(error);
      fastify.log.error({ code: appError.code, msg: 'Catalog health check failed' });
      return reply.status(503).send({
        status: 'unhealthy',
        catalog: { store: storeType, phoneCount: 0 },
        generator: generatorInfo,
        timestamp: new Date().toISOString(),
      });
    }
  });
}

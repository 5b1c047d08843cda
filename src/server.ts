import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config.js';
import { PhoneAdvisor, createGenerationChain, type GenerationChain } from './advisor/index.js';
import { createPhoneStore, type IPhoneStore, type PhoneStoreType } from './catalog/index.js';
import { askRoutes } from './routes/ask.js';
import { phoneRoutes } from './routes/phones.js';
import { metaRoutes } from './routes/meta.js';

export interface BuildServerOptions {
  /** Catalog to serve; created from config when omitted */
  store?: IPhoneStore;
  storeType?: PhoneStoreType;
  /** Generation chain; created from config when omitted */
  generator?: GenerationChain;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: options.logger === false
      ? false
      : { level: config.debug ? 'debug' : 'info' },
    bodyLimit: config.limits.bodyLimitBytes,
  });

  const allowAllOrigins = config.cors.origins.includes('*');

  // Registered before routes so preflight OPTIONS requests are handled
  await fastify.register(cors, {
    origin: allowAllOrigins
      ? true
      : (origin, callback) => {
          // Requests without an origin (curl, server-to-server) pass
          if (!origin || config.cors.origins.includes(origin)) {
            callback(null, true);
            return;
          }
          callback(new Error('Not allowed by CORS'), false);
        },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  });

  let store = options.store;
  let storeType: PhoneStoreType = options.storeType ?? 'memory';

  if (!store) {
    const created = createPhoneStore(config.catalog);
    store = created.store;
    storeType = created.type;
    fastify.addHook('onClose', async () => {
      created.close();
      fastify.log.info('Phone catalog closed');
    });
  }
  fastify.log.info(`Phone catalog initialized: ${storeType} (${store.count()} phones)`);

  const generator = options.generator ?? createGenerationChain();
  if (generator.enabled) {
    fastify.log.info(`Answer generation enabled: ${generator.strategyNames.join(', ')}`);
  } else {
    fastify.log.info('Answer generation disabled - answers are rendered from templates');
  }

  const advisor = new PhoneAdvisor({ store, generator });

  await fastify.register(askRoutes, { advisor });
  await fastify.register(phoneRoutes, { store });
  await fastify.register(metaRoutes, { store, storeType, generator });

  return fastify;
}

export async function startServer() {
  const fastify = await buildServer();

  try {
    await fastify.listen({
      port: config.port,
      host: '0.0.0.0',
    });
    fastify.log.info(`Server listening on port ${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}

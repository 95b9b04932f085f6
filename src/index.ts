import Fastify from 'fastify';
import cors from '@fastify/cors';
import 'dotenv/config';
import { getRehabConfig } from './lib/config/rehab.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { checkDatabaseConnection } from './lib/db.js';
import { getRehabStore } from './stores/index.js';
import { rehabilitationRoutes } from './routes/rehabilitation.js';

const config = getRehabConfig();

const fastify = Fastify({
  logger: true,
});

await fastify.register(cors, {
  origin: config.frontendUrl,
  credentials: true,
});

registerErrorHandler(fastify);

const store = getRehabStore();
if (store.kind === 'postgres') {
  try {
    await checkDatabaseConnection();
    fastify.log.info('Store: postgres (connected)');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    fastify.log.warn(`Store: postgres (not reachable yet: ${message})`);
  }
} else {
  fastify.log.warn('Store: in-memory (demo seed data, nothing is persisted)');
}
fastify.log.info(`Predictor: ${config.predictor.baseUrl} (timeout ${config.predictor.timeoutMs}ms)`);

fastify.get('/health', async () => {
  return {
    status: 'ok',
    store: store.kind,
    events: config.events.driver,
  };
});

await fastify.register(rehabilitationRoutes);

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();

import 'dotenv/config';
import { loadConfig, type Config } from './config/index.js';
import { configureLogger, logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { createServices, closeServices } from './bootstrap.js';
import { buildApp } from './api/app.js';

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, 'Invalid configuration');
  process.exit(1);
}

configureLogger(config.server);
logger.info('Initializing services...');
const services = await createServices(config);
const fastify = await buildApp(services);

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  await closeServices(services);
  logger.info('Shutdown complete');
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

try {
  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}

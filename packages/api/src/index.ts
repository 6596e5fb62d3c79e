import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { createLogger, errorMessage } from '@switchboard/core';
import { loadConfig } from './config.js';
import { createServices } from './services.js';
import { createServer } from './server.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

async function main() {
  const config = loadConfig();
  const logger = createLogger('switchboard', config.logLevel);

  const services = await createServices(config, {
    logger,
    migrationsDir: join(__dirname, '../../../migrations'),
  });

  const server = createServer({
    orchestrator: services.orchestrator,
    sessions: services.sessions,
    cacheBackend: services.cacheBackend,
    database: services.cacheBackend === 'postgres' ? services.pool : undefined,
    logLevel: config.logLevel,
  });

  await server.listen({ port: config.port, host: config.host });

  // Graceful shutdown
  const shutdown = async () => {
    await server.close();
    await services.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, `Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});

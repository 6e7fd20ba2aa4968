import { createFitnessCore } from '@fitledger/fitness-core';
import { loadConfig } from './config.js';
import { buildServer } from './server.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const core = createFitnessCore();

  const fastify = await buildServer(core, {
    token: config.token,
    logger: {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    },
  });

  const shutdown = () => {
    fastify
      .close()
      .then(() => {
        core.close();
        fastify.log.info('Fitness API shut down gracefully');
        process.exit(0);
      })
      .catch(err => {
        fastify.log.error(err, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    core.close();
    process.exit(1);
  }
}

start().catch(err => {
  console.error('Failed to start fitness API:', err);
  process.exit(1);
});

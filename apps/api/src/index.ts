/**
 * Circulation API - server entry point
 */

import { loadConfig } from './config.js';
import { buildApp } from './app.js';

async function main() {
  const config = loadConfig();
  const fastify = await buildApp({ config });

  const shutdown = (signal: string) => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      err => {
        fastify.log.error(err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});

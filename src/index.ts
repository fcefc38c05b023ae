import { createApp } from './app.js';
import { env } from './config/env.js';
import { redis } from './config/redis.js';
import { closeQueues } from './jobs/queues.js';
import { logger } from './utils/logger.js';

const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Pulse API listening');
});

async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await closeQueues();
  redis.disconnect();
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadServerConfig } from './config/config.js';
import { createBuiltinMux } from './handlers/builtin.js';
import { createServer } from './server.js';
import { errorForLog } from './utils/logger.js';

const config = loadServerConfig(process.env);
const app = createServer({ config, handler: createBuiltinMux() });

// This helper closes the server so in-flight calls can finish before the process exits.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ host: config.host, port: config.port, rpcPath: config.rpcPath }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });

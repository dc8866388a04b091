// This is the process entrypoint that builds the tool registry, starts the HTTP server, and handles graceful shutdown.

import { loadRuntimeConfig } from './config/runtime-config.js';
import { ToolRegistryBuilder } from './mcp/tool-registry.js';
import { registerBuiltinTools } from './mcp/tools/index.js';
import { createServer, shutdownServer } from './server.js';
import { errorForLog } from './utils/logger.js';

const config = loadRuntimeConfig();
const registry = registerBuiltinTools(new ToolRegistryBuilder()).build();
const app = createServer({ config, registry });

if (!config.authToken) {
  app.log.error({ event: 'auth_token_missing' }, 'auth_token_missing');
}

function handleSignal(signal: NodeJS.Signals): void {
  shutdownServer(app, signal)
    .then((exitCode) => process.exit(exitCode))
    .catch((error: unknown) => {
      app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
      process.exit(1);
    });
}

process.on('SIGTERM', handleSignal);
process.on('SIGINT', handleSignal);

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info(
      {
        host: config.host,
        port: config.port,
        tools: registry.list().map((tool) => tool.name),
        allowedOrigins: config.allowedOrigins.length
      },
      'server_started'
    );
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });

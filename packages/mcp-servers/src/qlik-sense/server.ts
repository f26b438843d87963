#!/usr/bin/env node
/**
 * Qlik Sense MCP Server
 *
 * Exposes Qlik Sense apps, tasks and task execution logs as MCP tools over
 * stdio (default) or HTTP. Configuration comes from the environment; see
 * ./config.ts.
 */

import { createLogger } from '../shared/logger.js';
import { startHttpTransport } from '../shared/http-transport.js';
import { loadConfig, type QlikConfig } from './config.js';
import { createQlikSenseServer, SERVER_NAME } from './create-server.js';
import { ConfigError } from './errors.js';

function readConfig(): QlikConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const logger = createLogger(SERVER_NAME, { level: config.logLevel });
const { server } = createQlikSenseServer(config, { logger });

logger.info('Starting', {
  serverUrl: config.serverUrl,
  username: config.username,
  authStrategy: config.authStrategy,
  transport: config.transport,
});

if (config.transport === 'http') {
  const httpServer = startHttpTransport(server, { host: config.host, port: config.port, logger });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    httpServer.close();
    server.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: err });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
} else {
  server.start();
}

/**
 * Wires config into a ready McpServer: dispatcher, QRS transport, session
 * manager and the tool set.
 */

import type { Dispatcher } from 'undici';
import type { Logger } from '../shared/logger.js';
import { McpServer } from '../shared/server.js';
import { createSessionAcquirer } from './auth/index.js';
import type { QlikConfig } from './config.js';
import { createDispatcher, QrsTransport, type HttpFetch } from './http.js';
import { SessionManager, type SessionAcquirer } from './session.js';
import { createQlikTools } from './tools.js';

export const SERVER_NAME = 'qlik-sense-mcp';
export const SERVER_VERSION = '1.0.0';

export interface QlikSenseServerDeps {
  logger: Logger;
  fetch?: HttpFetch;
  dispatcher?: Dispatcher;
  acquirer?: SessionAcquirer;
}

export interface QlikSenseServer {
  server: McpServer;
  sessions: SessionManager;
}

export function createQlikSenseServer(config: QlikConfig, deps: QlikSenseServerDeps): QlikSenseServer {
  const { logger } = deps;
  const dispatcher = deps.dispatcher ?? createDispatcher(config);

  const transport = new QrsTransport({
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    logger: logger.child('qrs'),
    dispatcher,
    fetch: deps.fetch,
  });

  const acquirer = deps.acquirer ?? createSessionAcquirer(config, { logger, dispatcher, fetch: deps.fetch });
  const sessions = new SessionManager(acquirer, logger.child('session'));

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: createQlikTools({ sessions, transport, logger, defaultAppId: config.defaultAppId }),
    logger,
    onShutdown: async () => {
      sessions.discard('shutdown');
      await dispatcher.close();
    },
  });

  return { server, sessions };
}

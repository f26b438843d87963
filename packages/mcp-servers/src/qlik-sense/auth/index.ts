import type { Dispatcher } from 'undici';
import type { Logger } from '../../shared/logger.js';
import type { QlikConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import type { HttpFetch } from '../http.js';
import type { SessionAcquirer } from '../session.js';
import { BrowserSessionAcquirer } from './browser.js';
import { DirectSessionAcquirer } from './direct.js';

export { BrowserSessionAcquirer } from './browser.js';
export { DirectSessionAcquirer } from './direct.js';

export interface SessionAcquirerDeps {
  logger: Logger;
  dispatcher?: Dispatcher;
  fetch?: HttpFetch;
}

/**
 * Pick the login strategy named by QLIK_AUTH_STRATEGY.
 */
export function createSessionAcquirer(config: QlikConfig, deps: SessionAcquirerDeps): SessionAcquirer {
  const logger = deps.logger.child(`auth-${config.authStrategy}`);

  switch (config.authStrategy) {
    case 'direct':
      return new DirectSessionAcquirer({ config, logger, dispatcher: deps.dispatcher, fetch: deps.fetch });

    case 'browser':
      if (config.credentials.kind !== 'password') {
        throw new ConfigError(['QLIK_AUTH_STRATEGY=browser requires QLIK_PASSWORD']);
      }
      return new BrowserSessionAcquirer({
        config: { ...config, password: config.credentials.password },
        logger,
      });
  }
}

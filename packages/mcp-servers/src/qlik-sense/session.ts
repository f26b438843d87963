/**
 * Session lifecycle: acquire, validate, discard.
 *
 * One session is cached for the life of the process. Concurrent callers share
 * the in-flight acquisition, so at most one login (and one browser) runs at a
 * time. A session the platform rejects is discarded and the next caller logs
 * in again.
 */

import type { Logger } from '../shared/logger.js';
import type { AuthStrategy } from './config.js';

export interface Session {
  readonly serverUrl: string;
  readonly username: string;
  readonly token: string;
  readonly cookieName: string;
  readonly createdAt: Date;
}

export interface SessionAcquirer {
  readonly strategy: AuthStrategy;
  /** One login attempt; rejects with AuthenticationError. */
  acquire(): Promise<Session>;
}

export type SessionCheck = (session: Session) => Promise<boolean>;

export interface SessionStatus {
  active: boolean;
  valid: boolean | null;
  strategy: AuthStrategy;
  serverUrl: string | null;
  username: string | null;
  createdAt: string | null;
}

export function createSession(fields: Omit<Session, 'createdAt'>, createdAt: Date = new Date()): Session {
  return Object.freeze({ ...fields, createdAt });
}

export class SessionManager {
  private session: Session | null = null;
  private pending: Promise<Session> | null = null;

  constructor(
    private readonly acquirer: SessionAcquirer,
    private readonly logger: Logger,
  ) {}

  get current(): Session | null {
    return this.session;
  }

  get strategy(): AuthStrategy {
    return this.acquirer.strategy;
  }

  async acquire(): Promise<Session> {
    if (this.session) {return this.session;}
    if (this.pending) {return this.pending;}

    this.logger.info('Acquiring session', { strategy: this.acquirer.strategy });
    const startedAt = Date.now();

    this.pending = this.acquirer.acquire()
      .then((session) => {
        this.session = session;
        this.logger.info('Session acquired', {
          strategy: this.acquirer.strategy,
          username: session.username,
          durationMs: Date.now() - startedAt,
        });
        return session;
      })
      .finally(() => {
        this.pending = null;
      });

    return this.pending;
  }

  /**
   * Check the held session with `check`; a rejected session is discarded.
   * Resolves to null when no session is held.
   */
  async validate(check: SessionCheck): Promise<boolean | null> {
    const session = this.session;
    if (!session) {return null;}

    const valid = await check(session);
    if (!valid) {
      this.discard('rejected by server', session);
    }
    return valid;
  }

  /**
   * Drop the cached session. With `session`, only that session is dropped, so
   * a late failure from an old session leaves its replacement in place.
   */
  discard(reason: string, session?: Session): void {
    if (!this.session) {return;}
    if (session && session !== this.session) {
      this.logger.debug('Ignoring discard of a replaced session', { reason, username: session.username });
      return;
    }
    this.logger.info('Session discarded', { reason, username: this.session.username });
    this.session = null;
  }

  async status(check: SessionCheck): Promise<SessionStatus> {
    const session = this.session;
    const valid = await this.validate(check);
    return {
      active: this.session !== null,
      valid,
      strategy: this.acquirer.strategy,
      serverUrl: session?.serverUrl ?? null,
      username: session?.username ?? null,
      createdAt: session?.createdAt.toISOString() ?? null,
    };
  }
}

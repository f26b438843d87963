/**
 * HTTP plumbing shared by the QRS client and the direct login flow.
 *
 * Requests go through undici so the connection pool size and TLS verification
 * from config apply to every call.
 */

import { randomBytes } from 'crypto';
import { Agent, fetch as undiciFetch, type Dispatcher, type RequestInit, type Response } from 'undici';
import type { Logger } from '../shared/logger.js';
import type { QlikConfig } from './config.js';
import { ClientError } from './errors.js';
import type { Session } from './session.js';

export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | undefined>;

const XRFKEY_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const BODY_EXCERPT_LENGTH = 500;

export function createDispatcher(config: Pick<QlikConfig, 'poolSize' | 'sslVerify'>): Agent {
  return new Agent({
    connections: config.poolSize,
    connect: { rejectUnauthorized: config.sslVerify },
  });
}

/**
 * 16 alphanumeric characters, as QRS requires for its CSRF check.
 */
export function generateXrfKey(): string {
  const bytes = randomBytes(16);
  let key = '';
  for (const byte of bytes) {
    key += XRFKEY_ALPHABET[byte % XRFKEY_ALPHABET.length];
  }
  return key;
}

/**
 * `DOMAIN\user` → `UserDirectory=DOMAIN; UserId=user`; anything else passes through.
 */
export function formatQlikUser(username: string): string {
  const separator = username.indexOf('\\');
  if (separator <= 0) {return username;}
  return `UserDirectory=${username.slice(0, separator)}; UserId=${username.slice(separator + 1)}`;
}

/**
 * Build a query string with encodeURIComponent (spaces as %20, which QRS
 * filters need) and skip undefined values.
 */
export function buildQuery(params: QueryParams): string {
  return Object.entries(params)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join('&');
}

export function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LENGTH ? `${body.slice(0, BODY_EXCERPT_LENGTH)}…` : body;
}

export interface QrsTransportOptions {
  timeoutMs: number;
  maxRetries: number;
  logger: Logger;
  dispatcher?: Dispatcher;
  fetch?: HttpFetch;
  xrfKey?: () => string;
}

/** A parsed QRS body with the status and attempt that produced it. */
export interface QrsResponse {
  body: unknown;
  status: number;
  attempts: number;
}

interface AttemptFailure {
  status: number | null;
  body: string;
  cause?: unknown;
}

/**
 * Authenticated GETs against the Qlik Repository Service with retry.
 *
 * Network errors and 5xx responses are retried immediately up to
 * `maxRetries` times; other error statuses fail on the spot.
 */
export class QrsTransport {
  private readonly fetchImpl: HttpFetch;
  private readonly xrfKey: () => string;

  constructor(private readonly options: QrsTransportOptions) {
    this.fetchImpl = options.fetch ?? undiciFetch;
    this.xrfKey = options.xrfKey ?? generateXrfKey;
  }

  async getJson(path: string, query: QueryParams, session: Session): Promise<QrsResponse> {
    const { logger, maxRetries, timeoutMs } = this.options;
    const attempts = maxRetries + 1;
    let lastFailure: AttemptFailure = { status: null, body: '' };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const xrfKey = this.xrfKey();
      const url = `${session.serverUrl}${path}?${buildQuery({ ...query, xrfkey: xrfKey })}`;

      let response: Response;
      let body: string;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Cookie: `${session.cookieName}=${session.token}`,
            'X-Qlik-User': formatQlikUser(session.username),
            'X-Qlik-Xrfkey': xrfKey,
          },
          dispatcher: this.options.dispatcher,
          signal: AbortSignal.timeout(timeoutMs),
        });
        body = await response.text();
      } catch (err) {
        lastFailure = { status: null, body: '', cause: err };
        logger.warn('QRS request failed', { path, attempt, attempts, error: err });
        continue;
      }

      if (response.status >= 500) {
        lastFailure = { status: response.status, body };
        logger.warn('QRS server error', { path, attempt, attempts, status: response.status });
        continue;
      }

      if (!response.ok) {
        throw new ClientError(
          `QRS ${path} failed with HTTP ${response.status}: ${excerpt(body)}`,
          { endpoint: path, status: response.status, body: excerpt(body), attempts: attempt },
        );
      }

      logger.debug('QRS request succeeded', { path, attempt, status: response.status });

      if (!body) {return { body: null, status: response.status, attempts: attempt };}
      try {
        return { body: JSON.parse(body), status: response.status, attempts: attempt };
      } catch (err) {
        throw new ClientError(
          `QRS ${path} returned invalid JSON`,
          { endpoint: path, status: response.status, body: excerpt(body), attempts: attempt },
          { cause: err },
        );
      }
    }

    const reason = lastFailure.status === null
      ? `network error: ${lastFailure.cause instanceof Error ? lastFailure.cause.message : String(lastFailure.cause)}`
      : `HTTP ${lastFailure.status}: ${excerpt(lastFailure.body)}`;

    throw new ClientError(
      `QRS ${path} failed after ${attempts} attempt${attempts === 1 ? '' : 's'} (${reason})`,
      { endpoint: path, status: lastFailure.status, body: excerpt(lastFailure.body), attempts },
      { cause: lastFailure.cause },
    );
  }
}

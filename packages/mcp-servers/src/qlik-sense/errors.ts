/**
 * Error taxonomy for the Qlik Sense server.
 *
 * Lower layers throw these; McpServer turns them into tool error results and
 * reports `code` alongside the message.
 */

export type QlikErrorCode =
  | 'AUTHENTICATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'CLIENT_ERROR'
  | 'CONFIG_ERROR';

export abstract class QlikError extends Error {
  abstract readonly code: QlikErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Session acquisition failed. */
export class AuthenticationError extends QlikError {
  readonly code = 'AUTHENTICATION_ERROR';
}

/** Tool input rejected before any upstream call. */
export class ValidationError extends QlikError {
  readonly code = 'VALIDATION_ERROR';
}

export interface ClientErrorDetails {
  endpoint: string;
  /** HTTP status of the last attempt; null when no response was received. */
  status: number | null;
  body: string;
  attempts: number;
}

/** Upstream HTTP failure, raised once the retry budget is spent. */
export class ClientError extends QlikError {
  readonly code = 'CLIENT_ERROR';
  readonly endpoint: string;
  readonly status: number | null;
  readonly body: string;
  readonly attempts: number;

  constructor(message: string, details: ClientErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.endpoint = details.endpoint;
    this.status = details.status;
    this.body = details.body;
    this.attempts = details.attempts;
  }

  /** The platform refused the session cookie. */
  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class ConfigError extends QlikError {
  readonly code = 'CONFIG_ERROR';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

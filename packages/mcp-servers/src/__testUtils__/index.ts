/**
 * Shared Test Utilities for MCP Servers
 *
 * Stand-ins for the network (undici Response builders and a fetch mock)
 * and a logger that records what it writes.
 *
 * @module __testUtils__
 */

import { vi } from 'vitest';
import { Headers, Response } from 'undici';
import { createLogger, type LogLevel, type Logger } from '../shared/logger.js';
import type { HttpFetch } from '../qlik-sense/http.js';

export * from './fixtures.js';

// ============================================================================
// Response builders
// ============================================================================

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, status: number, setCookies: string[] = []): Response {
  const headers = new Headers({ 'content-type': 'text/html' });
  for (const cookie of setCookies) {
    headers.append('set-cookie', cookie);
  }
  return new Response(body, { status, headers });
}

/**
 * A 302 to `location`, optionally setting cookies on the way.
 */
export function redirectResponse(location: string, setCookies: string[] = []): Response {
  const headers = new Headers({ location });
  for (const cookie of setCookies) {
    headers.append('set-cookie', cookie);
  }
  return new Response(null, { status: 302, headers });
}

/**
 * vi.fn typed as HttpFetch. Queue replies with mockResolvedValueOnce /
 * mockRejectedValueOnce.
 */
export function createFetchMock() {
  return vi.fn<HttpFetch>();
}

/**
 * URL of the n-th call of a fetch mock, parsed.
 */
export function calledUrl(fetch: ReturnType<typeof createFetchMock>, call = 0): URL {
  const args = fetch.mock.calls[call];
  if (!args) {
    throw new Error(`fetch was not called ${call + 1} time(s)`);
  }
  return new URL(args[0]);
}

// ============================================================================
// Logging
// ============================================================================

export interface RecordedEntry {
  level: LogLevel;
  service: string;
  message: string;
  [key: string]: unknown;
}

export interface RecordingLogger {
  logger: Logger;
  entries: RecordedEntry[];
}

export function createRecordingLogger(service = 'test', level: LogLevel = 'debug'): RecordingLogger {
  const entries: RecordedEntry[] = [];
  const logger = createLogger(service, {
    level,
    write: (line) => {
      entries.push(JSON.parse(line) as RecordedEntry);
    },
  });
  return { logger, entries };
}

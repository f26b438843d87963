/**
 * Environment configuration for the Qlik Sense MCP server.
 *
 * Everything is read once at startup and validated with Zod; the result is a
 * plain immutable object handed to the components that need it.
 */

import { z } from 'zod';
import { LOG_LEVEL_NAMES, type LogLevel } from '../shared/logger.js';
import { ConfigError } from './errors.js';
import { QRS_ID_PATTERN } from './types.js';

export const AUTH_STRATEGIES = ['direct', 'browser'] as const;
export type AuthStrategy = (typeof AUTH_STRATEGIES)[number];

export const MCP_TRANSPORTS = ['stdio', 'http'] as const;
export type McpTransport = (typeof MCP_TRANSPORTS)[number];

export type QlikCredentials =
  | { kind: 'password'; password: string }
  | { kind: 'apiKey'; apiKey: string };

export interface BrowserConfig {
  headless: boolean;
  slowMo: number;
  timeoutMs: number;
  executablePath?: string;
}

export interface QlikConfig {
  serverUrl: string;
  username: string;
  credentials: QlikCredentials;
  defaultAppId?: string;
  authStrategy: AuthStrategy;
  sessionCookieName: string;
  requestTimeoutMs: number;
  maxRetries: number;
  poolSize: number;
  sslVerify: boolean;
  browser: BrowserConfig;
  transport: McpTransport;
  host: string;
  port: number;
  logLevel: LogLevel;
}

const TRUTHY = new Set(['true', '1', 'yes']);
const FALSY = new Set(['false', '0', 'no']);

const booleanFlag = (fallback: boolean) => z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) {return fallback;}
    if (TRUTHY.has(normalized)) {return true;}
    if (FALSY.has(normalized)) {return false;}
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
    return z.NEVER;
  });

// Blank values count as unset
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  QLIK_SERVER: z.string().trim().min(1, 'QLIK_SERVER is required'),
  QLIK_USERNAME: z.string().trim().min(1, 'QLIK_USERNAME is required'),
  QLIK_PASSWORD: optionalString,
  QLIK_API_KEY: optionalString,
  QLIK_APP_ID: optionalString.refine(
    (value) => value === undefined || QRS_ID_PATTERN.test(value),
    (value) => ({ message: `must be a GUID, got "${value ?? ''}"` }),
  ),
  QLIK_AUTH_STRATEGY: z.enum(AUTH_STRATEGIES).default('direct'),
  QLIK_SESSION_COOKIE: z.string().trim().min(1).default('X-Qlik-Session'),
  QLIK_REQUEST_TIMEOUT: z.coerce.number().positive().default(30),
  QLIK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  QLIK_POOL_SIZE: z.coerce.number().int().positive().default(10),
  QLIK_SSL_VERIFY: booleanFlag(true),
  QLIK_BROWSER_HEADLESS: booleanFlag(true),
  QLIK_BROWSER_SLOW_MO: z.coerce.number().int().min(0).default(0),
  QLIK_BROWSER_TIMEOUT: z.coerce.number().int().positive().default(30000),
  QLIK_BROWSER_EXECUTABLE: optionalString,
  MCP_TRANSPORT: z.enum(MCP_TRANSPORTS).default('stdio'),
  MCP_HOST: z.string().trim().min(1).default('127.0.0.1'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).default('info'),
});

/**
 * `qlik.example.com/` → `https://qlik.example.com`
 */
export function normalizeServerUrl(raw: string): string {
  const withScheme = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  return withScheme.replace(/\/+$/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): QlikConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const issues: string[] = [];

  let credentials: QlikCredentials | undefined;
  if (values.QLIK_PASSWORD) {
    credentials = { kind: 'password', password: values.QLIK_PASSWORD };
  } else if (values.QLIK_API_KEY) {
    credentials = { kind: 'apiKey', apiKey: values.QLIK_API_KEY };
  } else {
    issues.push('QLIK_PASSWORD or QLIK_API_KEY is required');
  }

  if (values.QLIK_AUTH_STRATEGY === 'browser' && credentials?.kind !== 'password') {
    issues.push('QLIK_AUTH_STRATEGY=browser requires QLIK_PASSWORD');
  }

  let serverUrl = '';
  try {
    serverUrl = new URL(normalizeServerUrl(values.QLIK_SERVER)).href.replace(/\/+$/, '');
  } catch {
    issues.push(`QLIK_SERVER: not a valid URL: ${values.QLIK_SERVER}`);
  }

  if (issues.length > 0 || !credentials) {
    throw new ConfigError(issues);
  }

  return {
    serverUrl,
    username: values.QLIK_USERNAME,
    credentials,
    defaultAppId: values.QLIK_APP_ID,
    authStrategy: values.QLIK_AUTH_STRATEGY,
    sessionCookieName: values.QLIK_SESSION_COOKIE,
    requestTimeoutMs: Math.round(values.QLIK_REQUEST_TIMEOUT * 1000),
    maxRetries: values.QLIK_MAX_RETRIES,
    poolSize: values.QLIK_POOL_SIZE,
    sslVerify: values.QLIK_SSL_VERIFY,
    browser: {
      headless: values.QLIK_BROWSER_HEADLESS,
      slowMo: values.QLIK_BROWSER_SLOW_MO,
      timeoutMs: values.QLIK_BROWSER_TIMEOUT,
      executablePath: values.QLIK_BROWSER_EXECUTABLE,
    },
    transport: values.MCP_TRANSPORT,
    host: values.MCP_HOST,
    port: values.MCP_PORT,
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Test Data Fixtures for MCP Server Tests
 *
 * Factory functions for QRS payloads, config and sessions with sensible
 * defaults. Override only what a test is about.
 *
 * @module __testUtils__/fixtures
 */

import type { QlikConfig } from '../qlik-sense/config.js';
import { createSession, type Session } from '../qlik-sense/session.js';
import type { QrsApp, QrsExecutionDetail, QrsExecutionResult, QrsTask } from '../qlik-sense/types.js';

export const SERVER_URL = 'https://qlik.test';
export const APP_ID = '0a1b2c3d-0000-4000-8000-000000000001';
export const TASK_ID = '0a1b2c3d-0000-4000-8000-000000000002';
export const EXECUTION_ID = '0a1b2c3d-0000-4000-8000-000000000003';

// ============================================================================
// Config and session
// ============================================================================

export function createTestConfig(overrides: Partial<QlikConfig> = {}): QlikConfig {
  return {
    serverUrl: SERVER_URL,
    username: 'CORP\\svc-reader',
    credentials: { kind: 'password', password: 'test-secret' },
    authStrategy: 'direct',
    sessionCookieName: 'X-Qlik-Session',
    requestTimeoutMs: 5000,
    maxRetries: 2,
    poolSize: 4,
    sslVerify: true,
    browser: { headless: true, slowMo: 0, timeoutMs: 5000 },
    transport: 'stdio',
    host: '127.0.0.1',
    port: 8000,
    logLevel: 'error',
    ...overrides,
  };
}

export function createTestSession(overrides: Partial<Omit<Session, 'createdAt'>> = {}): Session {
  return createSession(
    {
      serverUrl: SERVER_URL,
      username: 'CORP\\svc-reader',
      token: 'session-token-1',
      cookieName: 'X-Qlik-Session',
      ...overrides,
    },
    new Date('2026-01-15T08:00:00.000Z'),
  );
}

// ============================================================================
// QRS payloads
// ============================================================================

export function createQrsApp(overrides: Partial<QrsApp> = {}): QrsApp {
  return {
    id: APP_ID,
    name: 'Sales Dashboard',
    description: 'Monthly sales',
    owner: { name: 'Ada Admin', userId: 'ada', userDirectory: 'CORP' },
    stream: { id: '0a1b2c3d-0000-4000-8000-0000000000aa', name: 'Finance' },
    published: true,
    publishTime: '2026-01-10T09:00:00.000Z',
    lastReloadTime: '2026-01-14T06:00:00.000Z',
    fileSize: 2048,
    tags: [{ id: '0a1b2c3d-0000-4000-8000-0000000000bb', name: 'sales' }],
    createdDate: '2025-11-01T12:00:00.000Z',
    modifiedDate: '2026-01-14T06:00:05.000Z',
    ...overrides,
  };
}

export function createQrsTask(overrides: Partial<QrsTask> = {}): QrsTask {
  return {
    id: TASK_ID,
    name: 'Reload Sales Dashboard',
    taskType: 0,
    enabled: true,
    isManuallyTriggered: false,
    app: { id: APP_ID, name: 'Sales Dashboard' },
    operational: {
      nextExecution: '2026-01-16T06:00:00.000Z',
      lastExecutionResult: {
        status: 7,
        startTime: '2026-01-15T06:00:00.000Z',
        stopTime: '2026-01-15T06:01:30.000Z',
      },
    },
    ...overrides,
  };
}

export function createScriptLogDetail(message: string, timestamp: string): QrsExecutionDetail {
  return { detailType: 'ScriptLogEntry', message, timestamp, detailCreatedDate: timestamp };
}

export function createQrsExecutionResult(overrides: Partial<QrsExecutionResult> = {}): QrsExecutionResult {
  return {
    id: EXECUTION_ID,
    taskID: TASK_ID,
    taskName: 'Reload Sales Dashboard',
    appID: APP_ID,
    executingNodeName: 'qlik-node-1',
    status: 7,
    startTime: '2026-01-15T06:00:00.000Z',
    stopTime: '2026-01-15T06:01:30.000Z',
    duration: 90000,
    details: [
      createScriptLogDetail('Execution started.', '2026-01-15T06:00:00.500Z'),
      createScriptLogDetail('Execution finished.', '2026-01-15T06:01:29.900Z'),
    ],
    ...overrides,
  };
}

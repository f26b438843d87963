/**
 * Qlik Sense tool handlers.
 *
 * Each invocation takes the cached session (logging in on first use), builds
 * a QlikClient over it and returns the client's records. Errors propagate to
 * McpServer, which reports them as tool errors.
 */

import type { AnyToolHandler } from '../shared/server.js';
import type { Logger } from '../shared/logger.js';
import { assertQrsId, QlikClient } from './client.js';
import { ClientError } from './errors.js';
import type { QrsTransport } from './http.js';
import type { SessionManager, SessionStatus } from './session.js';
import {
  GetSessionStatusArgsSchema,
  GetTaskLogsArgsSchema,
  ListAppsArgsSchema,
  ListTasksArgsSchema,
  type AppRecord,
  type GetTaskLogsArgs,
  type ListTasksArgs,
  type LogRecord,
  type TaskRecord,
} from './types.js';

export interface QlikToolDeps {
  sessions: SessionManager;
  transport: QrsTransport;
  logger: Logger;
  defaultAppId?: string;
}

export function createQlikTools(deps: QlikToolDeps): AnyToolHandler[] {
  const { sessions, transport, logger } = deps;

  async function withClient<T>(operation: (client: QlikClient) => Promise<T>): Promise<T> {
    const session = await sessions.acquire();
    const client = new QlikClient({ transport, session, logger });
    try {
      return await operation(client);
    } catch (err) {
      if (err instanceof ClientError && err.isAuthFailure) {
        sessions.discard(`HTTP ${err.status} from ${err.endpoint}`, session);
      }
      throw err;
    }
  }

  async function listApps(): Promise<AppRecord[]> {
    return withClient((client) => client.listApps());
  }

  async function listTasks(args: ListTasksArgs): Promise<TaskRecord[]> {
    const requested = args.app_id ?? deps.defaultAppId;
    const appId = requested === undefined ? undefined : assertQrsId(requested, 'App ID');
    return withClient((client) => client.listTasks({ appId }));
  }

  async function getTaskLogs(args: GetTaskLogsArgs): Promise<LogRecord[]> {
    // Reject bad ids before a login is spent on them
    const taskId = assertQrsId(args.task_id, 'Task ID');
    return withClient((client) => client.getLogs(taskId, { limit: args.limit }));
  }

  async function getSessionStatus(): Promise<SessionStatus> {
    return sessions.status((session) => new QlikClient({ transport, session, logger }).checkSession());
  }

  return [
    {
      name: 'list_apps',
      description: 'List Qlik Sense apps with owner, stream, publish state and last reload time',
      schema: ListAppsArgsSchema,
      handler: listApps,
    },
    {
      name: 'list_tasks',
      description: 'List Qlik Sense tasks with type, app, trigger and last execution status',
      schema: ListTasksArgsSchema,
      handler: listTasks,
    },
    {
      name: 'get_task_logs',
      description: 'Get execution results for a task, newest first, with duration, script log excerpt and errors',
      schema: GetTaskLogsArgsSchema,
      handler: getTaskLogs,
    },
    {
      name: 'get_session_status',
      description: 'Report whether a Qlik Sense session is held and whether the server still accepts it',
      schema: GetSessionStatusArgsSchema,
      handler: getSessionStatus,
    },
  ] satisfies AnyToolHandler[];
}

/**
 * Qlik Repository Service client.
 *
 * Holds one Session and turns QRS payloads into the flat records the tools
 * return. Each method issues a single GET (retried by QrsTransport).
 */

import { z } from 'zod';
import type { Logger } from '../shared/logger.js';
import { ClientError, ValidationError } from './errors.js';
import { excerpt, type QrsTransport } from './http.js';
import type { Session } from './session.js';
import {
  EXECUTION_STATUSES,
  QRS_ID_PATTERN,
  QRS_NEVER,
  QrsAboutSchema,
  QrsAppSchema,
  QrsExecutionResultSchema,
  QrsTaskSchema,
  TASK_TYPES,
  type AppRecord,
  type LogRecord,
  type QrsApp,
  type QrsExecutionDetail,
  type QrsExecutionResult,
  type QrsTask,
  type ScriptLogLine,
  type TaskRecord,
  type TaskType,
} from './types.js';

export const SCRIPT_LOG_EXCERPT_LINES = 50;

/**
 * Ids end up inside QRS filter expressions, so only GUIDs are accepted.
 */
export function assertQrsId(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} is required`);
  }
  if (!QRS_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(`${label} must be a GUID, got "${trimmed}"`);
  }
  return trimmed;
}

// ============================================================================
// Field helpers
// ============================================================================

/** QRS' "never" date and empty strings become null. */
function qrsDate(value: string | null | undefined): string | null {
  if (!value || value === QRS_NEVER) {return null;}
  return value;
}

export function decodeTaskType(value: number | null | undefined): TaskType {
  if (value === null || value === undefined) {return 'Unknown';}
  return TASK_TYPES[value] ?? 'Unknown';
}

export function decodeExecutionStatus(value: number | string | null | undefined): string {
  if (typeof value === 'string') {return value;}
  if (typeof value === 'number') {return EXECUTION_STATUSES[value] ?? `Unknown(${value})`;}
  return 'Unknown';
}

export function formatDuration(durationMs: number | null): string {
  return durationMs === null ? 'Unknown' : `${(durationMs / 1000).toFixed(2)}s`;
}

function executionDuration(result: QrsExecutionResult): number | null {
  const start = qrsDate(result.startTime);
  const stop = qrsDate(result.stopTime);
  if (start && stop) {
    const elapsed = Date.parse(stop) - Date.parse(start);
    if (Number.isFinite(elapsed) && elapsed >= 0) {return elapsed;}
  }
  return typeof result.duration === 'number' ? result.duration : null;
}

// ============================================================================
// Record mappers
// ============================================================================

export function toAppRecord(app: QrsApp): AppRecord {
  return {
    id: app.id,
    name: app.name ?? 'Unknown',
    owner: app.owner?.name || app.owner?.userId || 'Unknown',
    lastReloadTime: qrsDate(app.lastReloadTime),
    description: app.description ?? '',
    published: app.published ?? false,
    publishTime: qrsDate(app.publishTime),
    stream: app.stream?.name ?? null,
    tags: (app.tags ?? []).map((tag) => tag.name ?? '').filter((name) => name !== ''),
    fileSize: app.fileSize ?? 0,
    createdDate: qrsDate(app.createdDate),
    modifiedDate: qrsDate(app.modifiedDate),
  };
}

export function toTaskRecord(task: QrsTask): TaskRecord {
  const lastExecution = task.operational?.lastExecutionResult;
  return {
    id: task.id,
    name: task.name ?? 'Unknown',
    type: decodeTaskType(task.taskType),
    enabled: task.enabled ?? false,
    status: lastExecution ? decodeExecutionStatus(lastExecution.status) : 'NeverStarted',
    app: task.app?.id ? { id: task.app.id, name: task.app.name ?? '' } : null,
    trigger: {
      manual: task.isManuallyTriggered ?? false,
      nextExecution: qrsDate(task.operational?.nextExecution),
    },
    lastExecutionTime: qrsDate(lastExecution?.startTime),
    lastExecutionStopTime: qrsDate(lastExecution?.stopTime),
  };
}

function scriptLogLine(detail: QrsExecutionDetail): ScriptLogLine {
  return {
    timestamp: detail.timestamp ?? detail.detailCreatedDate ?? null,
    message: detail.message ?? '',
  };
}

export function toLogRecord(result: QrsExecutionResult, taskId: string): LogRecord {
  const details = result.details ?? [];
  const scriptLog = details
    .filter((detail) => detail.detailType === 'ScriptLogEntry')
    .map(scriptLogLine)
    .slice(-SCRIPT_LOG_EXCERPT_LINES);
  const errorMessages = details
    .filter((detail) => detail.detailType === 'Error')
    .map((detail) => detail.message ?? '')
    .filter((message) => message !== '');
  const durationMs = executionDuration(result);

  return {
    executionId: result.id,
    taskId: result.taskID ?? taskId,
    taskName: result.taskName ?? 'Unknown',
    appId: result.appID ?? null,
    status: decodeExecutionStatus(result.status),
    startTime: qrsDate(result.startTime),
    stopTime: qrsDate(result.stopTime),
    durationMs,
    durationFormatted: formatDuration(durationMs),
    executingNode: result.executingNodeName ?? null,
    scriptLog,
    errorMessage: errorMessages[0] ?? null,
    errorMessages,
    hasErrors: errorMessages.length > 0,
  };
}

function startedAt(record: LogRecord): number | null {
  if (!record.startTime) {return null;}
  const time = Date.parse(record.startTime);
  return Number.isNaN(time) ? null : time;
}

/** Newest first; executions that never started (or have no readable start) sort last. */
function byStartTimeDesc(a: LogRecord, b: LogRecord): number {
  const left = startedAt(a);
  const right = startedAt(b);
  if (left === null || right === null) {
    return (left === null ? 1 : 0) - (right === null ? 1 : 0);
  }
  return right - left;
}

// ============================================================================
// Client
// ============================================================================

export interface QlikClientOptions {
  transport: QrsTransport;
  session: Session;
  logger: Logger;
}

export interface ListTasksOptions {
  appId?: string;
}

export interface GetLogsOptions {
  limit?: number;
}

export class QlikClient {
  private readonly transport: QrsTransport;
  private readonly logger: Logger;
  readonly session: Session;

  constructor(options: QlikClientOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.logger = options.logger;
  }

  private async getParsed<T extends z.ZodTypeAny>(
    path: string,
    query: Record<string, string | undefined>,
    schema: T,
  ): Promise<z.output<T>> {
    const response = await this.transport.getJson(path, query, this.session);
    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new ClientError(
        `Unexpected response shape from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
        {
          endpoint: path,
          status: response.status,
          body: excerpt(JSON.stringify(response.body) ?? ''),
          attempts: response.attempts,
        },
      );
    }
    return parsed.data;
  }

  async listApps(): Promise<AppRecord[]> {
    const apps = await this.getParsed('/qrs/app/full', {}, z.array(QrsAppSchema));
    this.logger.info('Fetched apps', { count: apps.length });
    return apps.map(toAppRecord);
  }

  async listTasks(options: ListTasksOptions = {}): Promise<TaskRecord[]> {
    const appId = options.appId === undefined ? undefined : assertQrsId(options.appId, 'App ID');
    const tasks = await this.getParsed(
      '/qrs/task/full',
      { filter: appId ? `app.id eq ${appId}` : undefined },
      z.array(QrsTaskSchema),
    );
    this.logger.info('Fetched tasks', { count: tasks.length, appId });
    return tasks.map(toTaskRecord);
  }

  async getLogs(taskId: string, options: GetLogsOptions = {}): Promise<LogRecord[]> {
    const id = assertQrsId(taskId, 'Task ID');
    const results = await this.getParsed(
      '/qrs/executionresult/full',
      { filter: `taskID eq ${id}` },
      z.array(QrsExecutionResultSchema),
    );

    const logs = results.map((result) => toLogRecord(result, id)).sort(byStartTimeDesc);
    this.logger.info('Fetched execution results', { taskId: id, count: logs.length });
    return options.limit === undefined ? logs : logs.slice(0, options.limit);
  }

  /**
   * True when the platform still accepts the session cookie.
   */
  async checkSession(): Promise<boolean> {
    try {
      await this.getParsed('/qrs/about', {}, QrsAboutSchema);
      return true;
    } catch (err) {
      if (err instanceof ClientError && err.isAuthFailure) {
        return false;
      }
      throw err;
    }
  }
}

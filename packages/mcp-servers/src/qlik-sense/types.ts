/**
 * Qlik Sense MCP Server Types
 *
 * Tool argument schemas, the QRS payload shapes the client reads, and the
 * flattened records the tools return.
 */

import { z } from 'zod';

/** QRS entity ids are GUIDs. */
export const QRS_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// ============================================================================
// Tool argument schemas
// ============================================================================

export const ListAppsArgsSchema = z.object({});

export const ListTasksArgsSchema = z.object({
  app_id: z.string().optional().describe('Only return tasks for this app ID (defaults to QLIK_APP_ID when set)'),
});

export const GetTaskLogsArgsSchema = z.object({
  task_id: z.string().describe('ID of the task whose execution results to fetch'),
  limit: z.number().int().positive().optional().describe('Maximum number of executions to return, newest first'),
});

export const GetSessionStatusArgsSchema = z.object({});

export type ListAppsArgs = z.infer<typeof ListAppsArgsSchema>;
export type ListTasksArgs = z.infer<typeof ListTasksArgsSchema>;
export type GetTaskLogsArgs = z.infer<typeof GetTaskLogsArgsSchema>;
export type GetSessionStatusArgs = z.infer<typeof GetSessionStatusArgsSchema>;

// ============================================================================
// QRS enumerations
// ============================================================================

/** Indexed by QRS `taskType`. */
export const TASK_TYPES = ['ReloadTask', 'ExternalProgramTask', 'UserSyncTask', 'DistributeTask'] as const;

/** Indexed by QRS execution `status`. */
export const EXECUTION_STATUSES = [
  'NeverStarted',
  'Triggered',
  'Started',
  'Queued',
  'AbortInitiated',
  'Aborting',
  'Aborted',
  'FinishedSuccess',
  'FinishedFail',
  'Skipped',
  'Retry',
  'Error',
  'Reset',
] as const;

export type TaskType = (typeof TASK_TYPES)[number] | 'Unknown';

/** QRS uses this date for "never" (no next execution, no stop time yet). */
export const QRS_NEVER = '1753-01-01T00:00:00.000Z';

// ============================================================================
// QRS payload schemas (only the fields the records use)
// ============================================================================

const NamedRefSchema = z.object({
  id: z.string().optional(),
  name: z.string().nullish(),
}).passthrough();

const StatusSchema = z.union([z.number(), z.string()]);

export const QrsAppSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  owner: z.object({
    name: z.string().nullish(),
    userId: z.string().nullish(),
    userDirectory: z.string().nullish(),
  }).passthrough().nullish(),
  stream: NamedRefSchema.nullish(),
  published: z.boolean().nullish(),
  publishTime: z.string().nullish(),
  lastReloadTime: z.string().nullish(),
  fileSize: z.number().nullish(),
  tags: z.array(NamedRefSchema).nullish(),
  createdDate: z.string().nullish(),
  modifiedDate: z.string().nullish(),
}).passthrough();

export const QrsTaskSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  taskType: z.number().nullish(),
  enabled: z.boolean().nullish(),
  isManuallyTriggered: z.boolean().nullish(),
  app: NamedRefSchema.nullish(),
  operational: z.object({
    nextExecution: z.string().nullish(),
    lastExecutionResult: z.object({
      status: StatusSchema.nullish(),
      startTime: z.string().nullish(),
      stopTime: z.string().nullish(),
    }).passthrough().nullish(),
  }).passthrough().nullish(),
}).passthrough();

export const QrsExecutionDetailSchema = z.object({
  detailType: z.string().nullish(),
  message: z.string().nullish(),
  timestamp: z.string().nullish(),
  detailCreatedDate: z.string().nullish(),
}).passthrough();

export const QrsExecutionResultSchema = z.object({
  id: z.string(),
  taskID: z.string().nullish(),
  taskName: z.string().nullish(),
  appID: z.string().nullish(),
  executingNodeName: z.string().nullish(),
  status: StatusSchema.nullish(),
  startTime: z.string().nullish(),
  stopTime: z.string().nullish(),
  duration: z.number().nullish(),
  details: z.array(QrsExecutionDetailSchema).nullish(),
}).passthrough();

export const QrsAboutSchema = z.object({
  buildVersion: z.string().nullish(),
}).passthrough();

export type QrsApp = z.infer<typeof QrsAppSchema>;
export type QrsTask = z.infer<typeof QrsTaskSchema>;
export type QrsExecutionResult = z.infer<typeof QrsExecutionResultSchema>;
export type QrsExecutionDetail = z.infer<typeof QrsExecutionDetailSchema>;

// ============================================================================
// Records returned by the tools
// ============================================================================

export interface AppRecord {
  id: string;
  name: string;
  owner: string;
  lastReloadTime: string | null;
  description: string;
  published: boolean;
  publishTime: string | null;
  stream: string | null;
  tags: string[];
  fileSize: number;
  createdDate: string | null;
  modifiedDate: string | null;
}

export interface TaskRecord {
  id: string;
  name: string;
  type: TaskType;
  enabled: boolean;
  status: string;
  app: { id: string; name: string } | null;
  trigger: {
    manual: boolean;
    nextExecution: string | null;
  };
  lastExecutionTime: string | null;
  lastExecutionStopTime: string | null;
}

export interface ScriptLogLine {
  timestamp: string | null;
  message: string;
}

export interface LogRecord {
  executionId: string;
  taskId: string;
  taskName: string;
  appId: string | null;
  status: string;
  startTime: string | null;
  stopTime: string | null;
  durationMs: number | null;
  durationFormatted: string;
  executingNode: string | null;
  scriptLog: ScriptLogLine[];
  errorMessage: string | null;
  errorMessages: string[];
  hasErrors: boolean;
}

/**
 * Base MCP Server implementation
 *
 * Transport-agnostic JSON-RPC 2.0 dispatcher for the MCP tool surface:
 * - MCP protocol methods (initialize, ping, tools/list, tools/call)
 * - Input validation with Zod before any handler runs
 * - Tool errors converted into `isError` tool results
 *
 * `start()` serves newline-delimited JSON-RPC over stdin/stdout; the HTTP
 * transport in ./http-transport.ts feeds the same `handle()` entry point.
 */

import * as readline from 'readline';
import { z, type ZodTypeAny } from 'zod';
import { createLogger, serializeError, type Logger } from './logger.js';
import {
  JsonRpcRequestSchema,
  McpToolCallParamsSchema,
  JSON_RPC_ERRORS,
  MCP_PROTOCOL_VERSION,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpInitializeResult,
  type McpServerInfo,
  type McpToolDefinition,
  type McpToolCallResult,
} from './types.js';

export interface ToolHandler<TSchema extends ZodTypeAny = ZodTypeAny> {
  name: string;
  description: string;
  schema: TSchema;
  // Method syntax is bivariant, so specific handlers fit in AnyToolHandler[];
  // arguments are parsed with `schema` before the handler is called
  handler(args: z.output<TSchema>): unknown;
}

export type AnyToolHandler = ToolHandler<ZodTypeAny>;

export interface McpServerOptions {
  name: string;
  version: string;
  tools: AnyToolHandler[];
  logger?: Logger;
  /** Runs once before the process exits (stdin closed or signal). */
  onShutdown?: () => Promise<void> | void;
}

/** Streams for `start()`; they default to the process's stdio. */
export interface StdioOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  exit?: (code: number) => void;
  /** Exit on SIGINT/SIGTERM. Defaults to true. */
  handleSignals?: boolean;
}

// ============================================================================
// Zod → JSON Schema
// ============================================================================

function zodTypeToJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
  const withDescription = (result: Record<string, unknown>): Record<string, unknown> => {
    if (schema.description) {result.description = schema.description;}
    return result;
  };

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return withDescription(zodTypeToJsonSchema(schema.unwrap()));
  }

  if (schema instanceof z.ZodDefault) {
    const inner = zodTypeToJsonSchema(schema._def.innerType);
    return withDescription({ ...inner, default: schema._def.defaultValue() });
  }

  if (schema instanceof z.ZodString) {
    return withDescription({ type: 'string' });
  }

  if (schema instanceof z.ZodNumber) {
    return withDescription({ type: schema.isInt ? 'integer' : 'number' });
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' });
  }

  if (schema instanceof z.ZodArray) {
    return withDescription({ type: 'array', items: zodTypeToJsonSchema(schema.element) });
  }

  if (schema instanceof z.ZodEnum) {
    return withDescription({ type: 'string', enum: schema.options });
  }

  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) {
    return withDescription({ type: 'object', additionalProperties: true });
  }

  return withDescription({ type: 'string' });
}

/**
 * Convert a tool's Zod schema to the JSON Schema advertised in tools/list.
 * Handles the shapes tool arguments actually use; anything else becomes an
 * open object.
 */
export function zodToJsonSchema(schema: ZodTypeAny): McpToolDefinition['inputSchema'] {
  if (!(schema instanceof z.ZodObject)) {
    return { type: 'object', properties: {} };
  }

  const shape: Record<string, ZodTypeAny> = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(shape)) {
    properties[key] = zodTypeToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return {
    type: 'object',
    properties,
    required: required.length > 0 ? required : undefined,
  };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function toolError(message: string, code?: string): McpToolCallResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ error: message, code }, null, 2),
    }],
    isError: true,
  };
}

// ============================================================================
// Server
// ============================================================================

export class McpServer {
  readonly info: McpServerInfo;
  private readonly tools: Map<string, AnyToolHandler>;
  private readonly toolDefinitions: McpToolDefinition[];
  private readonly logger: Logger;
  private readonly onShutdown?: () => Promise<void> | void;
  private shuttingDown = false;

  constructor(options: McpServerOptions) {
    this.info = { name: options.name, version: options.version };
    this.logger = options.logger ?? createLogger(options.name);
    this.onShutdown = options.onShutdown;
    this.tools = new Map();
    this.toolDefinitions = [];

    for (const tool of options.tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
      this.toolDefinitions.push({
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.schema),
      });
    }
  }

  get definitions(): readonly McpToolDefinition[] {
    return this.toolDefinitions;
  }

  /**
   * Handle one decoded JSON-RPC message. Resolves to the response to send,
   * or null for notifications.
   */
  async handle(message: unknown): Promise<JsonRpcResponse | null> {
    const parseResult = JsonRpcRequestSchema.safeParse(message);

    if (!parseResult.success) {
      return this.error(
        recoverId(message),
        JSON_RPC_ERRORS.INVALID_REQUEST,
        `Invalid request: ${parseResult.error.message}`,
      );
    }

    return this.handleRequest(parseResult.data);
  }

  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const { id, method, params } = request;

    if (id === undefined || method.startsWith('notifications/')) {
      this.logger.debug('Notification received', { method });
      return null;
    }

    try {
      switch (method) {
        case 'initialize': {
          const result: McpInitializeResult = {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: this.info,
          };
          return this.success(id, result);
        }

        case 'ping':
          return this.success(id, {});

        case 'tools/list':
          return this.success(id, { tools: this.toolDefinitions });

        case 'tools/call':
          return await this.handleToolCall(id, params);

        default:
          return this.error(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown method: ${method}`);
      }
    } catch (err) {
      this.logger.error('Request failed', { method, error: err });
      return this.error(id, JSON_RPC_ERRORS.INTERNAL_ERROR, serializeError(err).message);
    }
  }

  private async handleToolCall(id: JsonRpcId, params: unknown): Promise<JsonRpcResponse> {
    const parseResult = McpToolCallParamsSchema.safeParse(params);
    if (!parseResult.success) {
      return this.error(id, JSON_RPC_ERRORS.INVALID_PARAMS, `Invalid tool call params: ${parseResult.error.message}`);
    }

    const { name, arguments: args } = parseResult.data;
    const tool = this.tools.get(name);

    if (!tool) {
      return this.error(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
    }

    const argsParseResult = tool.schema.safeParse(args ?? {});
    if (!argsParseResult.success) {
      this.logger.warn('Invalid tool arguments', { tool: name });
      return this.success(id, toolError(`Invalid arguments: ${argsParseResult.error.message}`, 'INVALID_ARGUMENTS'));
    }

    const startedAt = Date.now();
    try {
      const toolResult = await tool.handler(argsParseResult.data);
      this.logger.info('Tool call succeeded', { tool: name, durationMs: Date.now() - startedAt });
      const result: McpToolCallResult = {
        content: [{
          type: 'text',
          text: JSON.stringify(toolResult, null, 2),
        }],
      };
      return this.success(id, result);
    } catch (err) {
      const { message } = serializeError(err);
      this.logger.error('Tool call failed', { tool: name, durationMs: Date.now() - startedAt, error: err });
      return this.success(id, toolError(message, errorCode(err)));
    }
  }

  private success(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: '2.0', id, result };
  }

  private error(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
    return { jsonrpc: '2.0', id, error: { code, message } };
  }

  /**
   * Run the shutdown hook once. Safe to call from several exit paths.
   */
  async close(): Promise<void> {
    if (this.shuttingDown) {return;}
    this.shuttingDown = true;
    try {
      await this.onShutdown?.();
    } catch (err) {
      this.logger.error('Shutdown hook failed', { error: err });
    }
  }

  private exitAfterClose(exit: (code: number) => void, pending: Iterable<Promise<void>> = []): void {
    Promise.allSettled(pending)
      .then(() => this.close())
      .then(() => exit(0))
      .catch((err: unknown) => {
        this.logger.error('Shutdown failed', { error: err });
        exit(1);
      });
  }

  /**
   * Start the server and listen for JSON-RPC requests on stdin.
   *
   * When the input closes, requests still in flight are answered before the
   * shutdown hook runs and the process exits.
   */
  public start(options: StdioOptions = {}): void {
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const exit = options.exit ?? ((code: number) => process.exit(code));
    const inFlight = new Set<Promise<void>>();

    this.logger.info(`${this.info.name} MCP Server v${this.info.version} running on stdio`);

    const rl = readline.createInterface({
      input,
      terminal: false,
    });

    const send = (response: JsonRpcResponse): void => {
      output.write(`${JSON.stringify(response)}\n`);
    };

    rl.on('line', (line) => {
      if (!line.trim()) {return;}

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (jsonErr) {
        this.logger.warn('JSON parse error', { error: jsonErr });
        send(this.error(null, JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error'));
        return;
      }

      const request: Promise<void> = this.handle(parsed)
        .then((response) => {
          if (response) {send(response);}
        })
        .catch((err: unknown) => {
          this.logger.error('Unhandled request failure', { error: err });
          send(this.error(recoverId(parsed), JSON_RPC_ERRORS.INTERNAL_ERROR, serializeError(err).message));
        })
        .finally(() => {
          inFlight.delete(request);
        });
      inFlight.add(request);
    });

    rl.on('close', () => this.exitAfterClose(exit, [...inFlight]));

    if (options.handleSignals ?? true) {
      process.on('SIGINT', () => this.exitAfterClose(exit, [...inFlight]));
      process.on('SIGTERM', () => this.exitAfterClose(exit, [...inFlight]));
    }
  }
}

/**
 * Best-effort id extraction from a message that failed validation.
 */
function recoverId(message: unknown): JsonRpcId {
  if (typeof message !== 'object' || message === null || !('id' in message)) {
    return null;
  }
  const { id } = message;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * Unit tests for Base MCP Server
 *
 * Tests JSON-RPC 2.0 protocol handling, MCP methods, tool error results,
 * input validation, and Zod schema conversion.
 */

import { PassThrough, Writable } from 'stream';
import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { silentLogger } from '../logger.js';
import { McpServer, zodToJsonSchema, type AnyToolHandler, type ToolHandler } from '../server.js';
import { JSON_RPC_ERRORS, type JsonRpcResponse } from '../types.js';

interface ToolText {
  content: Array<{ type: string; text: string }>;
  isError?: boolean;
}

describe('McpServer', () => {
  const createTestServer = (tools: AnyToolHandler[] = [], onShutdown?: () => Promise<void> | void) => {
    return new McpServer({
      name: 'test-server',
      version: '1.0.0',
      tools,
      logger: silentLogger,
      onShutdown,
    });
  };

  const send = async (server: McpServer, request: unknown): Promise<JsonRpcResponse> => {
    const response = await server.handle(request);
    if (!response) {
      throw new Error('expected a response');
    }
    return response;
  };

  const resultOf = (response: JsonRpcResponse): unknown => {
    if (!('result' in response)) {
      throw new Error(`expected a result, got error ${response.error.message}`);
    }
    return response.result;
  };

  const toolText = (response: JsonRpcResponse): ToolText => resultOf(response) as ToolText;

  const echoTool: ToolHandler = {
    name: 'echo',
    description: 'Echo a value',
    schema: z.object({ value: z.string() }),
    handler: (args: { value: string }) => ({ echoed: args.value }),
  };

  describe('Initialization', () => {
    it('should expose server info', () => {
      const server = createTestServer();
      expect(server.info).toEqual({ name: 'test-server', version: '1.0.0' });
    });

    it('should reject duplicate tool names', () => {
      expect(() => createTestServer([echoTool, echoTool])).toThrow('Duplicate tool name: echo');
    });
  });

  describe('MCP Protocol - initialize', () => {
    it('should respond to initialize request', async () => {
      const server = createTestServer();

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {},
      });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: {
          protocolVersion: '2024-11-05',
          capabilities: { tools: {} },
          serverInfo: { name: 'test-server', version: '1.0.0' },
        },
      });
    });

    it('should answer ping with an empty result', async () => {
      const server = createTestServer();
      const response = await send(server, { jsonrpc: '2.0', id: 'p', method: 'ping' });
      expect(response).toEqual({ jsonrpc: '2.0', id: 'p', result: {} });
    });
  });

  describe('Notifications', () => {
    it('should return null for notifications/initialized', async () => {
      const server = createTestServer();
      const response = await server.handle({ jsonrpc: '2.0', method: 'notifications/initialized' });
      expect(response).toBeNull();
    });

    it('should return null for any request without an id', async () => {
      const server = createTestServer();
      const response = await server.handle({ jsonrpc: '2.0', method: 'tools/list' });
      expect(response).toBeNull();
    });
  });

  describe('MCP Protocol - tools/list', () => {
    it('should return empty tools list when no tools registered', async () => {
      const server = createTestServer();
      const response = await send(server, { jsonrpc: '2.0', id: 2, method: 'tools/list' });
      expect(resultOf(response)).toEqual({ tools: [] });
    });

    it('should list registered tools with their input schemas', async () => {
      const server = createTestServer([echoTool]);
      const response = await send(server, { jsonrpc: '2.0', id: 3, method: 'tools/list' });

      expect(resultOf(response)).toEqual({
        tools: [{
          name: 'echo',
          description: 'Echo a value',
          inputSchema: {
            type: 'object',
            properties: { value: { type: 'string' } },
            required: ['value'],
          },
        }],
      });
    });
  });

  describe('MCP Protocol - tools/call', () => {
    it('should execute tool with valid arguments', async () => {
      const server = createTestServer([echoTool]);

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 4,
        method: 'tools/call',
        params: { name: 'echo', arguments: { value: 'hello' } },
      });

      const result = toolText(response);
      expect(result.isError).toBeUndefined();
      expect(result.content).toHaveLength(1);
      expect(result.content[0].type).toBe('text');
      expect(JSON.parse(result.content[0].text)).toEqual({ echoed: 'hello' });
    });

    it('should return a tool error for invalid arguments without calling the handler', async () => {
      const handler = vi.fn();
      const server = createTestServer([{ ...echoTool, handler }]);

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 5,
        method: 'tools/call',
        params: { name: 'echo', arguments: { value: 42 } },
      });

      const result = toolText(response);
      expect(result.isError).toBe(true);
      const body = JSON.parse(result.content[0].text) as { error: string; code: string };
      expect(body.code).toBe('INVALID_ARGUMENTS');
      expect(body.error.startsWith('Invalid arguments:')).toBe(true);
      expect(handler).not.toHaveBeenCalled();
    });

    it('should return METHOD_NOT_FOUND for unknown tool', async () => {
      const server = createTestServer();

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 6,
        method: 'tools/call',
        params: { name: 'missing', arguments: {} },
      });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 6,
        error: { code: JSON_RPC_ERRORS.METHOD_NOT_FOUND, message: 'Unknown tool: missing' },
      });
    });

    it('should convert a thrown error into a tool error result', async () => {
      const server = createTestServer([{
        name: 'fails',
        description: 'Always fails',
        schema: z.object({}),
        handler: () => {
          throw new Error('upstream exploded');
        },
      }]);

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 7,
        method: 'tools/call',
        params: { name: 'fails' },
      });

      const result = toolText(response);
      expect(result.isError).toBe(true);
      expect(JSON.parse(result.content[0].text)).toEqual({ error: 'upstream exploded' });
    });

    it('should report the error code of coded errors', async () => {
      class CodedError extends Error {
        readonly code = 'VALIDATION_ERROR';
      }
      const server = createTestServer([{
        name: 'coded',
        description: 'Fails with a code',
        schema: z.object({}),
        handler: async () => {
          throw new CodedError('Task ID is required');
        },
      }]);

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 8,
        method: 'tools/call',
        params: { name: 'coded', arguments: {} },
      });

      expect(JSON.parse(toolText(response).content[0].text)).toEqual({
        error: 'Task ID is required',
        code: 'VALIDATION_ERROR',
      });
    });

    it('should validate tool call params structure', async () => {
      const server = createTestServer([echoTool]);

      const response = await send(server, {
        jsonrpc: '2.0',
        id: 9,
        method: 'tools/call',
        params: { arguments: {} },
      });

      expect('error' in response && response.error.code).toBe(JSON_RPC_ERRORS.INVALID_PARAMS);
    });

    it('should treat missing arguments as an empty object', async () => {
      const handler = vi.fn(() => 'ok');
      const server = createTestServer([{
        name: 'no_args',
        description: 'Takes nothing',
        schema: z.object({ limit: z.number().optional() }),
        handler,
      }]);

      await send(server, { jsonrpc: '2.0', id: 10, method: 'tools/call', params: { name: 'no_args' } });

      expect(handler).toHaveBeenCalledWith({});
    });
  });

  describe('JSON-RPC errors', () => {
    it('should return METHOD_NOT_FOUND for unknown methods', async () => {
      const server = createTestServer();
      const response = await send(server, { jsonrpc: '2.0', id: 11, method: 'resources/list' });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 11,
        error: { code: JSON_RPC_ERRORS.METHOD_NOT_FOUND, message: 'Unknown method: resources/list' },
      });
    });

    it('should return INVALID_REQUEST and keep the id of malformed requests', async () => {
      const server = createTestServer();
      const response = await send(server, { jsonrpc: '1.0', id: 12, method: 'ping' });

      expect(response.id).toBe(12);
      expect('error' in response && response.error.code).toBe(JSON_RPC_ERRORS.INVALID_REQUEST);
    });

    it('should use a null id when none can be recovered', async () => {
      const server = createTestServer();
      const response = await send(server, 'not an object');

      expect(response.id).toBeNull();
      expect('error' in response && response.error.code).toBe(JSON_RPC_ERRORS.INVALID_REQUEST);
    });
  });

  describe('close()', () => {
    it('should run the shutdown hook once', async () => {
      const onShutdown = vi.fn();
      const server = createTestServer([], onShutdown);

      await server.close();
      await server.close();

      expect(onShutdown).toHaveBeenCalledTimes(1);
    });
  });

  describe('start() over stdio', () => {
    const startOnStreams = (server: McpServer) => {
      const input = new PassThrough();
      const events: string[] = [];
      const lines: string[] = [];
      const output = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          events.push('write');
          lines.push(chunk.toString());
          callback();
        },
      });
      let exitWith: (code: number) => void = () => undefined;
      const exited = new Promise<number>((resolve) => {
        exitWith = resolve;
      });

      server.start({
        input,
        output,
        exit: (code) => {
          events.push('exit');
          exitWith(code);
        },
        handleSignals: false,
      });

      const responses = () => lines.map((line) => JSON.parse(line) as JsonRpcResponse);
      return { input, events, exited, responses };
    };

    const line = (message: unknown): string => `${JSON.stringify(message)}\n`;

    it('should answer in-flight calls before exiting when stdin closes', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const slowTool: ToolHandler = {
        name: 'slow',
        description: 'Resolves when released',
        schema: z.object({}),
        handler: () => gate.then(() => 'done'),
      };
      const events: string[] = [];
      const server = createTestServer([slowTool], () => {
        events.push('shutdown');
      });
      const stdio = startOnStreams(server);

      stdio.input.write(line({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'slow', arguments: {} } }));
      stdio.input.end();
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(stdio.events).toEqual([]);
      expect(events).toEqual([]);

      release();

      expect(await stdio.exited).toBe(0);
      expect(stdio.events).toEqual(['write', 'exit']);
      expect(events).toEqual(['shutdown']);
      expect(stdio.responses()).toEqual([{
        jsonrpc: '2.0',
        id: 1,
        result: { content: [{ type: 'text', text: '"done"' }] },
      }]);
    });

    it('should answer malformed JSON with a parse error and a null id', async () => {
      const stdio = startOnStreams(createTestServer());

      stdio.input.end('{"jsonrpc": "2.0", "id": 4,\n');
      await stdio.exited;

      expect(stdio.responses()).toEqual([{
        jsonrpc: '2.0',
        id: null,
        error: { code: JSON_RPC_ERRORS.PARSE_ERROR, message: 'Parse error' },
      }]);
    });

    it('should skip blank lines', async () => {
      const stdio = startOnStreams(createTestServer());

      stdio.input.write('\n   \n');
      stdio.input.end(line({ jsonrpc: '2.0', id: 2, method: 'ping' }));
      await stdio.exited;

      expect(stdio.responses()).toEqual([{ jsonrpc: '2.0', id: 2, result: {} }]);
    });

    it('should turn an unexpected dispatcher failure into an internal error', async () => {
      const server = createTestServer();
      vi.spyOn(server, 'handle').mockRejectedValueOnce(new Error('dispatcher crashed'));
      const stdio = startOnStreams(server);

      stdio.input.end(line({ jsonrpc: '2.0', id: 7, method: 'ping' }));
      await stdio.exited;

      expect(stdio.responses()).toEqual([{
        jsonrpc: '2.0',
        id: 7,
        error: { code: JSON_RPC_ERRORS.INTERNAL_ERROR, message: 'dispatcher crashed' },
      }]);
    });

    it('should run the shutdown hook and exit with 0 when stdin closes', async () => {
      const onShutdown = vi.fn();
      const stdio = startOnStreams(createTestServer([], onShutdown));

      stdio.input.end();

      expect(await stdio.exited).toBe(0);
      expect(onShutdown).toHaveBeenCalledTimes(1);
      expect(stdio.responses()).toEqual([]);
    });

    it('should still exit with 0 when the shutdown hook throws', async () => {
      const stdio = startOnStreams(createTestServer([], () => {
        throw new Error('disconnect failed');
      }));

      stdio.input.end();

      expect(await stdio.exited).toBe(0);
    });
  });
});

describe('zodToJsonSchema', () => {
  it('should mark non-optional keys as required', () => {
    const schema = z.object({
      task_id: z.string().describe('Task to read'),
      limit: z.number().int().positive().optional().describe('How many'),
    });

    expect(zodToJsonSchema(schema)).toEqual({
      type: 'object',
      properties: {
        task_id: { type: 'string', description: 'Task to read' },
        limit: { type: 'integer', description: 'How many' },
      },
      required: ['task_id'],
    });
  });

  it('should omit required when every key is optional', () => {
    expect(zodToJsonSchema(z.object({ app_id: z.string().optional() }))).toEqual({
      type: 'object',
      properties: { app_id: { type: 'string' } },
      required: undefined,
    });
  });

  it('should handle arrays, enums, booleans and defaults', () => {
    const schema = z.object({
      tags: z.array(z.string()),
      mode: z.enum(['direct', 'browser']),
      verbose: z.boolean(),
      page: z.number().default(1),
    });

    expect(zodToJsonSchema(schema).properties).toEqual({
      tags: { type: 'array', items: { type: 'string' } },
      mode: { type: 'string', enum: ['direct', 'browser'] },
      verbose: { type: 'boolean' },
      page: { type: 'number', default: 1 },
    });
  });

  it('should fall back to an empty object schema for non-object input', () => {
    expect(zodToJsonSchema(z.string())).toEqual({ type: 'object', properties: {} });
  });
});

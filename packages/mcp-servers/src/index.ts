/**
 * Qlik Sense MCP server package.
 *
 * - shared: JSON-RPC/MCP dispatcher, HTTP transport and logger
 * - qlik-sense: session acquisition, QRS client and the tool set
 *
 * @packageDocumentation
 */

export * from './shared/index.js';
export * as QlikSense from './qlik-sense/index.js';

#!/usr/bin/env node
/**
 * sdf-trace MCP Server
 *
 * Wraps the sphere-tracing kernel as 12 callable tools for LLM agents.
 * Runs over stdio transport, so diagnostics go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';

const server = new McpServer({
  name: 'sdf-trace',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
console.error('sdf-trace MCP server listening on stdio');

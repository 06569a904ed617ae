#!/usr/bin/env node
/**
 * wingloft MCP Server
 *
 * Exposes the wing generator as callable tools for LLM agents.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';
import { log } from './log.js';

const server = new McpServer({
  name: 'wingloft',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
log('server ready on stdio');

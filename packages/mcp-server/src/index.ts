#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { LocalSearchService, TextMatcher } from '@menu-search/core';
import { loadConfig, validateConfig, withConfigDefaults } from './config.js';
import { handleToolCall, type Services } from './handlers.js';
import { tools } from './tools.js';
import type { SearchItem } from './types/index.js';
import { formatErrorResponse, isErrorResponse } from './utils/errors.js';

// Configuration
const loadedConfig = loadConfig();
const configErrors = validateConfig(loadedConfig);
if (configErrors.length > 0) {
  console.error('[MenuSearchServer] Configuration errors, using defaults for:', configErrors);
}
const config = withConfigDefaults(loadedConfig);

// Initialize services; stdout carries the protocol, so debug lines go to stderr
const matcher = new TextMatcher({
  maxCacheEntries: config.maxCacheEntries,
  debug: config.debug,
  log: (message) => console.error(message),
});

const services: Services = {
  matcher,
  searchService: new LocalSearchService<SearchItem>(matcher, (item) => item.fields),
  resultLimit: config.resultLimit,
};

// Create MCP server
const server = new Server(
  {
    name: 'menu-search-mcp-server',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool execution
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const result = await handleToolCall(name, args, services);

  if (isErrorResponse(result)) {
    return {
      content: [{
        type: 'text',
        text: formatErrorResponse(result),
      }],
      isError: true,
    };
  }

  return {
    content: [{
      type: 'text',
      text: JSON.stringify(result, null, 2),
    }],
  };
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[MenuSearchServer] Running on stdio');
}

main().catch((error) => {
  console.error('[MenuSearchServer] Fatal error:', error);
  process.exit(1);
});

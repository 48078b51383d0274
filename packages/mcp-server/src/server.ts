// packages/mcp-server/src/server.ts - MCP server setup with 3 tool handlers

import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  DATA_DIRNAME,
  MigrationStore,
  VERSION,
  createLogger,
  errorMessage,
  loadConfig,
  openDatabase,
} from '@armport/core';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { handleMigrate, handlePlan, handleScan, type ToolContext, type ToolResult } from './tools/index.js';

export const TOOL_DEFINITIONS = [
  {
    name: 'armport_scan',
    description:
      'Scan a source tree for x86-specific code (intrinsics, inline assembly, architecture checks, platform APIs), dependencies and build systems. Returns the scan report.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Project directory to scan', minLength: 1 },
      },
      required: ['path'],
    },
  },
  {
    name: 'armport_plan',
    description:
      'Scan a project and build an ordered, confidence-tiered ARM migration plan. The plan is stored as a draft; returns its id and contents.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Project directory', minLength: 1 },
        target: { type: 'string', description: 'Target architecture (default from config, arm64)' },
      },
      required: ['path'],
    },
  },
  {
    name: 'armport_migrate',
    description:
      'Simulate or apply a migration plan. Apply takes a backup first and only writes high-confidence changes. Returns the execution report.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Project directory', minLength: 1 },
        planId: { type: 'string', description: 'Stored plan id (default: build a fresh plan)' },
        target: { type: 'string', description: 'Target architecture for a fresh plan' },
        mode: {
          type: 'string',
          enum: ['simulate', 'apply'],
          description: 'Execution mode',
          default: 'simulate',
        },
      },
      required: ['path'],
    },
  },
];

/** Route one tool call. Failures become an `isError` result, never a thrown error. */
export async function dispatchTool(ctx: ToolContext, toolName: string, args: unknown): Promise<ToolResult> {
  try {
    switch (toolName) {
      case 'armport_scan':
        return await handleScan(ctx, args);
      case 'armport_plan':
        return await handlePlan(ctx, args);
      case 'armport_migrate':
        return await handleMigrate(ctx, args);
      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${toolName}` }],
          isError: true,
        };
    }
  } catch (err) {
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
      isError: true,
    };
  }
}

export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    { name: 'armport', version: VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return dispatchTool(ctx, request.params.name, request.params.arguments ?? {});
  });

  return server;
}

export async function startServer(): Promise<void> {
  const projectDir = process.env.ARMPORT_PROJECT_DIR ?? process.cwd();
  const config = loadConfig({ projectDir });

  // Open SQLite (WAL mode + busy_timeout set by openDatabase)
  const dbPath = process.env.ARMPORT_DB_PATH ?? join(projectDir, DATA_DIRNAME, 'db', 'armport.db');
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = openDatabase(dbPath);

  // stdout carries the protocol, so every log line goes to stderr
  const logger = createLogger(config.advanced.logLevel, 'mcp', true);
  const server = createServer({ store: new MigrationStore(db), logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = (): void => {
    try {
      db.close();
    } catch (err) {
      logger.warn(`Failed to close database: ${errorMessage(err)}`);
    }
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  logger.info('armport MCP server started');
}

// packages/mcp-server/src/server.ts — MCP server setup with the query and cost tools

import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  CancellationToken,
  CostStore,
  DAYS_PER_YEAR,
  MCP_QUERY_MAX_LENGTH,
  Orchestrator,
  VERSION,
  createLogger,
  loadConfig,
  openDatabase,
} from '@rlm-engine/core';
import type { RlmConfig } from '@rlm-engine/core';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { handleCost, handleQuery, toolError } from './tools/index.js';

export const TOOL_DEFINITIONS = [
  {
    name: 'rlm_query',
    description:
      'Answer a query over a large context. The root model explores the context through a JavaScript REPL and may delegate chunks to a sub model. Returns the answer, iteration count and cost.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Question to answer', minLength: 1, maxLength: MCP_QUERY_MAX_LENGTH },
        context: {
          description: 'Context text, or a list of context chunks',
          oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
        },
        rootModel: { type: 'string', description: 'Root model id override' },
        subModel: { type: 'string', description: 'Sub model id override' },
        maxIterations: { type: 'integer', description: 'Iteration cap', minimum: 1, maximum: 200 },
        maxOutputTokens: { type: 'integer', description: 'Cap on tokens per model response', minimum: 1 },
        modelVariant: { type: 'string', enum: ['gpt', 'qwen'], description: 'Prompt variant' },
        includeTrajectory: { type: 'boolean', description: 'Include every step in the result', default: false },
      },
      required: ['query', 'context'],
    },
  },
  {
    name: 'rlm_cost',
    description: 'Query cost and token usage data. Supports session, daily, and all-time scopes.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        scope: {
          type: 'string',
          enum: ['session', 'daily', 'all'],
          description: 'Cost scope',
          default: 'session',
        },
        sessionId: { type: 'string', description: 'Session ID for session scope' },
        days: {
          type: 'integer',
          description: 'Number of days for daily scope',
          default: 30,
          minimum: 1,
          maximum: DAYS_PER_YEAR,
        },
      },
    },
  },
];

function resolveDbPath(config: RlmConfig, projectDir: string): string {
  const dbPath = process.env.RLM_DB_PATH ?? resolve(projectDir, config.database.path);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

export async function startServer(): Promise<void> {
  const projectDir = process.env.RLM_PROJECT_DIR ?? process.cwd();
  const config = loadConfig({ projectDir });
  const logger = createLogger(config.logLevel, 'mcp');

  // WAL mode + busy_timeout set by openDatabase
  const db = openDatabase(resolveDbPath(config, projectDir));
  const orchestrator = new Orchestrator({ config, db, logger });
  const costStore = new CostStore(db);

  const server = new Server({ name: 'rlm-engine', version: VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const toolName = request.params.name;
    const args = request.params.arguments ?? {};

    try {
      switch (toolName) {
        case 'rlm_query': {
          // Client-side cancellation aborts the session
          const token = new CancellationToken();
          extra.signal.addEventListener('abort', () => token.cancel('Request cancelled by client'), { once: true });
          return await handleQuery(orchestrator, args, token);
        }
        case 'rlm_cost': {
          return await handleCost(costStore, args);
        }
        default: {
          return {
            content: [{ type: 'text', text: `Unknown tool: ${toolName}` }],
            isError: true,
          };
        }
      }
    } catch (err) {
      return toolError(err);
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = (): void => {
    if (db.open) db.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  // stderr only: stdout carries the stdio transport
  logger.info('rlm MCP server started');
}

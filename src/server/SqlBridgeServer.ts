import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { IDocumentStore, IRelationalStore } from '../backends/IQueryBackends.js';
import { loadBackendConfig, type BackendConfig } from '../config/backend.js';
import { SpeedTestRunner } from '../speedtest/SpeedTestRunner.js';
import { logger } from '../utils/logger.js';
import { SqlBridgeController, type McpContent, type ToolArgs } from './SqlBridgeController.js';

export const TOOL_DEFINITIONS = [
  {
    name: 'translate_sql',
    description:
      'Translate a restricted SQL SELECT (columns or *, one table, optional WHERE, LIMIT, OFFSET) into a MongoDB find: collection, filter, projection, limit and skip. Nothing is executed.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'SQL SELECT statement.' },
      },
      required: ['query'],
    },
  },
  {
    name: 'speedtest',
    description:
      'Run a SQL query against PostgreSQL and its translation against MongoDB in parallel. Reports row counts and timings per backend plus the total wall time.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'SQL SELECT statement.' },
      },
      required: ['query'],
    },
  },
  {
    name: 'health',
    description: 'Check connection settings and ping both MongoDB and PostgreSQL.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'inspect',
    description:
      'List every MongoDB collection with a sample of its documents (_id hidden). Development aid.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: {
          type: 'number',
          description: 'Documents per collection (default configured via env).',
        },
      },
    },
  },
];

/**
 * Route a tool call to its controller handler.
 *
 * @throws Error for an unknown tool name
 */
export async function dispatchTool(
  controller: SqlBridgeController,
  name: string,
  args: ToolArgs
): Promise<McpContent> {
  switch (name) {
    case 'translate_sql':
      return controller.handleTranslateTool(args);
    case 'speedtest':
      return controller.handleSpeedTestTool(args);
    case 'health':
      return controller.handleHealthTool();
    case 'inspect':
      return controller.handleInspectTool(args);
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

export function createSqlBridgeController(
  documentStore: IDocumentStore,
  relationalStore: IRelationalStore,
  backend: BackendConfig
): SqlBridgeController {
  const runner = new SpeedTestRunner(documentStore, relationalStore, {
    timeoutMs: backend.backendTimeoutMs,
  });

  return new SqlBridgeController(documentStore, relationalStore, runner, {
    inspectLimit: backend.inspectLimit,
  });
}

export function createSqlBridgeServer(deps: {
  documentStore: IDocumentStore;
  relationalStore: IRelationalStore;
  backend?: BackendConfig;
}): Server {
  const backend = deps.backend ?? loadBackendConfig();
  const controller = createSqlBridgeController(deps.documentStore, deps.relationalStore, backend);

  logger.info('configuration loaded', {
    databaseName: backend.databaseName,
    backendTimeoutMs: backend.backendTimeoutMs,
    inspectLimit: backend.inspectLimit,
  });

  const server = new Server(
    {
      name: 'sqlbridge-server',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const timer = logger.startTimer(`tool:${name}`, {
      argumentsSize: args ? JSON.stringify(args).length : 0,
    });

    try {
      const result = await dispatchTool(controller, name, args);
      timer.end({ status: result.isError ? 'failed' : 'success' });
      return result;
    } catch (error) {
      timer.end({ status: 'error' });
      logger.error(`Error handling tool "${name}"`, { error });

      return {
        content: [
          {
            type: 'text' as const,
            text: `Error: ${error instanceof Error ? error.message : String(error)}`,
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

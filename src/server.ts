/**
 * Builds the MCP server that exposes the resource tools.
 *
 * Every tool call runs through the middleware pipeline:
 *
 *   toolMiddleware: [auditMW]
 *
 * The audit middleware is outermost, so its timing covers the whole call and
 * it sees the resource annotation the tool left on the request.
 *
 * @module
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { AuditLogger } from './lib/auditLogger.js';
import type { SecureTool } from './lib/toolWrapper.js';
import { createAuditMiddleware } from './middlewares/audit.js';
import { pipe } from './middlewares/pipeline.js';
import type { AnnotatedCallToolRequest, ToolHandler, ToolMiddleware } from './middlewares/types.js';
import type { ContextProvider } from './resources/types.js';
import { allTools } from './tools/index.js';

export const SERVER_NAME = 'elasticsearch-resources';
export const SERVER_VERSION = '0.1.0';

export interface ServerDeps {
  runtime: ContextProvider;
  auditLogger: AuditLogger;
}

/** Handler of one tool with the middleware pipeline applied. */
export function createToolHandler(
  tool: SecureTool,
  runtime: ContextProvider,
  middlewares: readonly ToolMiddleware[],
): ToolHandler {
  return pipe(middlewares, (req) => {
    const request: AnnotatedCallToolRequest = req;
    return tool.run(request.params.arguments ?? {}, { runtime, request });
  });
}

export function createServer({ runtime, auditLogger }: ServerDeps, tools: readonly SecureTool[] = allTools): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const middlewares = [createAuditMiddleware(auditLogger)];

  for (const tool of tools) {
    const handler = createToolHandler(tool, runtime, middlewares);
    server.tool(tool.id, tool.description, tool.shape, async (args) =>
      CallToolResultSchema.parse(await handler({ method: 'tools/call', params: { name: tool.id, arguments: args } })),
    );
  }
  return server;
}

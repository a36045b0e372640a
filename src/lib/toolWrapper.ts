/**
 * Shared shape of every MCP tool the server exposes.
 *
 * {@link createSecureTool} validates the raw arguments with the tool's zod
 * schema, runs the tool and turns the outcome into a JSON text result.
 * {@link ProviderError}s become `isError` results carrying their summary and
 * detail; anything else propagates to the MCP server.
 *
 * @module
 */
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { AnnotatedCallToolRequest } from '../middlewares/types.js';
import type { ContextProvider } from '../resources/types.js';
import { ProviderError, fromZodError } from './errors.js';

export interface ToolDeps {
  runtime: ContextProvider;
  /** The request being served; tools annotate it for the audit middleware. */
  request: AnnotatedCallToolRequest;
}

export interface ToolSuccess<T> {
  status: 'success';
  data: T;
}

export interface SecureToolOptions<S extends z.ZodRawShape, T> {
  id: string;
  description: string;
  inputSchema: z.ZodObject<S>;
  execute: (input: z.infer<z.ZodObject<S>>, deps: ToolDeps) => Promise<ToolSuccess<T>>;
}

export interface SecureTool {
  id: string;
  description: string;
  /** Raw zod shape, as `McpServer.tool` takes it. */
  shape: z.ZodRawShape;
  run(args: unknown, deps: ToolDeps): Promise<CallToolResult>;
}

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function errorResult(err: ProviderError): CallToolResult {
  return textResult({ status: 'error', error: err.name, summary: err.summary, detail: err.detail }, true);
}

export function createSecureTool<S extends z.ZodRawShape, T>(options: SecureToolOptions<S, T>): SecureTool {
  return {
    id: options.id,
    description: options.description,
    shape: options.inputSchema.shape,
    async run(args, deps) {
      const input = options.inputSchema.safeParse(args);
      if (!input.success) {
        return errorResult(fromZodError(input.error, 'Invalid tool input.'));
      }
      try {
        return textResult(await options.execute(input.data, deps));
      } catch (err) {
        if (err instanceof ProviderError) return errorResult(err);
        throw err;
      }
    },
  };
}

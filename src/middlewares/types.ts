import type { CallToolRequest } from '@modelcontextprotocol/sdk/types.js';
import type { ToolMiddleware } from 'mcpose';

export type { ToolMiddleware };

/**
 * Resource a tool call acted on, attached by the tool so that the audit
 * middleware can log it without parsing the response.
 */
export interface ResourceAnnotation {
  type: string;
  id?: string;
}

/**
 * A {@link CallToolRequest} augmented with optional resource metadata.
 *
 * Filled in by the resource tools and consumed by `createAuditMiddleware`.
 */
export type AnnotatedCallToolRequest = CallToolRequest & {
  _resource?: ResourceAnnotation;
};

/** The `next` continuation a {@link ToolMiddleware} wraps. */
export type ToolHandler = Parameters<ToolMiddleware>[1];

/**
 * Audit middleware brick.
 *
 * Wraps tool calls and emits a structured {@link AuditEntry} after the inner
 * pipeline has completed. Input parameters are logged with every secret
 * masked; the response is only measured, never logged, since resource state
 * carries API key secrets.
 *
 * @module
 */
import {
  CallToolResultSchema,
  type CompatibilityCallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolMiddleware } from 'mcpose';
import type { AuditLogger } from '../lib/auditLogger.js';
import { redactSecrets } from '../lib/redaction.js';
import type { AnnotatedCallToolRequest } from './types.js';

function baseEntry(req: AnnotatedCallToolRequest, start: number) {
  return {
    timestamp: new Date().toISOString(),
    tool: req.params.name,
    resource_type: req._resource?.type,
    resource_id: req._resource?.id,
    input_parameters: JSON.stringify(redactSecrets(req.params.arguments ?? {}).redactedData),
    execution_time_ms: Date.now() - start,
  };
}

function errorText(result: CompatibilityCallToolResult): string | undefined {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) return undefined;
  const first = parsed.data.content[0];
  return first?.type === 'text' ? first.text : undefined;
}

/**
 * Creates an audit middleware that logs each tool invocation.
 *
 * Should be the **outermost** layer so that timing covers the whole call.
 */
export function createAuditMiddleware(logger: AuditLogger): ToolMiddleware {
  return async (req: AnnotatedCallToolRequest, next) => {
    const start = Date.now();
    let result: CompatibilityCallToolResult;

    try {
      result = await next(req);
    } catch (err) {
      logger.log({
        ...baseEntry(req, start),
        output_size_bytes: 0,
        status: 'error',
        error_message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    const outputStr = JSON.stringify(result);
    const failed = 'isError' in result && result.isError === true;
    logger.log({
      ...baseEntry(req, start),
      output_size_bytes: Buffer.byteLength(outputStr, 'utf8'),
      status: failed ? 'error' : 'success',
      ...(failed ? { error_message: errorText(result) } : {}),
    });

    return result;
  };
}

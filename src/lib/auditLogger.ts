/**
 * Structured audit logging for resource operations.
 *
 * Every tool call produces an {@link AuditEntry} written as JSON to stderr.
 * Input parameters pass through {@link redactSecrets} before they are logged
 * and are truncated to keep single entries small.
 *
 * @module
 */
import type { ProviderConfig } from './config.js';

/**
 * A single audit log record capturing one tool invocation.
 *
 * Written as a JSON line to stderr by {@link AuditLogger.log}.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp of the invocation. */
  timestamp: string;
  /** Name of the MCP tool that was called (e.g., `apply_resource`). */
  tool: string;
  /** Resource type the call targeted, when the tool takes one. */
  resource_type?: string;
  /** Composite identifier of the resource after the call, if any. */
  resource_id?: string;
  /** Serialized, secret-free input parameters (truncated to 500 chars). */
  input_parameters: string;
  /** Byte size of the serialized response. */
  output_size_bytes: number;
  /** Wall-clock execution time in milliseconds. */
  execution_time_ms: number;
  status: 'success' | 'error';
  /** Error message (only present when `status` is `'error'`). */
  error_message?: string;
}

const MAX_INPUT_LOG_LENGTH = 500;

/**
 * Writes structured audit records to stderr as JSON lines.
 *
 * Audit logging can be disabled via the `AUDIT_ENABLED` environment variable.
 * When disabled, {@link AuditLogger.log} is a no-op.
 */
export class AuditLogger {
  private enabled: boolean;
  private writer: (s: string) => void;

  constructor(
    config: Pick<ProviderConfig, 'auditEnabled'>,
    writer: (s: string) => void = (s) => process.stderr.write(s),
  ) {
    this.enabled = config.auditEnabled;
    this.writer = writer;
  }

  log(entry: AuditEntry): void {
    if (!this.enabled) return;

    const sanitized = {
      ...entry,
      input_parameters:
        entry.input_parameters.length > MAX_INPUT_LOG_LENGTH
          ? entry.input_parameters.slice(0, MAX_INPUT_LOG_LENGTH) + '...[truncated]'
          : entry.input_parameters,
    };

    this.writer(JSON.stringify(sanitized) + '\n');
  }
}

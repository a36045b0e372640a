/**
 * Shared test fixture factories.
 *
 * Import from here instead of re-defining in each test file so that a single
 * change propagates to all tests when the underlying types change.
 */
import type { CallToolRequest, CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ConnectionConfig, ProviderConfig } from '../lib/config.js';
import { Logger } from '../lib/logger.js';
import { ProviderRuntime } from '../lib/providerRuntime.js';
import { FakeCluster } from './fakeCluster.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export function makeConnection(overrides: Partial<ConnectionConfig> = {}): ConnectionConfig {
  return {
    endpoints: ['http://localhost:9200'],
    insecure: false,
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    connection: makeConnection(),
    auditEnabled: true,
    logLevel: 'info',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/** A logger whose JSON lines are collected instead of written to stderr. */
export function makeLogger(config: Pick<ProviderConfig, 'logLevel'> = makeConfig()) {
  const written: string[] = [];
  const logger = new Logger(config, (s) => written.push(s));
  const lines = (): Record<string, unknown>[] => written.map((s) => JSON.parse(s));
  return { logger, written, lines };
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

/**
 * A runtime whose every connection talks to one {@link FakeCluster}. The
 * connections clients were created for are recorded in `connections`.
 */
export function makeRuntime(cluster = new FakeCluster()) {
  const { logger, lines } = makeLogger();
  const connections: ConnectionConfig[] = [];
  const runtime = new ProviderRuntime(makeConfig(), logger, (connection) => {
    connections.push(connection);
    return cluster.send;
  });
  return { runtime, cluster, logger, lines, connections };
}

// ---------------------------------------------------------------------------
// Tool call fixtures
// ---------------------------------------------------------------------------

export function makeToolReq(name = 'test_tool', args: Record<string, unknown> = {}): CallToolRequest {
  return {
    method: 'tools/call',
    params: { name, arguments: args },
  };
}

export function makeToolResult(text = 'mock response'): CallToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

export function makeErrorToolResult(text = 'something went wrong'): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: true,
  };
}

/** Decodes the JSON text payload of a tool result. */
export function resultPayload(result: CallToolResult): unknown {
  const first = result.content[0];
  if (first?.type !== 'text') throw new Error('expected a text result');
  return JSON.parse(first.text);
}

#!/usr/bin/env node
/**
 * Entry point of the elasticsearch-resources MCP server.
 *
 * Loads the provider configuration from the environment and serves the
 * resource tools over stdio. Logs and audit records go to stderr.
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AuditLogger } from './lib/auditLogger.js';
import { loadConfig } from './lib/config.js';
import { Logger } from './lib/logger.js';
import { ProviderRuntime } from './lib/providerRuntime.js';
import { SERVER_NAME, createServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config);
  const runtime = new ProviderRuntime(config, logger);

  const server = createServer({ runtime, auditLogger: new AuditLogger(config) });
  await server.connect(new StdioServerTransport());
  logger.info('server started', { endpoints: config.connection.endpoints });
}

main().catch((error) => {
  process.stderr.write(`[${SERVER_NAME}] Fatal error: ${error}\n`);
  process.exit(1);
});

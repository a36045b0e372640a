/**
 * Hands out API clients per connection.
 *
 * Resources without an `elasticsearch_connection` block share the client of
 * the provider-level connection; every distinct override gets its own
 * client, created on first use and kept for the life of the process.
 *
 * @module
 */
import type { ContextProvider, ResourceContext } from '../resources/types.js';
import { assertValidConnection, type ConnectionConfig, type ProviderConfig } from './config.js';
import { ElasticsearchApiClient, createRequestSender, type RequestSender } from './esClient.js';
import type { Logger } from './logger.js';

export type SenderFactory = (connection: ConnectionConfig) => RequestSender;

export class ProviderRuntime implements ContextProvider {
  private clients = new Map<string, ElasticsearchApiClient>();

  constructor(
    private readonly config: Pick<ProviderConfig, 'connection'>,
    private readonly logger: Logger,
    private readonly senderFactory: SenderFactory = createRequestSender,
  ) {}

  context(connection?: ConnectionConfig): ResourceContext {
    return { client: this.client(connection ?? this.config.connection), logger: this.logger };
  }

  private client(connection: ConnectionConfig): ElasticsearchApiClient {
    const key = JSON.stringify(connection);
    let client = this.clients.get(key);
    if (!client) {
      assertValidConnection(connection);
      client = new ElasticsearchApiClient(this.senderFactory(connection), this.logger);
      this.clients.set(key, client);
    }
    return client;
  }
}

/**
 * Provider configuration loaded from environment variables.
 *
 * The provider applies declarative resource definitions (ILM policies, API
 * keys, cluster settings) against one Elasticsearch cluster. Individual
 * resources may override the connection through their
 * `elasticsearch_connection` block.
 *
 * @see {@link loadConfig} for the loader that populates this interface.
 */
export interface ProviderConfig {
  /** Default connection used by every resource without its own override. */
  connection: ConnectionConfig;
  /** Whether to emit structured audit log entries to stderr. */
  auditEnabled: boolean;
  /** Minimum level written by the diagnostic {@link Logger}. */
  logLevel: LogLevel;
}

/** How to reach and authenticate against one cluster. */
export interface ConnectionConfig {
  /** Node URLs (e.g. `["https://localhost:9200"]`). */
  endpoints: string[];
  username?: string;
  password?: string;
  /** Base64 encoded `id:api_key` pair. Conflicts with `username`. */
  apiKey?: string;
  /** Skip TLS certificate verification. */
  insecure: boolean;
  /** Path to a PEM encoded CA certificate. */
  caFile?: string;
}

export const LOG_LEVELS = ['trace', 'info', 'warn'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** @throws {Error} If the environment variable is not set. */
function requiredEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing required environment variable: ${name}`);
  return value;
}

function parseEndpoints(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Checks the credential combination of a connection.
 *
 * @throws {Error} If only one half of basic auth is set, or basic auth is
 *   combined with an API key.
 */
export function assertValidConnection(connection: ConnectionConfig): void {
  if (connection.endpoints.length === 0) {
    throw new Error('At least one Elasticsearch endpoint must be configured');
  }
  if (connection.username && !connection.password) {
    throw new Error('A password is required when a username is set');
  }
  if (connection.apiKey && connection.username) {
    throw new Error('Username/password and API key authentication are mutually exclusive');
  }
}

/**
 * Loads provider configuration from environment variables.
 *
 * `ELASTICSEARCH_ENDPOINTS` is a comma-separated list of node URLs.
 *
 * @throws {Error} If no endpoint is configured or credentials conflict.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const connection: ConnectionConfig = {
    endpoints: parseEndpoints(requiredEnv(env, 'ELASTICSEARCH_ENDPOINTS')),
    username: env.ELASTICSEARCH_USERNAME || undefined,
    password: env.ELASTICSEARCH_PASSWORD || undefined,
    apiKey: env.ELASTICSEARCH_API_KEY || undefined,
    insecure: env.ELASTICSEARCH_INSECURE === 'true',
    caFile: env.ELASTICSEARCH_CA_FILE || undefined,
  };
  assertValidConnection(connection);

  const level = (env.LOG_LEVEL ?? 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported LOG_LEVEL "${env.LOG_LEVEL}", expected one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    connection,
    auditEnabled: env.AUDIT_ENABLED !== 'false',
    logLevel: level,
  };
}

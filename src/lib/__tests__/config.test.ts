import { describe, it, expect } from 'vitest';
import { assertValidConnection, loadConfig } from '../config.js';
import { makeConnection } from '../../__tests__/fixtures.js';

describe('loadConfig', () => {
  it('reads the connection and defaults', () => {
    const config = loadConfig({ ELASTICSEARCH_ENDPOINTS: 'https://es-1:9200, https://es-2:9200' });
    expect(config).toEqual({
      connection: {
        endpoints: ['https://es-1:9200', 'https://es-2:9200'],
        username: undefined,
        password: undefined,
        apiKey: undefined,
        insecure: false,
        caFile: undefined,
      },
      auditEnabled: true,
      logLevel: 'info',
    });
  });

  it('reads credentials, TLS options, audit and log level', () => {
    const config = loadConfig({
      ELASTICSEARCH_ENDPOINTS: 'https://es:9200',
      ELASTICSEARCH_USERNAME: 'elastic',
      ELASTICSEARCH_PASSWORD: 'test-secret',
      ELASTICSEARCH_INSECURE: 'true',
      ELASTICSEARCH_CA_FILE: '/etc/ca.pem',
      AUDIT_ENABLED: 'false',
      LOG_LEVEL: 'TRACE',
    });
    expect(config.connection.username).toBe('elastic');
    expect(config.connection.password).toBe('test-secret');
    expect(config.connection.insecure).toBe(true);
    expect(config.connection.caFile).toBe('/etc/ca.pem');
    expect(config.auditEnabled).toBe(false);
    expect(config.logLevel).toBe('trace');
  });

  it('requires ELASTICSEARCH_ENDPOINTS', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: ELASTICSEARCH_ENDPOINTS');
  });

  it('rejects an endpoint list with no entries', () => {
    expect(() => loadConfig({ ELASTICSEARCH_ENDPOINTS: ' , ' })).toThrow(
      'At least one Elasticsearch endpoint must be configured',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ ELASTICSEARCH_ENDPOINTS: 'http://es:9200', LOG_LEVEL: 'debug' })).toThrow(
      'Unsupported LOG_LEVEL "debug", expected one of trace, info, warn',
    );
  });
});

describe('assertValidConnection', () => {
  it('requires a password with a username', () => {
    expect(() => assertValidConnection(makeConnection({ username: 'elastic' }))).toThrow(
      'A password is required when a username is set',
    );
  });

  it('rejects basic auth combined with an API key', () => {
    expect(() =>
      assertValidConnection(makeConnection({ username: 'elastic', password: 'test-secret', apiKey: 'test-key' })),
    ).toThrow('Username/password and API key authentication are mutually exclusive');
  });

  it('accepts an API key on its own', () => {
    expect(() => assertValidConnection(makeConnection({ apiKey: 'test-key' }))).not.toThrow();
  });
});

import { describe, it, expect } from 'vitest';
import { ElasticsearchApiClient } from '../esClient.js';
import { ApiError, ProviderError } from '../errors.js';
import { CLUSTER_UUID, FakeCluster } from '../../__tests__/fakeCluster.js';
import { makeLogger } from '../../__tests__/fixtures.js';

function makeClient(cluster = new FakeCluster(), logLevel: 'trace' | 'info' = 'info') {
  const { logger, lines } = makeLogger({ logLevel });
  return { client: new ElasticsearchApiClient(cluster.send, logger), cluster, lines };
}

describe('ElasticsearchApiClient', () => {
  describe('cluster identity', () => {
    it('builds composite ids from the cluster uuid, fetched once', async () => {
      const { client, cluster } = makeClient();
      expect(await client.id('logs')).toBe(`${CLUSTER_UUID}/logs`);
      expect(await client.id('metrics')).toBe(`${CLUSTER_UUID}/metrics`);
      expect(cluster.requests.filter((req) => req.path === '/')).toHaveLength(1);
    });

    it('retries the lookup after a failure', async () => {
      const { client, cluster } = makeClient();
      cluster.respondOnce('GET', '/', { statusCode: 503, body: { error: 'unavailable' } });

      await expect(client.clusterUuid()).rejects.toThrow('Unable to get cluster info. Failed with: {"error":"unavailable"}');
      expect(await client.clusterUuid()).toBe(CLUSTER_UUID);
    });

    it('rejects an unexpected cluster info body', async () => {
      const { client, cluster } = makeClient();
      cluster.respondOnce('GET', '/', { statusCode: 200, body: {} });

      await expect(client.clusterUuid()).rejects.toThrow(
        'Unable to get cluster info. Unexpected response body: cluster_uuid Required',
      );
    });
  });

  describe('lifecycle policies', () => {
    it('wraps the policy document and encodes the name', async () => {
      const { client, cluster } = makeClient();
      await client.putLifecycle('hot warm', { phases: { hot: { actions: {} } } });

      expect(cluster.requests[0]).toEqual({
        method: 'PUT',
        path: '/_ilm/policy/hot%20warm',
        body: { policy: { phases: { hot: { actions: {} } } } },
      });
      expect(cluster.policies.get('hot warm')?.version).toBe(1);
    });

    it('returns undefined for a missing policy', async () => {
      const { client } = makeClient();
      expect(await client.getLifecycle('missing')).toBeUndefined();
    });

    it('reads a stored policy', async () => {
      const { client } = makeClient();
      await client.putLifecycle('logs', { phases: { delete: { min_age: '30d', actions: { delete: {} } } } });

      expect(await client.getLifecycle('logs')).toEqual({
        version: 1,
        modified_date: '2024-01-01T00:00:00.000Z',
        policy: { phases: { delete: { min_age: '30d', actions: { delete: {} } } } },
      });
    });

    it('reports a failed delete as an ApiError', async () => {
      const { client } = makeClient();
      const attempt = client.deleteLifecycle('missing');

      await expect(attempt).rejects.toBeInstanceOf(ApiError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 404, summary: 'Unable to delete ILM policy.' });
    });
  });

  describe('API keys', () => {
    it('creates, reads and invalidates a key', async () => {
      const { client } = makeClient();
      const created = await client.createApiKey({ name: 'ingest' });
      expect(created).toMatchObject({ id: 'key-1', name: 'ingest', api_key: 'secret-1' });

      expect(await client.getApiKey('key-1')).toMatchObject({ id: 'key-1', name: 'ingest', invalidated: false });
      await client.invalidateApiKey('key-1');
      expect(await client.getApiKey('key-1')).toMatchObject({ invalidated: true });
    });

    it('returns undefined for an unknown key', async () => {
      const { client } = makeClient();
      expect(await client.getApiKey('nope')).toBeUndefined();
    });

    it('fails when the cluster reports invalidation errors', async () => {
      const { client, cluster } = makeClient();
      cluster.respondOnce('DELETE', '/_security/api_key', {
        statusCode: 200,
        body: { invalidated_api_keys: [], error_count: 1, error_details: [{ type: 'exception' }] },
      });

      const attempt = client.invalidateApiKey('key-1');
      await expect(attempt).rejects.toBeInstanceOf(ProviderError);
      await expect(attempt).rejects.toThrow('Unable to invalidate API key. Failed with: [{"type":"exception"}]');
    });
  });

  describe('cluster settings', () => {
    it('reads flat settings', async () => {
      const { client, cluster } = makeClient();
      await client.putClusterSettings({ persistent: { 'indices.lifecycle.poll_interval': '10m' } });

      expect(await client.getClusterSettings()).toEqual({
        persistent: { 'indices.lifecycle.poll_interval': '10m' },
        transient: {},
      });
      expect(cluster.requests[1]).toEqual({
        method: 'GET',
        path: '/_cluster/settings',
        query: { flat_settings: 'true' },
      });
    });
  });

  describe('logging', () => {
    it('traces each request and its status', async () => {
      const { client, lines } = makeClient(new FakeCluster(), 'trace');
      await client.getLifecycle('missing');

      expect(lines()).toEqual([
        expect.objectContaining({
          level: 'trace',
          message: 'sending request to Elasticsearch',
          method: 'GET',
          path: '/_ilm/policy/missing',
        }),
        expect.objectContaining({
          level: 'trace',
          message: 'received response from Elasticsearch',
          status_code: 404,
        }),
      ]);
    });

    it('masks secrets in traced request bodies', async () => {
      const { client, lines } = makeClient(new FakeCluster(), 'trace');
      await client.createApiKey({ name: 'ingest', metadata: { password: 'test-secret', team: 'ops' } });

      expect(lines()[0]).toEqual(
        expect.objectContaining({
          message: 'sending request to Elasticsearch',
          method: 'POST',
          body: { name: 'ingest', metadata: { password: '[REDACTED]', team: 'ops' } },
        }),
      );
    });

    it('stays quiet above trace level', async () => {
      const { client, lines } = makeClient();
      await client.getLifecycle('missing');
      expect(lines()).toEqual([]);
    });
  });
});

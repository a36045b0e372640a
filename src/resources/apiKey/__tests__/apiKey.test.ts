import { describe, it, expect } from 'vitest';
import { apiKeyResource } from '../index.js';
import { CLUSTER_UUID, KEY_CREATION, ONE_DAY_MS } from '../../../__tests__/fakeCluster.js';
import { makeRuntime } from '../../../__tests__/fixtures.js';

const writerRoles = '{"writer":{"indices":[{"names":["logs-*"],"privileges":["create_doc"]}]}}';

describe('elasticsearch_security_api_key', () => {
  it('creates a key and keeps its secret in state', async () => {
    const { runtime, cluster } = makeRuntime();
    const state = await apiKeyResource.apply(runtime, {
      name: 'ingest',
      role_descriptors: writerRoles,
      metadata: '{"env":"test"}',
    });

    expect(state.id).toBe(`${CLUSTER_UUID}/key-1`);
    expect(state.attributes).toMatchObject({
      name: 'ingest',
      role_descriptors: writerRoles,
      metadata: '{"env":"test"}',
      key_id: 'key-1',
      api_key: 'secret-1',
      encoded: Buffer.from('key-1:secret-1').toString('base64'),
    });
    expect(cluster.apiRequests()[0]).toEqual({
      method: 'POST',
      path: '/_security/api_key',
      body: {
        name: 'ingest',
        role_descriptors: { writer: { indices: [{ names: ['logs-*'], privileges: ['create_doc'] }] } },
        metadata: { env: 'test' },
      },
    });
  });

  it('derives the encoded credential when the cluster does not return it', async () => {
    const { runtime, cluster } = makeRuntime();
    cluster.respondOnce('POST', '/_security/api_key', {
      statusCode: 200,
      body: { id: 'key-9', name: 'ingest', api_key: 'secret-9' },
    });
    cluster.apiKeys.set('key-9', {
      id: 'key-9',
      name: 'ingest',
      api_key: 'secret-9',
      creation: KEY_CREATION,
      invalidated: false,
      metadata: {},
      role_descriptors: {},
    });

    const state = await apiKeyResource.apply(runtime, { name: 'ingest' });
    expect(state.attributes.encoded).toBe(Buffer.from('key-9:secret-9').toString('base64'));
    expect(state.attributes.role_descriptors).toBeUndefined();
  });

  it('reports the expiry timestamp and keeps the declared duration', async () => {
    const { runtime } = makeRuntime();
    const state = await apiKeyResource.apply(runtime, { name: 'short-lived', expiration: '1d' });

    expect(state.attributes.expiration).toBe('1d');
    expect(state.attributes.expiration_timestamp).toBe(KEY_CREATION + ONE_DAY_MS);
  });

  it('updates role descriptors in place and carries the secret forward', async () => {
    const { runtime, cluster } = makeRuntime();
    const created = await apiKeyResource.apply(runtime, { name: 'ingest', role_descriptors: writerRoles });
    cluster.requests.length = 0;

    const reader = { reader: { cluster: ['monitor'] } };
    const updated = await apiKeyResource.apply(runtime, { name: 'ingest', role_descriptors: reader }, created);

    expect(updated.id).toBe(created.id);
    expect(updated.attributes).toMatchObject({ role_descriptors: reader, api_key: 'secret-1' });
    expect(cluster.apiRequests()[0]).toMatchObject({
      method: 'PUT',
      path: '/_security/api_key/key-1',
      body: { role_descriptors: reader },
    });
  });

  it('drops restrictions that are no longer declared', async () => {
    const { runtime, cluster } = makeRuntime();
    const created = await apiKeyResource.apply(runtime, { name: 'ingest', role_descriptors: writerRoles });
    const updated = await apiKeyResource.apply(runtime, { name: 'ingest' }, created);

    expect(cluster.apiKeys.get('key-1')?.role_descriptors).toEqual({});
    expect(updated.attributes.role_descriptors).toBeUndefined();
  });

  it('replaces the key when the name changes', async () => {
    const { runtime, cluster } = makeRuntime();
    const created = await apiKeyResource.apply(runtime, { name: 'ingest' });
    const replaced = await apiKeyResource.apply(runtime, { name: 'ingest-v2' }, created);

    expect(replaced.id).toBe(`${CLUSTER_UUID}/key-2`);
    expect(replaced.attributes.api_key).toBe('secret-2');
    expect(cluster.apiKeys.get('key-1')?.invalidated).toBe(true);
  });

  it('reads an invalidated key as gone', async () => {
    const { runtime } = makeRuntime();
    const state = await apiKeyResource.apply(runtime, { name: 'ingest' });
    await apiKeyResource.delete(runtime, state);

    expect(await apiKeyResource.read(runtime, state)).toBeUndefined();
  });

  it('keeps declared role descriptors when the cluster does not report them', async () => {
    const { runtime, cluster } = makeRuntime();
    const state = await apiKeyResource.apply(runtime, { name: 'ingest', role_descriptors: writerRoles });
    cluster.reportRoleDescriptors = false;

    const refreshed = await apiKeyResource.read(runtime, state);
    expect(refreshed?.attributes.role_descriptors).toBe(writerRoles);
  });

  it('imports a key without its secret', async () => {
    const { runtime, cluster } = makeRuntime();
    await apiKeyResource.apply(runtime, { name: 'ingest', role_descriptors: writerRoles });

    const imported = await apiKeyResource.import(runtime, `${CLUSTER_UUID}/key-1`);
    expect(imported?.attributes).toMatchObject({ name: 'ingest', key_id: 'key-1', role_descriptors: writerRoles });
    expect(imported?.attributes.api_key).toBeUndefined();
    expect(cluster.apiKeys.size).toBe(1);
  });

  it('adopts an imported expiring key when the same config is applied', async () => {
    const { runtime, cluster } = makeRuntime();
    await apiKeyResource.apply(runtime, { name: 'ingest', expiration: '1d' });
    const imported = await apiKeyResource.import(runtime, `${CLUSTER_UUID}/key-1`);
    expect(imported?.attributes.expiration).toBeUndefined();

    const applied = await apiKeyResource.apply(runtime, { name: 'ingest', expiration: '1d' }, imported);

    expect(applied.id).toBe(`${CLUSTER_UUID}/key-1`);
    expect(applied.attributes.expiration).toBe('1d');
    expect(cluster.apiKeys.get('key-1')?.invalidated).toBe(false);
    expect(cluster.apiKeys.size).toBe(1);
  });

  it('replaces an imported key that never expires when an expiration is declared', async () => {
    const { runtime, cluster } = makeRuntime();
    await apiKeyResource.apply(runtime, { name: 'ingest' });
    const imported = await apiKeyResource.import(runtime, `${CLUSTER_UUID}/key-1`);

    const applied = await apiKeyResource.apply(runtime, { name: 'ingest', expiration: '1d' }, imported);

    expect(applied.id).toBe(`${CLUSTER_UUID}/key-2`);
    expect(cluster.apiKeys.get('key-1')?.invalidated).toBe(true);
  });

  it('rejects names with whitespace', async () => {
    const { runtime } = makeRuntime();
    await expect(apiKeyResource.apply(runtime, { name: 'my key' })).rejects.toThrow(
      /^Invalid resource configuration\. name: must contain alphanumeric characters/,
    );
  });
});

import { describe, it, expect } from 'vitest';
import { makeConnection, makeRuntime } from '../../__tests__/fixtures.js';

describe('ProviderRuntime', () => {
  it('uses the provider connection by default and reuses its client', () => {
    const { runtime, connections } = makeRuntime();
    const first = runtime.context();
    const second = runtime.context();

    expect(first.client).toBe(second.client);
    expect(connections).toEqual([makeConnection()]);
  });

  it('creates one client per distinct override', () => {
    const { runtime, connections } = makeRuntime();
    const other = makeConnection({ endpoints: ['https://other:9200'] });

    const a = runtime.context(other);
    const b = runtime.context(makeConnection({ endpoints: ['https://other:9200'] }));
    const c = runtime.context();

    expect(a.client).toBe(b.client);
    expect(a.client).not.toBe(c.client);
    expect(connections).toEqual([other, makeConnection()]);
  });

  it('rejects an override with conflicting credentials', () => {
    const { runtime } = makeRuntime();
    expect(() => runtime.context(makeConnection({ username: 'elastic', password: 'test-secret', apiKey: 'test-key' }))).toThrow(
      'Username/password and API key authentication are mutually exclusive',
    );
  });
});

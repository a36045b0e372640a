import { describe, it, expect } from 'vitest';
import { formatCompositeId, parseCompositeId } from '../compositeId.js';
import { ValidationError } from '../errors.js';

describe('composite id', () => {
  it('formats cluster and resource id', () => {
    expect(formatCompositeId({ clusterId: 'uuid-1', resourceId: 'logs' })).toBe('uuid-1/logs');
  });

  it('parses what it formats', () => {
    const id = { clusterId: 'uuid-1', resourceId: 'my-policy' };
    expect(parseCompositeId(formatCompositeId(id))).toEqual(id);
  });

  it.each(['no-separator', '/logs', 'uuid-1/', 'a/b/c', ''])('rejects %j', (raw) => {
    expect(() => parseCompositeId(raw)).toThrow(ValidationError);
  });

  it('reports the expected format', () => {
    expect(() => parseCompositeId('logs')).toThrow(
      'Wrong resource ID. Resource ID "logs" must have following format: <cluster_uuid>/<resource identifier>',
    );
  });
});

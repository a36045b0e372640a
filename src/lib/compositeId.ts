import { ValidationError } from './errors.js';

const SEPARATOR = '/';

/**
 * Stored identity of a managed object: the UUID of the cluster it lives in and
 * the object's own identifier on that cluster.
 */
export interface CompositeId {
  clusterId: string;
  resourceId: string;
}

export function formatCompositeId(id: CompositeId): string {
  return `${id.clusterId}${SEPARATOR}${id.resourceId}`;
}

/**
 * Parses `<cluster_uuid>/<resource identifier>`.
 *
 * Import hands us arbitrary user input, so anything else is reported as a
 * {@link ValidationError} instead of being guessed at.
 */
export function parseCompositeId(raw: string): CompositeId {
  const parts = raw.split(SEPARATOR);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(
      'Wrong resource ID.',
      `Resource ID "${raw}" must have following format: <cluster_uuid>/<resource identifier>`,
    );
  }
  return { clusterId: parts[0], resourceId: parts[1] };
}

import type { z } from 'zod';
import type { ConnectionConfig } from '../lib/config.js';
import type { ElasticsearchApiClient } from '../lib/esClient.js';
import { ProviderError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ConnectionBlock } from './connection.js';

/** Attributes every resource carries. */
export type BaseAttributes = Record<string, unknown> & {
  elasticsearch_connection?: ConnectionBlock;
};

/**
 * What the caller persists between operations. `id` is the composite
 * identifier; `attributes` are the declared attributes plus computed ones as
 * last read from the cluster.
 */
export interface ResourceState<T> {
  id: string;
  attributes: T;
}

export interface ResourceContext {
  client: ElasticsearchApiClient;
  logger: Logger;
}

/** Hands out a {@link ResourceContext} for a connection override, or the provider default. */
export interface ContextProvider {
  context(connection?: ConnectionConfig): ResourceContext;
}

/**
 * Typed CRUD handlers of one resource type.
 *
 * `read` resolves to `undefined` when the object no longer exists on the
 * cluster; the caller then forgets the stored id.
 */
export interface ResourceDefinition<T extends BaseAttributes> {
  type: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Attributes whose change forces delete-then-create instead of update. */
  replaceOnChange: readonly (keyof T & string)[];
  /**
   * Whether a differing replace-on-change attribute still denotes the same
   * object, e.g. a value the cluster cannot report and an import left unset.
   */
  sameForReplacement?(key: keyof T & string, prior: T, planned: T): boolean;
  create(ctx: ResourceContext, planned: T): Promise<ResourceState<T>>;
  update(ctx: ResourceContext, planned: T, prior: ResourceState<T>): Promise<ResourceState<T>>;
  read(ctx: ResourceContext, id: string, declared: T | undefined): Promise<ResourceState<T> | undefined>;
  delete(ctx: ResourceContext, state: ResourceState<T>): Promise<void>;
}

/** State as exchanged with callers, before schema validation. */
export type StoredState = ResourceState<Record<string, unknown>>;

/** A {@link ResourceDefinition} behind an untyped, validating facade. */
export interface ManagedResource {
  type: string;
  description: string;
  replaceOnChange: readonly string[];
  apply(provider: ContextProvider, config: unknown, prior?: StoredState): Promise<StoredState>;
  read(provider: ContextProvider, state: StoredState): Promise<StoredState | undefined>;
  import(provider: ContextProvider, id: string): Promise<StoredState | undefined>;
  delete(provider: ContextProvider, state: StoredState): Promise<void>;
}

/** Fails when an object just written cannot be read back. */
export function requireState<T>(state: ResourceState<T> | undefined, id: string): ResourceState<T> {
  if (!state) {
    throw new ProviderError('Resource not found after write.', `"${id}" could not be read back from the cluster`);
  }
  return state;
}

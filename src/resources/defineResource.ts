import type { z } from 'zod';
import { parseCompositeId } from '../lib/compositeId.js';
import { fromZodError } from '../lib/errors.js';
import { jsonEquivalent } from '../lib/jsonUtils.js';
import { toConnectionConfig } from './connection.js';
import type {
  BaseAttributes,
  ContextProvider,
  ManagedResource,
  ResourceContext,
  ResourceDefinition,
  ResourceState,
  StoredState,
} from './types.js';

function parseAttributes<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, summary: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) throw fromZodError(result.error, summary);
  return result.data;
}

/** Names of the replace-on-change attributes that differ between two configurations. */
export function changedReplaceAttributes<T extends BaseAttributes>(
  keys: readonly (keyof T & string)[],
  prior: T,
  planned: T,
  same?: (key: keyof T & string, prior: T, planned: T) => boolean,
): string[] {
  return keys.filter((key) => !jsonEquivalent(prior[key], planned[key]) && !same?.(key, prior, planned));
}

/**
 * Wraps typed handlers so that callers can hand in raw configuration and
 * stored state. Both are validated against the resource schema before any
 * request is made.
 */
export function defineResource<T extends BaseAttributes>(def: ResourceDefinition<T>): ManagedResource {
  const contextFor = (provider: ContextProvider, attributes: T | undefined): ResourceContext =>
    provider.context(toConnectionConfig(attributes?.elasticsearch_connection));

  const priorState = (state: StoredState): ResourceState<T> => ({
    id: state.id,
    attributes: parseAttributes(def.schema, state.attributes, 'Invalid resource state.'),
  });

  return {
    type: def.type,
    description: def.description,
    replaceOnChange: def.replaceOnChange,

    async apply(provider, config, prior) {
      const planned = parseAttributes(def.schema, config, 'Invalid resource configuration.');
      const ctx = contextFor(provider, planned);
      if (!prior || !prior.id) {
        return def.create(ctx, planned);
      }

      const previous = priorState(prior);
      parseCompositeId(previous.id);
      const changed = changedReplaceAttributes(
        def.replaceOnChange,
        previous.attributes,
        planned,
        (key, before, after) => def.sameForReplacement?.(key, before, after) ?? false,
      );
      if (changed.length > 0) {
        ctx.logger.info('replacing resource', { resource_type: def.type, resource_id: previous.id, changed });
        await def.delete(contextFor(provider, previous.attributes), previous);
        return def.create(ctx, planned);
      }
      return def.update(ctx, planned, previous);
    },

    async read(provider, state) {
      const current = priorState(state);
      parseCompositeId(current.id);
      return def.read(contextFor(provider, current.attributes), current.id, current.attributes);
    },

    async import(provider, id) {
      parseCompositeId(id);
      return def.read(provider.context(), id, undefined);
    },

    async delete(provider, state) {
      const current = priorState(state);
      parseCompositeId(current.id);
      await def.delete(contextFor(provider, current.attributes), current);
    },
  };
}

/**
 * `elasticsearch_index_lifecycle`: creates or updates a lifecycle policy.
 * Every update sends the whole policy again.
 *
 * @see https://www.elastic.co/guide/en/elasticsearch/reference/current/ilm-put-lifecycle.html
 * @module
 */
import { parseCompositeId } from '../../lib/compositeId.js';
import { defineResource } from '../defineResource.js';
import { requireState, type ResourceContext, type ResourceState } from '../types.js';
import { expandPolicy, flattenPolicy, ilmPolicySchema, type IlmPolicyConfig } from './policy.js';

export const ILM_POLICY_TYPE = 'elasticsearch_index_lifecycle';

async function putPolicy(ctx: ResourceContext, planned: IlmPolicyConfig): Promise<ResourceState<IlmPolicyConfig>> {
  // expand first: an invalid policy must fail before any request goes out
  const policy = expandPolicy(planned);
  const id = await ctx.client.id(planned.name);

  await ctx.client.putLifecycle(planned.name, policy);
  return requireState(await readPolicy(ctx, id, planned), id);
}

async function readPolicy(
  ctx: ResourceContext,
  id: string,
  declared: IlmPolicyConfig | undefined,
): Promise<ResourceState<IlmPolicyConfig> | undefined> {
  const { resourceId } = parseCompositeId(id);
  const entry = await ctx.client.getLifecycle(resourceId);
  if (!entry) return undefined;

  const attributes = flattenPolicy(resourceId, entry, declared, (phase, action) =>
    ctx.logger.warn('skipping unsupported ILM action returned by the cluster', {
      policy: resourceId,
      phase,
      action,
    }),
  );
  return { id, attributes };
}

async function deletePolicy(ctx: ResourceContext, state: ResourceState<IlmPolicyConfig>): Promise<void> {
  const { resourceId } = parseCompositeId(state.id);
  await ctx.client.deleteLifecycle(resourceId);
}

export const ilmPolicyResource = defineResource<IlmPolicyConfig>({
  type: ILM_POLICY_TYPE,
  description: 'Creates or updates an index lifecycle policy.',
  schema: ilmPolicySchema,
  replaceOnChange: ['name'],
  create: putPolicy,
  update: (ctx, planned) => putPolicy(ctx, planned),
  read: readPolicy,
  delete: deletePolicy,
});

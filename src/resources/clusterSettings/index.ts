/**
 * `elasticsearch_cluster_settings`: persistent and transient cluster
 * settings. There is one such object per cluster, so the identifier's
 * resource part is fixed.
 *
 * @see https://www.elastic.co/guide/en/elasticsearch/reference/current/cluster-update-settings.html
 * @module
 */
import { parseCompositeId } from '../../lib/compositeId.js';
import { defineResource } from '../defineResource.js';
import { requireState, type ResourceContext, type ResourceState } from '../types.js';
import { clusterSettingsSchema, type ClusterSettingsConfig } from './schema.js';
import { expandRemoval, expandSettings, flattenSettings } from './settings.js';

export const CLUSTER_SETTINGS_TYPE = 'elasticsearch_cluster_settings';
export const CLUSTER_SETTINGS_ID = 'cluster-settings';

async function putSettings(
  ctx: ResourceContext,
  planned: ClusterSettingsConfig,
  prior?: ResourceState<ClusterSettingsConfig>,
): Promise<ResourceState<ClusterSettingsConfig>> {
  const update = expandSettings(planned, prior?.attributes);
  const id = prior?.id ?? (await ctx.client.id(CLUSTER_SETTINGS_ID));

  await ctx.client.putClusterSettings(update);
  return requireState(await readSettings(ctx, id, planned), id);
}

async function readSettings(
  ctx: ResourceContext,
  id: string,
  declared: ClusterSettingsConfig | undefined,
): Promise<ResourceState<ClusterSettingsConfig> | undefined> {
  parseCompositeId(id);
  const attributes = flattenSettings(await ctx.client.getClusterSettings(), declared);
  if (!attributes.persistent && !attributes.transient) return undefined;
  return { id, attributes };
}

async function deleteSettings(ctx: ResourceContext, state: ResourceState<ClusterSettingsConfig>): Promise<void> {
  await ctx.client.putClusterSettings(expandRemoval(state.attributes));
}

export const clusterSettingsResource = defineResource<ClusterSettingsConfig>({
  type: CLUSTER_SETTINGS_TYPE,
  description: 'Updates cluster-wide persistent and transient settings.',
  schema: clusterSettingsSchema,
  replaceOnChange: [],
  create: (ctx, planned) => putSettings(ctx, planned),
  update: putSettings,
  read: readSettings,
  delete: deleteSettings,
});

/**
 * `elasticsearch_security_api_key`: an API key with optional restricting
 * role descriptors. The key secret is only returned by the create call, so it
 * is carried forward in state from then on.
 *
 * @see https://www.elastic.co/guide/en/elasticsearch/reference/current/security-api-create-api-key.html
 * @module
 */
import { parseCompositeId } from '../../lib/compositeId.js';
import type { CreateApiKeyRequest } from '../../lib/esClient.js';
import { encodeJsonAttribute, parseJsonObject } from '../../lib/jsonUtils.js';
import { defineResource } from '../defineResource.js';
import { requireState, type ResourceContext, type ResourceState } from '../types.js';
import { expandRoleDescriptors, flattenRoleDescriptors } from './roles.js';
import { apiKeySchema, type ApiKeyConfig } from './schema.js';

export const API_KEY_TYPE = 'elasticsearch_security_api_key';

function expandRequest(planned: ApiKeyConfig): CreateApiKeyRequest {
  const req: CreateApiKeyRequest = { name: planned.name };
  const roleDescriptors = expandRoleDescriptors(planned.role_descriptors);
  if (roleDescriptors) req.role_descriptors = roleDescriptors;
  if (planned.expiration) req.expiration = planned.expiration;
  if (planned.metadata) req.metadata = parseJsonObject('metadata', planned.metadata);
  return req;
}

async function createKey(ctx: ResourceContext, planned: ApiKeyConfig): Promise<ResourceState<ApiKeyConfig>> {
  const req = expandRequest(planned);
  const created = await ctx.client.createApiKey(req);
  const id = await ctx.client.id(created.id);

  const state = requireState(await readKey(ctx, id, planned), id);
  return {
    id,
    attributes: {
      ...state.attributes,
      api_key: created.api_key,
      encoded: created.encoded ?? Buffer.from(`${created.id}:${created.api_key}`).toString('base64'),
    },
  };
}

async function updateKey(
  ctx: ResourceContext,
  planned: ApiKeyConfig,
  prior: ResourceState<ApiKeyConfig>,
): Promise<ResourceState<ApiKeyConfig>> {
  const { role_descriptors, metadata } = expandRequest(planned);
  const { resourceId } = parseCompositeId(prior.id);
  // an empty map drops the restrictions a previous version declared
  await ctx.client.updateApiKey(resourceId, { role_descriptors: role_descriptors ?? {}, metadata });

  const state = requireState(await readKey(ctx, prior.id, planned), prior.id);
  return {
    id: prior.id,
    attributes: { ...state.attributes, api_key: prior.attributes.api_key, encoded: prior.attributes.encoded },
  };
}

async function readKey(
  ctx: ResourceContext,
  id: string,
  declared: ApiKeyConfig | undefined,
): Promise<ResourceState<ApiKeyConfig> | undefined> {
  const { resourceId } = parseCompositeId(id);
  const info = await ctx.client.getApiKey(resourceId);
  if (!info || info.invalidated) return undefined;

  const metadata = info.metadata ?? {};
  return {
    id,
    attributes: {
      name: info.name ?? declared?.name ?? '',
      role_descriptors: flattenRoleDescriptors(info.role_descriptors, declared?.role_descriptors),
      // the cluster reports the absolute expiry only
      expiration: declared?.expiration,
      metadata:
        Object.keys(metadata).length > 0 || declared?.metadata !== undefined
          ? encodeJsonAttribute(metadata, declared?.metadata)
          : undefined,
      key_id: info.id,
      api_key: declared?.api_key,
      encoded: declared?.encoded,
      expiration_timestamp: info.expiration ?? undefined,
      elasticsearch_connection: declared?.elasticsearch_connection,
    },
  };
}

/**
 * An imported key's expiration duration is unknown; declaring one for a key
 * that does expire adopts the key rather than replacing it.
 */
function adoptsImportedExpiration(key: keyof ApiKeyConfig, prior: ApiKeyConfig, planned: ApiKeyConfig): boolean {
  return (
    key === 'expiration' &&
    prior.expiration === undefined &&
    prior.expiration_timestamp !== undefined &&
    planned.expiration !== undefined
  );
}

async function invalidateKey(ctx: ResourceContext, state: ResourceState<ApiKeyConfig>): Promise<void> {
  const { resourceId } = parseCompositeId(state.id);
  await ctx.client.invalidateApiKey(resourceId);
}

export const apiKeyResource = defineResource<ApiKeyConfig>({
  type: API_KEY_TYPE,
  description: 'Creates an API key for access without basic authentication.',
  schema: apiKeySchema,
  replaceOnChange: ['name', 'expiration'],
  sameForReplacement: adoptsImportedExpiration,
  create: createKey,
  update: updateKey,
  read: readKey,
  delete: invalidateKey,
});

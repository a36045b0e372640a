/**
 * Thin wrapper over the Elasticsearch REST endpoints the resources manage.
 *
 * Requests go through a {@link RequestSender}: in production one backed by the
 * `@elastic/elasticsearch` client's transport ({@link createRequestSender}),
 * in tests an in-process fake cluster. Non-2xx answers become
 * {@link ApiError}s, except for the 404s that reads use to detect objects that
 * no longer exist.
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { Client, errors } from '@elastic/elasticsearch';
import { z } from 'zod';
import type { ConnectionConfig } from './config.js';
import { formatCompositeId } from './compositeId.js';
import { ProviderError, TransportError, checkResponse } from './errors.js';
import type { JsonObject } from './jsonUtils.js';
import type { Logger } from './logger.js';
import { redactSecrets } from './redaction.js';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

export interface ApiRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: JsonObject;
}

export interface ApiResponse {
  statusCode: number;
  body: unknown;
}

export type RequestSender = (req: ApiRequest) => Promise<ApiResponse>;

// ---------------------------------------------------------------------------
// Wire documents
// ---------------------------------------------------------------------------

export const phaseDocumentSchema = z.object({
  min_age: z.string().optional(),
  actions: z.record(z.record(z.unknown())).default({}),
});
export type PhaseDocument = z.infer<typeof phaseDocumentSchema>;

export const policyDocumentSchema = z.object({
  phases: z.record(phaseDocumentSchema).default({}),
  _meta: z.record(z.unknown()).optional(),
});
export type PolicyDocument = z.infer<typeof policyDocumentSchema>;

const lifecyclePolicySchema = z.object({
  version: z.number().optional(),
  modified_date: z.string().optional(),
  policy: policyDocumentSchema,
});
export type LifecyclePolicy = z.infer<typeof lifecyclePolicySchema>;

const stringList = z.array(z.string());

export const roleDocumentSchema = z
  .object({
    cluster: stringList.optional(),
    indices: z
      .array(
        z
          .object({
            names: stringList,
            privileges: stringList,
            field_security: z
              .object({ grant: stringList.optional(), except: stringList.optional() })
              .optional(),
            query: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    applications: z
      .array(
        z.object({
          application: z.string(),
          privileges: stringList,
          resources: stringList,
        }),
      )
      .optional(),
    global: z.record(z.unknown()).optional(),
    run_as: stringList.optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type RoleDocument = z.infer<typeof roleDocumentSchema>;

export interface CreateApiKeyRequest {
  name: string;
  role_descriptors?: Record<string, RoleDocument>;
  expiration?: string;
  metadata?: JsonObject;
}

export type UpdateApiKeyRequest = Pick<CreateApiKeyRequest, 'role_descriptors' | 'metadata'>;

const createApiKeyResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  api_key: z.string(),
  encoded: z.string().optional(),
  expiration: z.number().optional(),
});
export type CreatedApiKey = z.infer<typeof createApiKeyResponseSchema>;

const apiKeyInfoSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    creation: z.number().optional(),
    expiration: z.number().nullish(),
    invalidated: z.boolean().default(false),
    metadata: z.record(z.unknown()).optional(),
    role_descriptors: z.record(roleDocumentSchema).optional(),
  })
  .passthrough();
export type ApiKeyInfo = z.infer<typeof apiKeyInfoSchema>;

const getApiKeyResponseSchema = z.object({ api_keys: z.array(apiKeyInfoSchema) });

const invalidateApiKeyResponseSchema = z.object({
  invalidated_api_keys: stringList.default([]),
  error_count: z.number().default(0),
  error_details: z.array(z.unknown()).optional(),
});

/** Flat `name → value` view of one settings group; `null` removes a setting. */
export type SettingsGroup = Record<string, string | string[] | null>;

export interface ClusterSettingsUpdate {
  persistent?: SettingsGroup;
  transient?: SettingsGroup;
}

const clusterSettingsResponseSchema = z.object({
  persistent: z.record(z.unknown()).default({}),
  transient: z.record(z.unknown()).default({}),
});
export type ClusterSettingsDocument = z.infer<typeof clusterSettingsResponseSchema>;

const clusterInfoSchema = z.object({ cluster_uuid: z.string() });

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, summary: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ProviderError(
      summary,
      `Unexpected response body: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class ElasticsearchApiClient {
  private clusterUuidPromise: Promise<string> | undefined;

  constructor(
    private readonly send: RequestSender,
    private readonly logger: Logger,
  ) {}

  private async request(req: ApiRequest): Promise<ApiResponse> {
    this.logger.trace('sending request to Elasticsearch', {
      method: req.method,
      path: req.path,
      ...(req.query ? { query: req.query } : {}),
      ...(req.body ? { body: redactSecrets(req.body).redactedData } : {}),
    });
    const res = await this.send(req);
    this.logger.trace('received response from Elasticsearch', {
      method: req.method,
      path: req.path,
      status_code: res.statusCode,
    });
    return res;
  }

  /** UUID of the cluster behind this connection; fetched once. */
  clusterUuid(): Promise<string> {
    if (!this.clusterUuidPromise) {
      this.clusterUuidPromise = this.fetchClusterUuid().catch((err: unknown) => {
        this.clusterUuidPromise = undefined;
        throw err;
      });
    }
    return this.clusterUuidPromise;
  }

  private async fetchClusterUuid(): Promise<string> {
    const res = await this.request({ method: 'GET', path: '/' });
    checkResponse(res, 'Unable to get cluster info.');
    return parseBody(clusterInfoSchema, res.body, 'Unable to get cluster info.').cluster_uuid;
  }

  /** Composite identifier of `resourceId` on this cluster. */
  async id(resourceId: string): Promise<string> {
    return formatCompositeId({ clusterId: await this.clusterUuid(), resourceId });
  }

  // -- index lifecycle management -------------------------------------------

  async putLifecycle(name: string, policy: PolicyDocument): Promise<void> {
    const res = await this.request({
      method: 'PUT',
      path: `/_ilm/policy/${encodeURIComponent(name)}`,
      body: { policy },
    });
    checkResponse(res, 'Unable to create or update the ILM policy.');
  }

  /** @returns `undefined` when the policy does not exist. */
  async getLifecycle(name: string): Promise<LifecyclePolicy | undefined> {
    const summary = 'Unable to fetch ILM policy from the cluster.';
    const res = await this.request({ method: 'GET', path: `/_ilm/policy/${encodeURIComponent(name)}` });
    if (res.statusCode === 404) return undefined;
    checkResponse(res, summary);
    return parseBody(z.record(lifecyclePolicySchema), res.body, summary)[name];
  }

  async deleteLifecycle(name: string): Promise<void> {
    const res = await this.request({ method: 'DELETE', path: `/_ilm/policy/${encodeURIComponent(name)}` });
    checkResponse(res, 'Unable to delete ILM policy.');
  }

  // -- security API keys -----------------------------------------------------

  async createApiKey(req: CreateApiKeyRequest): Promise<CreatedApiKey> {
    const summary = 'Unable to create API key.';
    const res = await this.request({ method: 'POST', path: '/_security/api_key', body: { ...req } });
    checkResponse(res, summary);
    return parseBody(createApiKeyResponseSchema, res.body, summary);
  }

  async updateApiKey(id: string, req: UpdateApiKeyRequest): Promise<void> {
    const res = await this.request({
      method: 'PUT',
      path: `/_security/api_key/${encodeURIComponent(id)}`,
      body: { ...req },
    });
    checkResponse(res, 'Unable to update API key.');
  }

  /** @returns `undefined` when no key with this id exists. */
  async getApiKey(id: string): Promise<ApiKeyInfo | undefined> {
    const summary = 'Unable to get API key.';
    const res = await this.request({ method: 'GET', path: '/_security/api_key', query: { id } });
    if (res.statusCode === 404) return undefined;
    checkResponse(res, summary);
    return parseBody(getApiKeyResponseSchema, res.body, summary).api_keys.find((key) => key.id === id);
  }

  async invalidateApiKey(id: string): Promise<void> {
    const summary = 'Unable to invalidate API key.';
    const res = await this.request({ method: 'DELETE', path: '/_security/api_key', body: { ids: [id] } });
    checkResponse(res, summary);
    const result = parseBody(invalidateApiKeyResponseSchema, res.body, summary);
    if (result.error_count > 0) {
      throw new ProviderError(summary, `Failed with: ${JSON.stringify(result.error_details ?? [])}`);
    }
  }

  // -- cluster settings ------------------------------------------------------

  async putClusterSettings(update: ClusterSettingsUpdate): Promise<void> {
    const res = await this.request({ method: 'PUT', path: '/_cluster/settings', body: { ...update } });
    checkResponse(res, 'Unable to update cluster settings.');
  }

  async getClusterSettings(): Promise<ClusterSettingsDocument> {
    const summary = 'Unable to read cluster settings.';
    const res = await this.request({
      method: 'GET',
      path: '/_cluster/settings',
      query: { flat_settings: 'true' },
    });
    checkResponse(res, summary);
    return parseBody(clusterSettingsResponseSchema, res.body, summary);
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

function authFor(connection: ConnectionConfig) {
  if (connection.apiKey) return { apiKey: connection.apiKey };
  if (connection.username) return { username: connection.username, password: connection.password ?? '' };
  return undefined;
}

/**
 * Builds a {@link RequestSender} on top of an `@elastic/elasticsearch`
 * client. Response errors are handed back as plain responses so that
 * {@link checkResponse} owns the status handling; anything the client throws
 * before a response exists becomes a {@link TransportError}.
 */
export function createRequestSender(connection: ConnectionConfig): RequestSender {
  const client = new Client({
    node: connection.endpoints,
    auth: authFor(connection),
    tls: {
      rejectUnauthorized: !connection.insecure,
      ...(connection.caFile ? { ca: readFileSync(connection.caFile) } : {}),
    },
  });

  return async (req) => {
    try {
      const res = await client.transport.request(
        { method: req.method, path: req.path, querystring: req.query, body: req.body },
        { meta: true },
      );
      return { statusCode: res.statusCode ?? 0, body: res.body };
    } catch (err) {
      if (err instanceof errors.ResponseError) {
        return { statusCode: err.statusCode ?? 0, body: err.body };
      }
      if (err instanceof errors.ElasticsearchClientError) {
        throw new TransportError('Unable to reach Elasticsearch.', err.message, { cause: err });
      }
      throw err;
    }
  };
}

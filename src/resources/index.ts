/**
 * Resource registry: every resource type the server manages, by type name.
 *
 * @module
 */
import { apiKeyResource } from './apiKey/index.js';
import { clusterSettingsResource } from './clusterSettings/index.js';
import { ilmPolicyResource } from './ilm/index.js';
import type { ManagedResource } from './types.js';

export const RESOURCE_TYPES = [
  'elasticsearch_index_lifecycle',
  'elasticsearch_security_api_key',
  'elasticsearch_cluster_settings',
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const allResources: Readonly<Record<ResourceType, ManagedResource>> = Object.freeze({
  elasticsearch_index_lifecycle: ilmPolicyResource,
  elasticsearch_security_api_key: apiKeyResource,
  elasticsearch_cluster_settings: clusterSettingsResource,
});

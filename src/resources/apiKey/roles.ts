/**
 * Expand/flatten of API key role descriptors.
 *
 * Role descriptors are declared either as one JSON-encoded map or as typed
 * role blocks. Privileges, names and users are sets: their order never
 * counts as a difference, and a declared order is kept when the cluster
 * reports the same members.
 *
 * @module
 */
import { z } from 'zod';
import { roleDocumentSchema, type RoleDocument } from '../../lib/esClient.js';
import { fromZodError } from '../../lib/errors.js';
import {
  encodeJsonAttribute,
  isJsonObject,
  isValidJson,
  jsonEquivalent,
  parseJsonObject,
  type JsonObject,
} from '../../lib/jsonUtils.js';
import type { IndicesPermissionConfig, RoleConfig, RoleDescriptorsConfig } from './schema.js';

type RoleMap = Record<string, RoleDocument>;

const roleMapSchema = z.record(roleDocumentSchema);

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((item) => right.has(item));
}

// ---------------------------------------------------------------------------
// Expand
// ---------------------------------------------------------------------------

export function expandRole(role: RoleConfig, path: string): RoleDocument {
  const doc: RoleDocument = {};
  if (role.cluster) doc.cluster = role.cluster;
  if (role.indices) {
    doc.indices = role.indices.map((entry) => ({
      names: entry.names,
      privileges: entry.privileges,
      ...(entry.field_security ? { field_security: { ...entry.field_security } } : {}),
      ...(entry.query ? { query: entry.query } : {}),
    }));
  }
  if (role.applications) doc.applications = role.applications.map((app) => ({ ...app }));
  if (role.global) doc.global = parseJsonObject(`${path}.global`, role.global);
  if (role.run_as) doc.run_as = role.run_as;
  if (role.metadata) doc.metadata = parseJsonObject(`${path}.metadata`, role.metadata);
  return doc;
}

/**
 * Builds the `role_descriptors` request map.
 *
 * @throws {ValidationError} When the JSON form is malformed or holds something
 *   other than role documents.
 */
export function expandRoleDescriptors(value: RoleDescriptorsConfig | undefined): RoleMap | undefined {
  if (value === undefined) return undefined;

  if (typeof value === 'string') {
    const decoded = roleMapSchema.safeParse(parseJsonObject('role_descriptors', value));
    if (!decoded.success) throw fromZodError(decoded.error, 'Invalid role descriptors.');
    return decoded.data;
  }

  const roles: RoleMap = {};
  for (const [name, role] of Object.entries(value)) {
    roles[name] = expandRole(role, `role_descriptors.${name}`);
  }
  return roles;
}

// ---------------------------------------------------------------------------
// Flatten
// ---------------------------------------------------------------------------

const SET_KEYS: ReadonlySet<string> = new Set([
  'cluster',
  'run_as',
  'names',
  'privileges',
  'resources',
  'grant',
  'except',
]);

function isEmpty(value: unknown): boolean {
  return (Array.isArray(value) && value.length === 0) || (isJsonObject(value) && Object.keys(value).length === 0);
}

/**
 * Canonical form of a role document for comparison: sets sorted, empty
 * collections and server-side defaults dropped.
 */
function normalize(value: unknown, key?: string): unknown {
  if (Array.isArray(value)) {
    const items = value.map((item) => normalize(item));
    const strings = items.filter((item): item is string => typeof item === 'string');
    return key && SET_KEYS.has(key) && strings.length === items.length ? strings.sort() : items;
  }
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) {
      if (k === 'transient_metadata' || (k === 'allow_restricted_indices' && v === false)) continue;
      const n = normalize(v, k);
      if (!isEmpty(n)) out[k] = n;
    }
    return out;
  }
  return value;
}

export function normalizeRoleMap(roles: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [name, role] of Object.entries(roles)) {
    out[name] = normalize(role);
  }
  return out;
}

function flattenSet(server: string[] | undefined, declared: string[] | undefined): string[] | undefined {
  if (!server || (server.length === 0 && declared === undefined)) return undefined;
  return declared && sameSet(server, declared) ? declared : [...server].sort();
}

function flattenJson(server: JsonObject | undefined, declared: string | undefined): string | undefined {
  if (!server || (Object.keys(server).length === 0 && declared === undefined)) return undefined;
  return encodeJsonAttribute(server, declared);
}

function flattenQuery(server: string | undefined, declared: string | undefined): string | undefined {
  if (server === undefined) return undefined;
  return isValidJson(server) ? encodeJsonAttribute(JSON.parse(server), declared) : server;
}

type IndicesDocument = NonNullable<RoleDocument['indices']>[number];

function flattenIndices(
  entry: IndicesDocument,
  declared: IndicesPermissionConfig | undefined,
): IndicesPermissionConfig {
  const fieldSecurity = entry.field_security
    ? {
        grant: flattenSet(entry.field_security.grant, declared?.field_security?.grant),
        except: flattenSet(entry.field_security.except, declared?.field_security?.except),
      }
    : undefined;
  return {
    names: flattenSet(entry.names, declared?.names) ?? [],
    privileges: flattenSet(entry.privileges, declared?.privileges) ?? [],
    field_security:
      fieldSecurity && (fieldSecurity.grant || fieldSecurity.except || declared?.field_security)
        ? fieldSecurity
        : undefined,
    query: flattenQuery(entry.query, declared?.query),
  };
}

export function flattenRole(doc: RoleDocument, declared: RoleConfig | undefined): RoleConfig {
  const indices = doc.indices?.map((entry) =>
    flattenIndices(
      entry,
      declared?.indices?.find((d) => sameSet(d.names, entry.names)),
    ),
  );
  const applications = doc.applications?.map((app) => {
    const match = declared?.applications?.find((d) => d.application === app.application);
    return {
      application: app.application,
      privileges: flattenSet(app.privileges, match?.privileges) ?? [],
      resources: flattenSet(app.resources, match?.resources) ?? [],
    };
  });

  return {
    cluster: flattenSet(doc.cluster, declared?.cluster),
    indices: indices && (indices.length > 0 || declared?.indices) ? indices : undefined,
    applications: applications && (applications.length > 0 || declared?.applications) ? applications : undefined,
    global: flattenJson(doc.global, declared?.global),
    run_as: flattenSet(doc.run_as, declared?.run_as),
    metadata: flattenJson(doc.metadata, declared?.metadata),
  };
}

/**
 * Rebuilds `role_descriptors` in the form it was declared in. Imports, which
 * have no declaration, get the JSON form, or nothing for an unrestricted key.
 *
 * Clusters that do not report role descriptors leave the declared value as is.
 */
export function flattenRoleDescriptors(
  server: RoleMap | undefined,
  declared: RoleDescriptorsConfig | undefined,
): RoleDescriptorsConfig | undefined {
  if (server === undefined) return declared;
  if (declared === undefined && Object.keys(server).length === 0) return undefined;

  if (declared !== undefined && typeof declared !== 'string') {
    const roles: Record<string, RoleConfig> = {};
    for (const [name, doc] of Object.entries(server)) {
      roles[name] = flattenRole(doc, declared[name]);
    }
    return roles;
  }

  const normalized = normalizeRoleMap(server);
  if (declared !== undefined && isValidJson(declared)) {
    const parsed: unknown = JSON.parse(declared);
    if (isJsonObject(parsed) && jsonEquivalent(normalizeRoleMap(parsed), normalized)) {
      return declared;
    }
  }
  return JSON.stringify(normalized);
}

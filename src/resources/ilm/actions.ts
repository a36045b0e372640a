/**
 * The closed set of ILM actions: configuration schema, expand and flatten for
 * each of them.
 *
 * Expand copies an allow-list of settings per action into the request
 * document. Zero integers and empty strings count as unset and are left out;
 * booleans are always sent. `readonly`, `freeze` and `unfollow` carry nothing
 * but an `enabled` switch: enabled sends `{}`, disabled leaves the action out
 * of the document altogether.
 *
 * @module
 */
import { z } from 'zod';
import { ValidationError } from '../../lib/errors.js';
import {
  encodeJsonAttribute,
  isJsonObject,
  parseJsonObject,
  readBoolean,
  readInteger,
  readString,
  type JsonObject,
} from '../../lib/jsonUtils.js';
import { jsonString, positiveOrZeroInt } from '../schemaUtils.js';

const toggleSchema = z.object({ enabled: z.boolean().default(true) }).strict();

const allocateSchema = z
  .object({
    number_of_replicas: z.number().int().optional(),
    include: jsonString.optional(),
    exclude: jsonString.optional(),
    require: jsonString.optional(),
  })
  .strict();

const deleteSchema = z.object({ delete_searchable_snapshot: z.boolean().default(true) }).strict();

const forcemergeSchema = z
  .object({
    max_num_segments: z.number().int().min(1),
    index_codec: z.string().optional(),
  })
  .strict();

const rolloverSchema = z
  .object({
    max_age: z.string().optional(),
    max_docs: z.number().int().optional(),
    max_size: z.string().optional(),
    max_primary_shard_size: z.string().optional(),
  })
  .strict();

const searchableSnapshotSchema = z
  .object({
    snapshot_repository: z.string(),
    force_merge_index: z.boolean().default(true),
  })
  .strict();

const setPrioritySchema = z.object({ priority: positiveOrZeroInt }).strict();

const shrinkSchema = z
  .object({
    number_of_shards: z.number().int().optional(),
    max_primary_shard_size: z.string().optional(),
  })
  .strict();

const waitForSnapshotSchema = z.object({ policy: z.string() }).strict();

/** Schema of every supported action, keyed by its name on the wire. */
export const ACTION_SCHEMAS = Object.freeze({
  allocate: allocateSchema,
  delete: deleteSchema,
  forcemerge: forcemergeSchema,
  freeze: toggleSchema,
  migrate: toggleSchema,
  readonly: toggleSchema,
  rollover: rolloverSchema,
  searchable_snapshot: searchableSnapshotSchema,
  set_priority: setPrioritySchema,
  shrink: shrinkSchema,
  unfollow: toggleSchema,
  wait_for_snapshot: waitForSnapshotSchema,
});

export type ActionName = keyof typeof ACTION_SCHEMAS;
export type ActionConfigs = { [K in ActionName]: z.output<(typeof ACTION_SCHEMAS)[K]> };

export type ToggleConfig = z.output<typeof toggleSchema>;
export type AllocateConfig = ActionConfigs['allocate'];

/** Actions with nothing to configure beyond `enabled`. */
export const TOGGLE_ACTIONS = ['readonly', 'freeze', 'unfollow'] as const satisfies readonly ActionName[];

/** Declared actions of one phase; at most one block per action. */
export type PhaseActions = { [K in ActionName]?: ActionConfigs[K] };

export type ActionDocument = JsonObject;

export function isActionName(name: string): name is ActionName {
  return Object.hasOwn(ACTION_SCHEMAS, name);
}

// ---------------------------------------------------------------------------
// Expand
// ---------------------------------------------------------------------------

function putInt(doc: ActionDocument, key: string, value: number | undefined): void {
  if (value !== undefined && value !== 0) doc[key] = value;
}

function putString(doc: ActionDocument, key: string, value: string | undefined): void {
  if (value) doc[key] = value;
}

function putJson(doc: ActionDocument, key: string, value: string | undefined, path: string): void {
  if (value) doc[key] = parseJsonObject(`${path}.${key}`, value);
}

function expandToggle(settings: ToggleConfig | undefined): ActionDocument | undefined {
  return settings?.enabled ? {} : undefined;
}

/**
 * Builds the request document of one declared action.
 *
 * @param path - Attribute path used in validation errors, e.g. `warm.allocate`.
 * @returns `undefined` when the action is not declared or is a disabled toggle.
 */
export function expandAction(name: ActionName, actions: PhaseActions, path: string): ActionDocument | undefined {
  const doc: ActionDocument = {};
  switch (name) {
    case 'allocate': {
      const a = actions.allocate;
      if (!a) return undefined;
      putInt(doc, 'number_of_replicas', a.number_of_replicas);
      putJson(doc, 'include', a.include, path);
      putJson(doc, 'exclude', a.exclude, path);
      putJson(doc, 'require', a.require, path);
      return doc;
    }
    case 'delete': {
      const a = actions.delete;
      if (!a) return undefined;
      doc.delete_searchable_snapshot = a.delete_searchable_snapshot;
      return doc;
    }
    case 'forcemerge': {
      const a = actions.forcemerge;
      if (!a) return undefined;
      putInt(doc, 'max_num_segments', a.max_num_segments);
      putString(doc, 'index_codec', a.index_codec);
      return doc;
    }
    case 'migrate': {
      const a = actions.migrate;
      if (!a) return undefined;
      doc.enabled = a.enabled;
      return doc;
    }
    case 'rollover': {
      const a = actions.rollover;
      if (!a) return undefined;
      putString(doc, 'max_age', a.max_age);
      putInt(doc, 'max_docs', a.max_docs);
      putString(doc, 'max_size', a.max_size);
      putString(doc, 'max_primary_shard_size', a.max_primary_shard_size);
      return doc;
    }
    case 'searchable_snapshot': {
      const a = actions.searchable_snapshot;
      if (!a) return undefined;
      putString(doc, 'snapshot_repository', a.snapshot_repository);
      doc.force_merge_index = a.force_merge_index;
      return doc;
    }
    case 'set_priority': {
      const a = actions.set_priority;
      if (!a) return undefined;
      putInt(doc, 'priority', a.priority);
      return doc;
    }
    case 'shrink': {
      const a = actions.shrink;
      if (!a) return undefined;
      putInt(doc, 'number_of_shards', a.number_of_shards);
      putString(doc, 'max_primary_shard_size', a.max_primary_shard_size);
      return doc;
    }
    case 'wait_for_snapshot': {
      const a = actions.wait_for_snapshot;
      if (!a) return undefined;
      putString(doc, 'policy', a.policy);
      return doc;
    }
    case 'freeze':
    case 'readonly':
    case 'unfollow':
      return expandToggle(actions[name]);
    default: {
      const unsupported: never = name;
      throw new ValidationError('Unknown action defined.', `Configured action "${String(unsupported)}" is not supported`);
    }
  }
}

// ---------------------------------------------------------------------------
// Flatten
// ---------------------------------------------------------------------------

function flattenAllocate(doc: ActionDocument, declared: AllocateConfig | undefined): AllocateConfig {
  const out: AllocateConfig = {};
  const replicas = readInteger(doc.number_of_replicas);
  if (replicas !== undefined) out.number_of_replicas = replicas;
  for (const key of ['include', 'exclude', 'require'] as const) {
    const value = doc[key];
    // the cluster echoes unset filters as {}
    if (isJsonObject(value) && (Object.keys(value).length > 0 || declared?.[key] !== undefined)) {
      out[key] = encodeJsonAttribute(value, declared?.[key]);
    }
  }
  return out;
}

/**
 * Rebuilds the declared form of one action from the cluster's document and
 * stores it on `out`. Toggle actions present on the cluster are enabled.
 */
export function flattenAction(
  name: ActionName,
  doc: ActionDocument,
  declared: PhaseActions | undefined,
  out: PhaseActions,
): void {
  switch (name) {
    case 'allocate':
      out.allocate = flattenAllocate(doc, declared?.allocate);
      return;
    case 'delete':
      out.delete = { delete_searchable_snapshot: readBoolean(doc.delete_searchable_snapshot) ?? true };
      return;
    case 'forcemerge':
      out.forcemerge = {
        max_num_segments: readInteger(doc.max_num_segments) ?? 0,
        index_codec: readString(doc.index_codec),
      };
      return;
    case 'migrate':
      out.migrate = { enabled: readBoolean(doc.enabled) ?? true };
      return;
    case 'rollover':
      out.rollover = {
        max_age: readString(doc.max_age),
        max_docs: readInteger(doc.max_docs),
        max_size: readString(doc.max_size),
        max_primary_shard_size: readString(doc.max_primary_shard_size),
      };
      return;
    case 'searchable_snapshot':
      out.searchable_snapshot = {
        snapshot_repository: readString(doc.snapshot_repository) ?? '',
        force_merge_index: readBoolean(doc.force_merge_index) ?? true,
      };
      return;
    case 'set_priority':
      out.set_priority = { priority: readInteger(doc.priority) ?? 0 };
      return;
    case 'shrink':
      out.shrink = {
        number_of_shards: readInteger(doc.number_of_shards),
        max_primary_shard_size: readString(doc.max_primary_shard_size),
      };
      return;
    case 'wait_for_snapshot':
      out.wait_for_snapshot = { policy: readString(doc.policy) ?? '' };
      return;
    case 'freeze':
    case 'readonly':
    case 'unfollow':
      out[name] = { enabled: true };
      return;
    default: {
      const unsupported: never = name;
      throw new ValidationError('Unknown action defined.', `Action "${String(unsupported)}" is not supported`);
    }
  }
}

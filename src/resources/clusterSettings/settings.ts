/**
 * Expand/flatten between the declared `setting` lists and the flat
 * `name → value` groups of the cluster settings API.
 *
 * The API applies partial updates: a setting absent from a request keeps its
 * value, and a `null` value resets it to the default.
 *
 * @module
 */
import type { ClusterSettingsDocument, ClusterSettingsUpdate, SettingsGroup } from '../../lib/esClient.js';
import type { ClusterSettingsConfig, SettingConfig, SettingsGroupConfig } from './schema.js';

export const SETTINGS_GROUPS = ['persistent', 'transient'] as const;
export type SettingsGroupName = (typeof SETTINGS_GROUPS)[number];

function settingNames(group: SettingsGroupConfig | undefined): string[] {
  return group?.setting.map((setting) => setting.name) ?? [];
}

/**
 * Request body for one group: the declared values, plus `null` for every
 * setting the prior group had and the planned one dropped.
 */
export function expandGroup(
  planned: SettingsGroupConfig | undefined,
  prior?: SettingsGroupConfig | undefined,
): SettingsGroup {
  const out: SettingsGroup = {};
  const keep = new Set(settingNames(planned));
  for (const name of settingNames(prior)) {
    if (!keep.has(name)) out[name] = null;
  }
  for (const setting of planned?.setting ?? []) {
    out[setting.name] = setting.value_list ?? setting.value ?? null;
  }
  return out;
}

export function expandSettings(planned: ClusterSettingsConfig, prior?: ClusterSettingsConfig): ClusterSettingsUpdate {
  const update: ClusterSettingsUpdate = {};
  for (const group of SETTINGS_GROUPS) {
    const body = expandGroup(planned[group], prior?.[group]);
    if (Object.keys(body).length > 0) update[group] = body;
  }
  return update;
}

/** Resets every declared setting. */
export function expandRemoval(config: ClusterSettingsConfig): ClusterSettingsUpdate {
  const update: ClusterSettingsUpdate = {};
  for (const group of SETTINGS_GROUPS) {
    const names = settingNames(config[group]);
    if (names.length > 0) update[group] = Object.fromEntries(names.map((name) => [name, null]));
  }
  return update;
}

function toSetting(name: string, value: unknown): SettingConfig {
  if (Array.isArray(value)) {
    return { name, value_list: value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item))) };
  }
  return { name, value: typeof value === 'string' ? value : JSON.stringify(value) };
}

/**
 * Reads back one group. Only declared names are looked at; without a
 * declaration every setting the cluster reports is returned, sorted by name.
 *
 * @returns `undefined` when none of the settings is set on the cluster.
 */
export function flattenGroup(
  server: Record<string, unknown>,
  declared: SettingsGroupConfig | undefined,
): SettingsGroupConfig | undefined {
  const names = declared ? settingNames(declared) : Object.keys(server).sort();
  const setting = names
    .filter((name) => server[name] !== undefined && server[name] !== null)
    .map((name) => toSetting(name, server[name]));
  return setting.length > 0 ? { setting } : undefined;
}

/**
 * Reads back both groups. A group left out of the declaration stays unset;
 * without any declaration (import) both groups are read in full.
 */
export function flattenSettings(
  doc: ClusterSettingsDocument,
  declared: ClusterSettingsConfig | undefined,
): ClusterSettingsConfig {
  const group = (name: SettingsGroupName): SettingsGroupConfig | undefined => {
    if (declared && !declared[name]) return undefined;
    return flattenGroup(doc[name], declared?.[name]);
  };
  return {
    persistent: group('persistent'),
    transient: group('transient'),
    elasticsearch_connection: declared?.elasticsearch_connection,
  };
}

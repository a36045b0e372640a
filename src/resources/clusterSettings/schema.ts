import { z } from 'zod';
import { connectionBlock } from '../connection.js';
import { block, stringSet } from '../schemaUtils.js';

export const settingSchema = z
  .object({
    /** Flat setting name, e.g. `indices.lifecycle.poll_interval`. */
    name: z.string().min(1),
    value: z.string().optional(),
    value_list: stringSet.optional(),
  })
  .strict()
  .superRefine((setting, ctx) => {
    if ((setting.value === undefined) === (setting.value_list === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `exactly one of value or value_list must be set for "${setting.name}"`,
      });
    }
  });

export type SettingConfig = z.infer<typeof settingSchema>;

const settingsGroupSchema = z
  .object({ setting: z.array(settingSchema).min(1) })
  .strict()
  .superRefine((group, ctx) => {
    const seen = new Set<string>();
    group.setting.forEach((setting, i) => {
      if (seen.has(setting.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['setting', i, 'name'],
          message: `duplicate setting "${setting.name}"`,
        });
      }
      seen.add(setting.name);
    });
  });

export type SettingsGroupConfig = z.infer<typeof settingsGroupSchema>;

export const clusterSettingsSchema = z
  .object({
    persistent: block(settingsGroupSchema),
    transient: block(settingsGroupSchema),
    elasticsearch_connection: connectionBlock,
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.persistent === undefined && config.transient === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one of persistent, transient must be specified' });
    }
  });

export type ClusterSettingsConfig = z.infer<typeof clusterSettingsSchema>;

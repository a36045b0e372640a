import { z } from 'zod';
import { connectionBlock } from '../connection.js';
import { block, jsonString, stringSet } from '../schemaUtils.js';

const fieldSecuritySchema = z
  .object({
    grant: stringSet.optional(),
    except: stringSet.optional(),
  })
  .strict();

const indicesPermissionSchema = z
  .object({
    names: stringSet.min(1),
    privileges: stringSet.min(1),
    field_security: block(fieldSecuritySchema),
    query: jsonString.optional(),
  })
  .strict();

const applicationPrivilegeSchema = z
  .object({
    application: z.string().min(1),
    privileges: stringSet,
    resources: stringSet,
  })
  .strict();

export const roleSchema = z
  .object({
    cluster: stringSet.optional(),
    indices: z.array(indicesPermissionSchema).optional(),
    applications: z.array(applicationPrivilegeSchema).optional(),
    global: jsonString.optional(),
    run_as: stringSet.optional(),
    metadata: jsonString.optional(),
  })
  .strict();

export type RoleConfig = z.infer<typeof roleSchema>;
export type IndicesPermissionConfig = z.infer<typeof indicesPermissionSchema>;

/** JSON-encoded role map, or the same map written out as typed role blocks. */
export const roleDescriptorsSchema = z.union([jsonString, z.record(roleSchema)]);
export type RoleDescriptorsConfig = z.infer<typeof roleDescriptorsSchema>;

const GRAPH_ONLY = /^[\x21-\x7e]+$/;

export const apiKeySchema = z
  .object({
    name: z
      .string()
      .min(1)
      .max(1024)
      .regex(
        GRAPH_ONLY,
        'must contain alphanumeric characters (a-z, A-Z, 0-9), spaces, punctuation, and printable symbols in the Basic Latin (ASCII) block. Leading or trailing whitespace is not allowed',
      ),
    role_descriptors: roleDescriptorsSchema.optional(),
    /** Duration such as `1d`; keys never expire without it. */
    expiration: z.string().optional(),
    metadata: jsonString.optional(),
    // computed
    key_id: z.string().optional(),
    api_key: z.string().optional(),
    encoded: z.string().optional(),
    expiration_timestamp: z.number().optional(),
    elasticsearch_connection: connectionBlock,
  })
  .strict();

export type ApiKeyConfig = z.infer<typeof apiKeySchema>;

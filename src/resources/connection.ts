import { z } from 'zod';
import type { ConnectionConfig } from '../lib/config.js';
import { block } from './schemaUtils.js';

/**
 * Per-resource `elasticsearch_connection` block. When present it replaces the
 * provider-level connection for every request the resource makes.
 */
export const connectionSchema = z
  .object({
    endpoints: z.array(z.string().url()).min(1),
    username: z.string().optional(),
    password: z.string().optional(),
    api_key: z.string().optional(),
    insecure: z.boolean().default(false),
    ca_file: z.string().optional(),
  })
  .strict()
  .superRefine((conn, ctx) => {
    if (conn.username && !conn.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: 'required when username is set' });
    }
    if (conn.username && conn.api_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['api_key'], message: 'conflicts with username' });
    }
  });

export type ConnectionBlock = z.infer<typeof connectionSchema>;

export const connectionBlock = block(connectionSchema);

export function toConnectionConfig(conn: ConnectionBlock | undefined): ConnectionConfig | undefined {
  if (!conn) return undefined;
  return {
    endpoints: conn.endpoints,
    username: conn.username,
    password: conn.password,
    apiKey: conn.api_key,
    insecure: conn.insecure,
    caFile: conn.ca_file,
  };
}

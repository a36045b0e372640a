import { z } from 'zod';
import { RESOURCE_TYPES } from '../resources/index.js';

export const resourceTypeSchema = z
  .enum(RESOURCE_TYPES)
  .describe('Resource type, as listed by list_resource_types.');

export const storedStateSchema = z
  .object({
    id: z.string().describe('Composite identifier, "<cluster_uuid>/<resource id>".'),
    attributes: z.record(z.unknown()).describe('Attributes as returned by the previous call.'),
  })
  .describe('State returned by a previous apply, read or import.');

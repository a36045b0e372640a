import { z } from 'zod';
import { createSecureTool } from '../lib/toolWrapper.js';
import { RESOURCE_TYPES, allResources } from '../resources/index.js';

export interface ResourceTypeInfo {
  type: string;
  description: string;
  replace_on_change: readonly string[];
}

export const listResourceTypesTool = createSecureTool({
  id: 'list_resource_types',
  description:
    'List the resource types this server manages, with the attributes whose change replaces the resource instead of updating it.',
  inputSchema: z.object({}),
  execute: async () => ({
    status: 'success' as const,
    data: RESOURCE_TYPES.map(
      (type): ResourceTypeInfo => ({
        type,
        description: allResources[type].description,
        replace_on_change: allResources[type].replaceOnChange,
      }),
    ),
  }),
});

import { z } from 'zod';
import { ProviderError } from '../lib/errors.js';
import { createSecureTool } from '../lib/toolWrapper.js';
import { allResources } from '../resources/index.js';
import { resourceTypeSchema } from './common.js';

export const importResourceTool = createSecureTool({
  id: 'import_resource',
  description:
    'Bring an object that already exists on the cluster under management. Takes its composite identifier, "<cluster_uuid>/<resource id>", and returns its state as read from the cluster.',
  inputSchema: z.object({
    type: resourceTypeSchema,
    id: z.string().describe('Composite identifier of the existing object.'),
  }),
  execute: async ({ type, id }, { runtime, request }) => {
    request._resource = { type, id };
    const state = await allResources[type].import(runtime, id);
    if (!state) {
      throw new ProviderError('Resource not found.', `"${id}" does not exist on the cluster`);
    }
    return { status: 'success' as const, data: state };
  },
});

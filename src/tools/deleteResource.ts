import { z } from 'zod';
import { createSecureTool } from '../lib/toolWrapper.js';
import { allResources } from '../resources/index.js';
import { resourceTypeSchema, storedStateSchema } from './common.js';

export const deleteResourceTool = createSecureTool({
  id: 'delete_resource',
  description:
    'Delete a resource. API keys are invalidated; cluster settings are reset to their defaults.',
  inputSchema: z.object({
    type: resourceTypeSchema,
    state: storedStateSchema,
  }),
  execute: async ({ type, state }, { runtime, request }) => {
    request._resource = { type, id: state.id };
    await allResources[type].delete(runtime, state);
    return { status: 'success' as const, data: { deleted: state.id } };
  },
});

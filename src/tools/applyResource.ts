import { z } from 'zod';
import { createSecureTool } from '../lib/toolWrapper.js';
import { allResources } from '../resources/index.js';
import { resourceTypeSchema, storedStateSchema } from './common.js';

export const applyResourceTool = createSecureTool({
  id: 'apply_resource',
  description:
    'Create or update a resource from its declared configuration. Pass the state returned by the previous call as prior_state to update; without it the resource is created. Returns the new state, which the caller must keep.',
  inputSchema: z.object({
    type: resourceTypeSchema,
    config: z.record(z.unknown()).describe('Declared attributes of the resource.'),
    prior_state: storedStateSchema.optional(),
  }),
  execute: async ({ type, config, prior_state }, { runtime, request }) => {
    request._resource = { type, id: prior_state?.id };
    const state = await allResources[type].apply(runtime, config, prior_state);
    request._resource.id = state.id;
    return { status: 'success' as const, data: state };
  },
});

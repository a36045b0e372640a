import { z } from 'zod';
import { createSecureTool } from '../lib/toolWrapper.js';
import { allResources } from '../resources/index.js';
import { resourceTypeSchema, storedStateSchema } from './common.js';

export const readResourceTool = createSecureTool({
  id: 'read_resource',
  description:
    'Refresh a stored state from the cluster. Returns null when the object no longer exists; the caller should then forget it.',
  inputSchema: z.object({
    type: resourceTypeSchema,
    state: storedStateSchema,
  }),
  execute: async ({ type, state }, { runtime, request }) => {
    request._resource = { type, id: state.id };
    const current = await allResources[type].read(runtime, state);
    return { status: 'success' as const, data: current ?? null };
  },
});

import type { SecureTool } from '../lib/toolWrapper.js';
import { applyResourceTool } from './applyResource.js';
import { deleteResourceTool } from './deleteResource.js';
import { importResourceTool } from './importResource.js';
import { listResourceTypesTool } from './listResourceTypes.js';
import { readResourceTool } from './readResource.js';

export const allTools: readonly SecureTool[] = [
  listResourceTypesTool,
  applyResourceTool,
  readResourceTool,
  importResourceTool,
  deleteResourceTool,
];

import { attachmentTools } from './attachments.js';
import { membershipTools } from './memberships.js';
import { metadataTools } from './metadata.js';
import { projectTools } from './projects.js';
import { queryTools } from './queries.js';
import { ToolRegistry } from './registry.js';
import { SystemToolsOptions, systemTools } from './system.js';
import { timeEntryTools } from './time-entries.js';
import { userTools } from './users.js';
import { workPackageTools } from './work-packages.js';

export { ToolRegistry } from './registry.js';
export type { RegisteredTool, ToolContext } from './registry.js';

export function buildRegistry(options: SystemToolsOptions): ToolRegistry {
  return new ToolRegistry().register(
    ...systemTools(options),
    ...projectTools,
    ...metadataTools,
    ...workPackageTools,
    ...timeEntryTools,
    ...userTools,
    ...membershipTools,
    ...queryTools,
    ...attachmentTools
  );
}

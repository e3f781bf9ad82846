// Tool System Initialization
// Registers the catalog tools on startup

import { env } from '../../env.js';
import { logger } from '../../logger.js';
import type { CourseCatalog } from '../catalog.js';
import { toolRegistry, type ToolRegistry } from './registry.js';
import { createCourseSearchTool } from './course-search-tool.js';
import { createCourseOutlineTool } from './course-outline-tool.js';

export { toolRegistry, ToolRegistry } from './registry.js';
export { COURSE_SEARCH_TOOL_NAME } from './course-search-tool.js';
export { COURSE_OUTLINE_TOOL_NAME } from './course-outline-tool.js';
export type { ToolDefinition, ToolResult, ToolParameter } from './types.js';

const log = logger.child({ module: 'tools' });

export function initializeTools(catalog: CourseCatalog, registry: ToolRegistry = toolRegistry): void {
  if (!env.TOOLS_ENABLED) {
    log.info('Tools disabled (TOOLS_ENABLED=false)');
    return;
  }

  registry.register(createCourseSearchTool(catalog));
  registry.register(createCourseOutlineTool(catalog));

  const registered = registry.getAll().map(t => t.name);
  log.info({ tools: registered }, `Tool system initialized with ${registered.length} tool(s)`);
}

// Course Search Tool
// Keyword search over lesson material, optionally narrowed to one course or lesson

import type { CourseCatalog } from '../catalog.js';
import type { ToolDefinition, ToolResult } from './types.js';

export const COURSE_SEARCH_TOOL_NAME = 'search_course_content';

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function optionalLessonNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return parseInt(value, 10);
  return undefined;
}

export function createCourseSearchTool(catalog: CourseCatalog): ToolDefinition {
  return {
    name: COURSE_SEARCH_TOOL_NAME,
    description: 'Search course materials with smart course name matching and lesson filtering',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'What to search for in the course content',
        required: true,
      },
      {
        name: 'course_name',
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        required: false,
      },
      {
        name: 'lesson_number',
        type: 'integer',
        description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
        required: false,
      },
    ],
    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const query = String(args.query ?? '').trim();
      if (!query) {
        return { success: false, content: 'Query is required' };
      }

      const courseName = optionalString(args.course_name);
      const lessonNumber = optionalLessonNumber(args.lesson_number);

      if (courseName !== undefined && !catalog.resolveCourse(courseName)) {
        return { success: false, content: `No course found matching '${courseName}'` };
      }

      const hits = catalog.search(query, { courseName, lessonNumber });

      if (hits.length === 0) {
        let filterInfo = '';
        if (courseName !== undefined) filterInfo += ` in course '${courseName}'`;
        if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
        return { success: true, content: `No relevant content found${filterInfo}.` };
      }

      return {
        success: true,
        content: hits
          .map(hit => `[${hit.courseTitle} - Lesson ${hit.lessonNumber}]\n${hit.snippet}`)
          .join('\n\n'),
        metadata: { hits: hits.length },
      };
    },
  };
}

// Course Outline Tool
// Returns a course's title, link, instructor and full lesson list

import type { CourseCatalog } from '../catalog.js';
import type { ToolDefinition, ToolResult } from './types.js';

export const COURSE_OUTLINE_TOOL_NAME = 'get_course_outline';

export function createCourseOutlineTool(catalog: CourseCatalog): ToolDefinition {
  return {
    name: COURSE_OUTLINE_TOOL_NAME,
    description: 'Get the outline of a course: title, course link, and the number and title of every lesson',
    parameters: [
      {
        name: 'course_name',
        type: 'string',
        description: "Course title or part of it (e.g. 'MCP', 'Retrieval')",
        required: true,
      },
    ],
    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const courseName = String(args.course_name ?? '').trim();
      if (!courseName) {
        return { success: false, content: 'course_name is required' };
      }

      const course = catalog.resolveCourse(courseName);
      if (!course) {
        return { success: false, content: `No course found matching '${courseName}'` };
      }

      const lines = [`Course: ${course.title}`];
      if (course.link) lines.push(`Link: ${course.link}`);
      if (course.instructor) lines.push(`Instructor: ${course.instructor}`);
      lines.push(`Lessons (${course.lessons.length}):`);
      for (const lesson of course.lessons) {
        lines.push(`  Lesson ${lesson.number}: ${lesson.title}`);
      }

      return { success: true, content: lines.join('\n') };
    },
  };
}

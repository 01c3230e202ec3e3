/**
 * get_course_outline: resolves a course name and lists its lessons.
 */

import type { ICourseCatalog } from '../services/ICourseSearch.js';
import type { ToolDefinition } from '../types/llm.js';
import type { CourseMetadata } from '../types/models.js';
import { validateFields } from '../validation/fields.js';
import type { ITool, ToolOutcome } from './ITool.js';

export const COURSE_OUTLINE_TOOL: ToolDefinition = {
  name: 'get_course_outline',
  description:
    'Get the complete outline of a course: title, course link, instructor and every lesson with its number and title',
  inputSchema: {
    course_name: {
      type: 'string',
      required: true,
      description: "Course title or part of it (e.g. 'MCP', 'Computer Use')",
    },
  },
};

export class CourseOutlineTool implements ITool {
  readonly definition = COURSE_OUTLINE_TOOL;

  constructor(private readonly catalog: ICourseCatalog) {}

  async execute(args: Record<string, unknown>): Promise<ToolOutcome> {
    const errors = validateFields(args, this.definition.inputSchema);
    if (errors.length > 0) {
      return { text: `Invalid arguments for ${this.definition.name}: ${errors.join('; ')}`, sources: [] };
    }

    const courseName = String(args.course_name);
    const title = await this.catalog.resolveCourseName(courseName);
    if (!title) {
      return { text: `No course found matching '${courseName}'`, sources: [] };
    }

    const course = await this.catalog.getCourseMetadata(title);
    if (!course) {
      return { text: `Could not retrieve outline for '${title}'`, sources: [] };
    }

    return {
      text: formatOutline(course),
      sources: [{ text: course.title, url: course.courseLink }],
    };
  }
}

export function formatOutline(course: CourseMetadata): string {
  const lines = [`Course: ${course.title}`];
  if (course.courseLink) lines.push(`Course Link: ${course.courseLink}`);
  if (course.instructor) lines.push(`Instructor: ${course.instructor}`);
  lines.push(`Total Lessons: ${course.lessonCount}`);

  const lessons = [...course.lessons].sort((a, b) => a.lessonNumber - b.lessonNumber);
  for (const lesson of lessons) {
    const link = lesson.lessonLink ? ` - ${lesson.lessonLink}` : '';
    lines.push(`${lesson.lessonNumber}. ${lesson.lessonTitle}${link}`);
  }

  return lines.join('\n');
}

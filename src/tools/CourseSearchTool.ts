/**
 * search_course_content: semantic search over course material with
 * optional course and lesson filters.
 */

import type { ICourseLinks, ICourseRetriever } from '../services/ICourseSearch.js';
import type { ToolDefinition } from '../types/llm.js';
import type { SearchResults, Source } from '../types/models.js';
import { validateFields } from '../validation/fields.js';
import type { ITool, ToolOutcome } from './ITool.js';

export const COURSE_SEARCH_TOOL: ToolDefinition = {
  name: 'search_course_content',
  description: 'Search course materials with smart course name matching and lesson filtering',
  inputSchema: {
    query: {
      type: 'string',
      required: true,
      description: 'What to search for in the course content',
    },
    course_name: {
      type: 'string',
      description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
    },
    lesson_number: {
      type: 'integer',
      description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
    },
  },
};

export class CourseSearchTool implements ITool {
  readonly definition = COURSE_SEARCH_TOOL;

  constructor(
    private readonly retriever: ICourseRetriever,
    private readonly links: ICourseLinks
  ) {}

  async execute(args: Record<string, unknown>): Promise<ToolOutcome> {
    const errors = validateFields(args, this.definition.inputSchema);
    if (errors.length > 0) {
      return { text: `Invalid arguments for ${this.definition.name}: ${errors.join('; ')}`, sources: [] };
    }

    const query = String(args.query);
    const courseName = typeof args.course_name === 'string' ? args.course_name : undefined;
    const lessonNumber = typeof args.lesson_number === 'number' ? args.lesson_number : undefined;

    const results = await this.retriever.search({ query, courseName, lessonNumber });

    if (results.error) {
      return { text: results.error, sources: [] };
    }

    if (results.documents.length === 0) {
      let filterInfo = '';
      if (courseName) filterInfo += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
      return { text: `No relevant content found${filterInfo}.`, sources: [] };
    }

    return this.formatResults(results);
  }

  private async formatResults(results: SearchResults): Promise<ToolOutcome> {
    // One link lookup per cited label, shared by all of its hits
    const links = new Map<string, Promise<string | null>>();

    const blocks: string[] = [];
    const sources: Source[] = [];

    for (let i = 0; i < results.documents.length; i++) {
      const meta = results.metadata[i];
      const label =
        meta.lessonNumber === null
          ? meta.courseTitle
          : `${meta.courseTitle} - Lesson ${meta.lessonNumber}`;

      let url = links.get(label);
      if (!url) {
        url = this.linkFor(meta.courseTitle, meta.lessonNumber);
        links.set(label, url);
      }

      blocks.push(`[${label}]\n${results.documents[i]}`);
      sources.push({ text: label, url: await url });
    }

    return { text: blocks.join('\n\n'), sources };
  }

  /** Lesson link when the lesson has one, otherwise the course link. */
  private async linkFor(courseTitle: string, lessonNumber: number | null): Promise<string | null> {
    if (lessonNumber !== null) {
      const lessonLink = await this.links.getLessonLink(courseTitle, lessonNumber);
      if (lessonLink) return lessonLink;
    }
    return this.links.getCourseLink(courseTitle);
  }
}

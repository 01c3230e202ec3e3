/**
 * Semantic search over course chunks.
 * Embeds the query, resolves fuzzy course names against the catalog, and
 * returns ranked excerpts. Retrieval failures are reported in-band as
 * `SearchResults.error` so the tool layer can hand them to the model as text.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ICourseRepository } from '../repositories/ICourseRepository.js';
import type { Course, CourseMetadata, SearchResults } from '../types/models.js';
import type { ICourseCatalog, ICourseLinks, ICourseRetriever, SearchParams } from './ICourseSearch.js';

const DEFAULT_MAX_RESULTS = 5;

export class CourseSearchService implements ICourseRetriever, ICourseCatalog, ICourseLinks {
  constructor(
    private readonly courseRepo: ICourseRepository,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider,
    private readonly maxResults: number = DEFAULT_MAX_RESULTS
  ) {}

  async search(params: SearchParams): Promise<SearchResults> {
    try {
      let courseTitle: string | undefined;
      if (params.courseName) {
        const resolved = await this.matchTitle(params.courseName);
        if (!resolved) {
          return emptyResults(`No course found matching '${params.courseName}'`);
        }
        courseTitle = resolved;
      }

      const embedding = await this.embeddingProvider.generate(params.query);
      const rows = await this.courseRepo.searchChunks(embedding, {
        maxResults: params.limit ?? this.maxResults,
        courseTitle,
        lessonNumber: params.lessonNumber,
      });

      return {
        documents: rows.map((row) => row.content),
        metadata: rows.map((row) => ({
          courseTitle: row.course_title,
          lessonNumber: row.lesson_number,
          chunkIndex: row.chunk_index,
        })),
        distances: rows.map((row) => row.distance),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logProvider.error('Course search failed', { query: params.query, error: message });
      return emptyResults(`Search error: ${message}`);
    }
  }

  async resolveCourseName(courseName: string): Promise<string | null> {
    try {
      return await this.matchTitle(courseName);
    } catch (err) {
      this.logProvider.warn('Course name resolution failed', {
        courseName,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  async getCourseMetadata(title: string): Promise<CourseMetadata | null> {
    try {
      const course = await this.courseRepo.findCourse(title);
      return course ? toMetadata(course) : null;
    } catch (err) {
      this.logProvider.warn('Course metadata lookup failed', {
        title,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  async getCourseLink(title: string): Promise<string | null> {
    const course = await this.getCourseMetadata(title);
    return course?.courseLink ?? null;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | null> {
    const course = await this.getCourseMetadata(title);
    const lesson = course?.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  async listCourseTitles(): Promise<string[]> {
    return this.courseRepo.listCourseTitles();
  }

  async countCourses(): Promise<number> {
    return this.courseRepo.countCourses();
  }

  // ── Private ──

  private async matchTitle(courseName: string): Promise<string | null> {
    const embedding = await this.embeddingProvider.generate(courseName);
    const match = await this.courseRepo.matchCourseTitle(embedding);
    return match?.title ?? null;
  }
}

function emptyResults(error: string): SearchResults {
  return { documents: [], metadata: [], distances: [], error };
}

function toMetadata(course: Course): CourseMetadata {
  const lessons = [...course.lessons]
    .sort((a, b) => a.lessonNumber - b.lessonNumber)
    .map((lesson) => ({
      lessonNumber: lesson.lessonNumber,
      lessonTitle: lesson.title,
      lessonLink: lesson.lessonLink,
    }));

  return {
    title: course.title,
    courseLink: course.courseLink,
    instructor: course.instructor,
    lessonCount: lessons.length,
    lessons,
  };
}

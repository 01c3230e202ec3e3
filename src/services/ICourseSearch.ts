/**
 * Collaborator contracts the course tools depend on.
 * CourseSearchService implements both; tests substitute fakes.
 */

import type { CourseMetadata, SearchResults } from '../types/models.js';

export interface SearchParams {
  query: string;
  /** Fuzzy course name, resolved to a catalog title before filtering. */
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface ICourseRetriever {
  /** Never rejects: failures come back as `SearchResults.error`. */
  search(params: SearchParams): Promise<SearchResults>;
}

export interface ICourseCatalog {
  resolveCourseName(courseName: string): Promise<string | null>;
  getCourseMetadata(title: string): Promise<CourseMetadata | null>;
}

export interface ICourseLinks {
  getCourseLink(title: string): Promise<string | null>;
  /** Null when the lesson is unknown or has no link of its own. */
  getLessonLink(title: string, lessonNumber: number): Promise<string | null>;
}

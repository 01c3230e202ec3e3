/**
 * Course catalog and chunk storage interface.
 * Implementations own vector similarity; callers pass precomputed embeddings.
 */

import type { Course, CourseChunk } from '../types/models.js';
import type { ScoredChunkRow, ScoredCourseTitleRow } from '../types/database.js';

export interface ChunkSearchOptions {
  maxResults: number;
  courseTitle?: string;
  lessonNumber?: number;
}

export interface ICourseRepository {
  /** Insert or replace a course's catalog entry. */
  upsertCourse(course: Course, titleEmbedding: number[]): Promise<void>;

  /** Write chunks, replacing any stored chunk with the same course and index. */
  insertChunks(chunks: CourseChunk[], embeddings: number[][]): Promise<void>;

  /** Remove every chunk of one course. */
  deleteChunks(courseTitle: string): Promise<void>;

  /** Remove a course and its chunks. */
  deleteCourse(title: string): Promise<void>;

  /** Nearest chunks, closest first. */
  searchChunks(embedding: number[], options: ChunkSearchOptions): Promise<ScoredChunkRow[]>;

  /** Closest course title to a query embedding, or null when the catalog is empty. */
  matchCourseTitle(embedding: number[]): Promise<ScoredCourseTitleRow | null>;

  findCourse(title: string): Promise<Course | null>;

  listCourseTitles(): Promise<string[]>;

  countCourses(): Promise<number>;

  /** Remove every course and chunk. */
  clearAll(): Promise<void>;
}

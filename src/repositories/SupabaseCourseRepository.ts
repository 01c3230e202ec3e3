/**
 * Supabase implementation of ICourseRepository.
 * Uses pgvector for semantic similarity search (see supabase/migrations).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ChunkSearchOptions, ICourseRepository } from './ICourseRepository.js';
import type {
  CourseRow,
  LessonJson,
  ScoredChunkRow,
  ScoredCourseTitleRow,
} from '../types/database.js';
import type { Course, CourseChunk } from '../types/models.js';

const INSERT_BATCH_SIZE = 500;

export class SupabaseCourseRepository implements ICourseRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsertCourse(course: Course, titleEmbedding: number[]): Promise<void> {
    const lessons: LessonJson[] = course.lessons.map((lesson) => ({
      lesson_number: lesson.lessonNumber,
      lesson_title: lesson.title,
      lesson_link: lesson.lessonLink,
    }));

    const { error } = await this.db.from('courses').upsert(
      {
        title: course.title,
        instructor: course.instructor,
        course_link: course.courseLink,
        lessons,
        lesson_count: lessons.length,
        embedding: JSON.stringify(titleEmbedding),
      },
      { onConflict: 'title' }
    );

    if (error) throw new Error(`Failed to upsert course: ${error.message}`);
  }

  async insertChunks(chunks: CourseChunk[], embeddings: number[][]): Promise<void> {
    if (chunks.length !== embeddings.length) {
      throw new Error(
        `Chunk/embedding count mismatch: ${chunks.length} chunks, ${embeddings.length} embeddings`
      );
    }

    for (let i = 0; i < chunks.length; i += INSERT_BATCH_SIZE) {
      const rows = chunks.slice(i, i + INSERT_BATCH_SIZE).map((chunk, offset) => ({
        course_title: chunk.courseTitle,
        lesson_number: chunk.lessonNumber,
        chunk_index: chunk.chunkIndex,
        content: chunk.content,
        embedding: JSON.stringify(embeddings[i + offset]),
      }));

      const { error } = await this.db
        .from('course_chunks')
        .upsert(rows, { onConflict: 'course_title,chunk_index' });
      if (error) throw new Error(`Failed to insert course chunks: ${error.message}`);
    }
  }

  async deleteChunks(courseTitle: string): Promise<void> {
    const { error } = await this.db.from('course_chunks').delete().eq('course_title', courseTitle);
    if (error) throw new Error(`Failed to delete course chunks: ${error.message}`);
  }

  async deleteCourse(title: string): Promise<void> {
    const { error } = await this.db.from('courses').delete().eq('title', title);
    if (error) throw new Error(`Failed to delete course: ${error.message}`);
  }

  async searchChunks(
    embedding: number[],
    options: ChunkSearchOptions
  ): Promise<ScoredChunkRow[]> {
    const { data, error } = await this.db.rpc('match_course_chunks', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.maxResults,
      filter_course_title: options.courseTitle ?? null,
      filter_lesson_number: options.lessonNumber ?? null,
    });

    if (error) throw new Error(`Failed to search course chunks: ${error.message}`);
    return (data ?? []) as ScoredChunkRow[];
  }

  async matchCourseTitle(embedding: number[]): Promise<ScoredCourseTitleRow | null> {
    const { data, error } = await this.db.rpc('match_course_title', {
      query_embedding: JSON.stringify(embedding),
      match_count: 1,
    });

    if (error) throw new Error(`Failed to match course title: ${error.message}`);
    const rows = (data ?? []) as ScoredCourseTitleRow[];
    return rows[0] ?? null;
  }

  async findCourse(title: string): Promise<Course | null> {
    const { data, error } = await this.db
      .from('courses')
      .select('title, instructor, course_link, lessons')
      .eq('title', title)
      .maybeSingle();

    if (error) throw new Error(`Failed to find course: ${error.message}`);
    if (!data) return null;

    const row = data as Pick<CourseRow, 'title' | 'instructor' | 'course_link' | 'lessons'>;
    return {
      title: row.title,
      instructor: row.instructor,
      courseLink: row.course_link,
      lessons: (row.lessons ?? []).map((lesson) => ({
        lessonNumber: lesson.lesson_number,
        title: lesson.lesson_title,
        lessonLink: lesson.lesson_link,
      })),
    };
  }

  async listCourseTitles(): Promise<string[]> {
    const { data, error } = await this.db
      .from('courses')
      .select('title')
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list courses: ${error.message}`);
    return ((data ?? []) as Array<Pick<CourseRow, 'title'>>).map((row) => row.title);
  }

  async countCourses(): Promise<number> {
    const { count, error } = await this.db
      .from('courses')
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count courses: ${error.message}`);
    return count ?? 0;
  }

  async clearAll(): Promise<void> {
    // Chunks cascade from courses
    const { error } = await this.db.from('courses').delete().neq('title', '');
    if (error) throw new Error(`Failed to clear courses: ${error.message}`);
  }
}

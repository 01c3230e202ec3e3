/**
 * Database row types: mirror the Supabase table schemas in
 * supabase/migrations. Column names use snake_case to match PostgreSQL.
 */

export interface LessonJson {
  lesson_number: number;
  lesson_title: string;
  lesson_link: string | null;
}

export interface CourseRow {
  title: string;
  instructor: string | null;
  course_link: string | null;
  lessons: LessonJson[];
  lesson_count: number;
  embedding: string; // pgvector serialized
  created_at: string;
}

export interface CourseChunkRow {
  id: number;
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
  content: string;
  embedding: string; // pgvector serialized
  created_at: string;
}

/** Row returned by the match_course_chunks RPC. */
export interface ScoredChunkRow {
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
  content: string;
  distance: number;
}

/** Row returned by the match_course_title RPC. */
export interface ScoredCourseTitleRow {
  title: string;
  distance: number;
}

/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Course Content ──

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink: string | null;
}

export interface Course {
  /** Unique; doubles as the course identifier. */
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  /** Position of the chunk within its source document. */
  chunkIndex: number;
}

/** Outline view of a course, as returned by the metadata lookup. */
export interface CourseMetadata {
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessonCount: number;
  lessons: Array<{
    lessonNumber: number;
    lessonTitle: string;
    lessonLink: string | null;
  }>;
}

// ── Retrieval ──

export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
}

/**
 * Ranked retrieval hits, parallel arrays in relevance order.
 * When `error` is set the arrays are empty.
 */
export interface SearchResults {
  documents: string[];
  metadata: ChunkMetadata[];
  distances: number[];
  error?: string;
}

// ── Citations & Conversation ──

/** A citation surfaced next to an answer. */
export interface Source {
  text: string;
  url: string | null;
}

export interface Exchange {
  readonly query: string;
  readonly answer: string;
}

/**
 * In-memory mock for ICourseRepository.
 * Stores courses in a Map, simulates pgvector search with cosine distance.
 */

import type { ChunkSearchOptions, ICourseRepository } from '../../src/repositories/ICourseRepository.js';
import type { ScoredChunkRow, ScoredCourseTitleRow } from '../../src/types/database.js';
import type { Course, CourseChunk } from '../../src/types/models.js';

interface StoredChunk {
  chunk: CourseChunk;
  embedding: number[];
}

export class MockCourseRepository implements ICourseRepository {
  private courses = new Map<string, { course: Course; embedding: number[] }>();
  private chunks: StoredChunk[] = [];
  public failWith: Error | null = null;
  public failInsertWith: Error | null = null;

  async upsertCourse(course: Course, titleEmbedding: number[]): Promise<void> {
    // Map keeps first-insert order, like created_at ordering
    this.courses.set(course.title, { course, embedding: titleEmbedding });
  }

  async insertChunks(chunks: CourseChunk[], embeddings: number[][]): Promise<void> {
    if (this.failInsertWith) throw this.failInsertWith;
    chunks.forEach((chunk, i) => {
      // Unique on (course_title, chunk_index)
      const stored = { chunk, embedding: embeddings[i] ?? [] };
      const existing = this.chunks.findIndex(
        (c) => c.chunk.courseTitle === chunk.courseTitle && c.chunk.chunkIndex === chunk.chunkIndex
      );
      if (existing === -1) this.chunks.push(stored);
      else this.chunks[existing] = stored;
    });
  }

  async deleteChunks(courseTitle: string): Promise<void> {
    this.chunks = this.chunks.filter(({ chunk }) => chunk.courseTitle !== courseTitle);
  }

  async deleteCourse(title: string): Promise<void> {
    this.courses.delete(title);
    await this.deleteChunks(title);
  }

  async searchChunks(embedding: number[], options: ChunkSearchOptions): Promise<ScoredChunkRow[]> {
    if (this.failWith) throw this.failWith;

    return this.chunks
      .filter(({ chunk }) => options.courseTitle === undefined || chunk.courseTitle === options.courseTitle)
      .filter(({ chunk }) => options.lessonNumber === undefined || chunk.lessonNumber === options.lessonNumber)
      .map(({ chunk, embedding: stored }) => ({
        course_title: chunk.courseTitle,
        lesson_number: chunk.lessonNumber,
        chunk_index: chunk.chunkIndex,
        content: chunk.content,
        distance: cosineDistance(embedding, stored),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, options.maxResults);
  }

  async matchCourseTitle(embedding: number[]): Promise<ScoredCourseTitleRow | null> {
    if (this.failWith) throw this.failWith;

    let best: ScoredCourseTitleRow | null = null;
    for (const { course, embedding: stored } of this.courses.values()) {
      const distance = cosineDistance(embedding, stored);
      if (!best || distance < best.distance) {
        best = { title: course.title, distance };
      }
    }
    return best;
  }

  async findCourse(title: string): Promise<Course | null> {
    if (this.failWith) throw this.failWith;
    return this.courses.get(title)?.course ?? null;
  }

  async listCourseTitles(): Promise<string[]> {
    return [...this.courses.keys()];
  }

  async countCourses(): Promise<number> {
    return this.courses.size;
  }

  async clearAll(): Promise<void> {
    this.courses.clear();
    this.chunks = [];
  }

  // ── Test Helpers ──

  get chunkCount(): number {
    return this.chunks.length;
  }

  storedChunks(): CourseChunk[] {
    return this.chunks.map(({ chunk }) => chunk);
  }
}

function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Loads course documents into the course repository.
 * A document that fails to parse or store is logged and skipped; it never
 * stops the rest of a folder from loading.
 */

import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ICourseRepository } from '../repositories/ICourseRepository.js';
import type { Course } from '../types/models.js';
import type { DocumentProcessor, ProcessedDocument } from './DocumentProcessor.js';

export const COURSE_FILE_EXTENSIONS = ['.txt', '.md'];

export interface AddDocumentResult {
  course: Course | null;
  chunkCount: number;
}

export interface AddFolderResult {
  courseCount: number;
  chunkCount: number;
}

export class IngestionService {
  constructor(
    private readonly processor: Pick<DocumentProcessor, 'processCourseDocument'>,
    private readonly courseRepo: ICourseRepository,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider
  ) {}

  async addDocument(path: string): Promise<AddDocumentResult> {
    try {
      const document = await this.processor.processCourseDocument(path);
      await this.store(document);
      this.logProvider.info('Added course document', {
        path,
        course: document.course.title,
        chunks: document.chunks.length,
      });
      return { course: document.course, chunkCount: document.chunks.length };
    } catch (err) {
      this.logProvider.error('Error processing course document', {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
      return { course: null, chunkCount: 0 };
    }
  }

  /**
   * Load every course file in `folder`. Courses whose title is already stored
   * are skipped unless `clearExisting` wipes the repository first.
   */
  async addFolder(folder: string, clearExisting = false): Promise<AddFolderResult> {
    if (!(await isDirectory(folder))) {
      this.logProvider.warn('Course folder does not exist', { folder });
      return { courseCount: 0, chunkCount: 0 };
    }

    if (clearExisting) {
      this.logProvider.info('Clearing existing course data');
      await this.courseRepo.clearAll();
    }

    const existing = new Set(await this.courseRepo.listCourseTitles());
    const files = (await readdir(folder))
      .filter((name) => COURSE_FILE_EXTENSIONS.includes(extname(name).toLowerCase()))
      .sort();

    let courseCount = 0;
    let chunkCount = 0;

    for (const name of files) {
      const path = join(folder, name);
      if (!(await isFile(path))) continue;

      let document: ProcessedDocument;
      try {
        document = await this.processor.processCourseDocument(path);
      } catch (err) {
        this.logProvider.error('Error processing course document', {
          path,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      if (existing.has(document.course.title)) {
        this.logProvider.info('Course already exists, skipping', { course: document.course.title });
        continue;
      }

      try {
        await this.store(document);
      } catch (err) {
        this.logProvider.error('Error storing course document', {
          path,
          course: document.course.title,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      existing.add(document.course.title);
      courseCount++;
      chunkCount += document.chunks.length;
      this.logProvider.info('Added new course', {
        course: document.course.title,
        chunks: document.chunks.length,
      });
    }

    return { courseCount, chunkCount };
  }

  /**
   * Embeddings are computed before anything is written. A course whose chunks
   * fail to store is removed again, so a later folder load retries it.
   */
  private async store(document: ProcessedDocument): Promise<void> {
    const { course, chunks } = document;
    const titleEmbedding = await this.embeddingProvider.generate(course.title);
    const embeddings =
      chunks.length > 0
        ? await this.embeddingProvider.generateBatch(chunks.map((chunk) => chunk.content))
        : [];

    await this.courseRepo.upsertCourse(course, titleEmbedding);
    try {
      await this.courseRepo.deleteChunks(course.title);
      if (chunks.length > 0) {
        await this.courseRepo.insertChunks(chunks, embeddings);
      }
    } catch (err) {
      await this.courseRepo.deleteCourse(course.title);
      throw err;
    }
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Parses course documents into a Course plus text chunks.
 *
 * Expected layout:
 *   Course Title: <title>
 *   Course Link: <url>
 *   Course Instructor: <name>
 *
 *   Lesson 0: <lesson title>
 *   Lesson Link: <url>
 *   <lesson text…>
 */

import { readFile } from 'node:fs/promises';
import type { Course, CourseChunk, Lesson } from '../types/models.js';

export interface ProcessedDocument {
  course: Course;
  chunks: CourseChunk[];
}

const TITLE_RE = /^Course Title:\s*(.+)$/i;
const LINK_RE = /^Course Link:\s*(.+)$/i;
const INSTRUCTOR_RE = /^Course Instructor:\s*(.+)$/i;
const LESSON_RE = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK_RE = /^Lesson Link:\s*(.+)$/i;

export class DocumentProcessor {
  constructor(
    private readonly chunkSize: number = 800,
    private readonly chunkOverlap: number = 100
  ) {}

  async processCourseDocument(path: string): Promise<ProcessedDocument> {
    const text = await readFile(path, 'utf-8');
    return this.parse(text);
  }

  parse(text: string): ProcessedDocument {
    const lines = text.replace(/\r\n?/g, '\n').split('\n');
    let cursor = 0;

    const header: { title: string | null; link: string | null; instructor: string | null } = {
      title: null,
      link: null,
      instructor: null,
    };

    // Header lines come first; the first blank-or-other line ends the header
    for (; cursor < Math.min(lines.length, 4); cursor++) {
      const line = lines[cursor].trim();
      const title = TITLE_RE.exec(line);
      const link = LINK_RE.exec(line);
      const instructor = INSTRUCTOR_RE.exec(line);
      if (title) header.title = title[1].trim();
      else if (link) header.link = link[1].trim();
      else if (instructor) header.instructor = instructor[1].trim();
      else if (line === '' && cursor === 0) continue;
      else break;
    }

    let titleLine = header.title;
    if (!titleLine) {
      // No title header: the first non-blank line is the title
      const titleIndex = lines.findIndex((l) => l.trim() !== '');
      if (titleIndex === -1) {
        throw new Error('Document is empty');
      }
      titleLine = lines[titleIndex].trim();
      cursor = Math.max(cursor, titleIndex + 1);
    }
    const courseTitle: string = titleLine;

    const lessons: Lesson[] = [];
    const chunks: CourseChunk[] = [];
    let current: { lesson: Lesson; body: string[] } | null = null;
    const preamble: string[] = [];

    const flush = (): void => {
      if (current) {
        this.appendChunks(chunks, courseTitle, current.lesson.lessonNumber, current.body.join('\n'));
      }
    };

    for (let i = cursor; i < lines.length; i++) {
      const line = lines[i];
      const lessonMatch = LESSON_RE.exec(line.trim());

      if (lessonMatch) {
        flush();
        const lesson: Lesson = {
          lessonNumber: Number(lessonMatch[1]),
          title: lessonMatch[2].trim(),
          lessonLink: null,
        };
        const linkMatch = i + 1 < lines.length ? LESSON_LINK_RE.exec(lines[i + 1].trim()) : null;
        if (linkMatch) {
          lesson.lessonLink = linkMatch[1].trim();
          i++;
        }
        lessons.push(lesson);
        current = { lesson, body: [] };
        continue;
      }

      if (current) current.body.push(line);
      else preamble.push(line);
    }
    flush();

    // No lesson markers: the whole body is course-level content
    if (lessons.length === 0) {
      this.appendChunks(chunks, courseTitle, null, preamble.join('\n'));
    }

    return {
      course: {
        title: courseTitle,
        courseLink: header.link,
        instructor: header.instructor,
        lessons,
      },
      chunks,
    };
  }

  /**
   * Split into sentence-aligned chunks of at most `chunkSize` characters.
   * Each chunk after the first starts with trailing sentences of the previous
   * chunk totalling at most `chunkOverlap` characters.
   */
  chunkText(text: string): string[] {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (normalized === '') return [];

    const sentences = splitSentences(normalized).flatMap((s) => this.hardWrap(s));
    const chunks: string[] = [];
    let start = 0;

    while (start < sentences.length) {
      let size = 0;
      let end = start;
      while (end < sentences.length) {
        const added = sentences[end].length + (end > start ? 1 : 0);
        if (size + added > this.chunkSize && end > start) break;
        size += added;
        end++;
      }
      chunks.push(sentences.slice(start, end).join(' '));
      if (end >= sentences.length) break;

      // Walk back over whole sentences that fit in the overlap budget,
      // leaving room for at least one new sentence in the next chunk
      let overlap = 0;
      let next = end;
      const following = sentences[end].length;
      while (next > start + 1) {
        const len = sentences[next - 1].length + 1;
        if (overlap + len > this.chunkOverlap) break;
        if (overlap + len + following > this.chunkSize) break;
        overlap += len;
        next--;
      }
      start = next;
    }

    return chunks;
  }

  private appendChunks(
    chunks: CourseChunk[],
    courseTitle: string,
    lessonNumber: number | null,
    body: string
  ): void {
    this.chunkText(body).forEach((content, i) => {
      chunks.push({
        content: i === 0 && lessonNumber !== null ? `Lesson ${lessonNumber} content: ${content}` : content,
        courseTitle,
        lessonNumber,
        chunkIndex: chunks.length,
      });
    });
  }

  /** Sentences longer than a chunk are cut at word boundaries. */
  private hardWrap(sentence: string): string[] {
    if (sentence.length <= this.chunkSize) return [sentence];

    const pieces: string[] = [];
    let piece = '';
    for (const word of sentence.split(' ')) {
      const candidate = piece ? `${piece} ${word}` : word;
      if (candidate.length > this.chunkSize && piece) {
        pieces.push(piece);
        piece = word;
      } else {
        piece = candidate;
      }
    }
    if (piece) pieces.push(piece);
    return pieces;
  }
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+(?=[A-Z0-9"'(\[])/)
    .map((s) => s.trim())
    .filter(Boolean);
}

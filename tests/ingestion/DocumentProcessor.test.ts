import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DocumentProcessor, splitSentences } from '../../src/ingestion/DocumentProcessor.js';

const COURSE_DOC = [
  'Course Title: Building Towards Computer Use',
  'Course Link: https://example.com/cu',
  'Course Instructor: Colt Steele',
  '',
  'Lesson 0: Introduction',
  'Lesson Link: https://example.com/cu/0',
  'Welcome to the course. We will build agents.',
  'Lesson 1: Tools',
  'Tools let models act.',
  '',
].join('\n');

describe('DocumentProcessor', () => {
  describe('parse', () => {
    it('should read the course header and lessons', () => {
      const { course } = new DocumentProcessor().parse(COURSE_DOC);

      expect(course).toEqual({
        title: 'Building Towards Computer Use',
        courseLink: 'https://example.com/cu',
        instructor: 'Colt Steele',
        lessons: [
          { lessonNumber: 0, title: 'Introduction', lessonLink: 'https://example.com/cu/0' },
          { lessonNumber: 1, title: 'Tools', lessonLink: null },
        ],
      });
    });

    it('should prefix the first chunk of each lesson and number chunks globally', () => {
      const { chunks } = new DocumentProcessor().parse(COURSE_DOC);

      expect(chunks).toEqual([
        {
          content: 'Lesson 0 content: Welcome to the course. We will build agents.',
          courseTitle: 'Building Towards Computer Use',
          lessonNumber: 0,
          chunkIndex: 0,
        },
        {
          content: 'Lesson 1 content: Tools let models act.',
          courseTitle: 'Building Towards Computer Use',
          lessonNumber: 1,
          chunkIndex: 1,
        },
      ]);
    });

    it('should accept Windows line endings', () => {
      const { course } = new DocumentProcessor().parse(COURSE_DOC.replace(/\n/g, '\r\n'));

      expect(course.title).toBe('Building Towards Computer Use');
      expect(course.lessons).toHaveLength(2);
    });

    it('should fall back to the first line as title and chunk the body without lessons', () => {
      const { course, chunks } = new DocumentProcessor().parse(
        'Just a Title\nSome body text. More text.'
      );

      expect(course).toEqual({ title: 'Just a Title', courseLink: null, instructor: null, lessons: [] });
      expect(chunks).toEqual([
        { content: 'Some body text. More text.', courseTitle: 'Just a Title', lessonNumber: null, chunkIndex: 0 },
      ]);
    });

    it('should reject an empty document', () => {
      expect(() => new DocumentProcessor().parse('\n  \n')).toThrow('Document is empty');
    });
  });

  describe('chunkText', () => {
    const text = 'One two three. Four five six. Seven eight nine. Ten.';

    it('should pack whole sentences up to the chunk size', () => {
      const processor = new DocumentProcessor(30, 12);

      expect(processor.chunkText(text)).toEqual([
        'One two three. Four five six.',
        'Seven eight nine. Ten.',
      ]);
    });

    it('should repeat trailing sentences within the overlap budget', () => {
      const processor = new DocumentProcessor(40, 16);

      expect(processor.chunkText(text)).toEqual([
        'One two three. Four five six.',
        'Four five six. Seven eight nine. Ten.',
      ]);
    });

    it('should cut sentences longer than a chunk at word boundaries', () => {
      const processor = new DocumentProcessor(10, 0);

      expect(processor.chunkText('abcdefgh ijklmnop qrs')).toEqual(['abcdefgh', 'ijklmnop', 'qrs']);
    });

    it('should collapse whitespace and skip blank text', () => {
      const processor = new DocumentProcessor();

      expect(processor.chunkText('  A   b.\n\nC  d.  ')).toEqual(['A b. C d.']);
      expect(processor.chunkText('   ')).toEqual([]);
    });
  });

  describe('processCourseDocument', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'course-doc-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read and parse a file', async () => {
      const path = join(dir, 'course1.txt');
      await writeFile(path, COURSE_DOC, 'utf-8');

      const { course, chunks } = await new DocumentProcessor().processCourseDocument(path);

      expect(course.title).toBe('Building Towards Computer Use');
      expect(chunks).toHaveLength(2);
    });

    it('should reject a missing file', async () => {
      await expect(
        new DocumentProcessor().processCourseDocument(join(dir, 'missing.txt'))
      ).rejects.toThrow();
    });
  });
});

describe('splitSentences', () => {
  it('should split only before capitalised sentence starts', () => {
    expect(splitSentences('Hello world. this stays. Next one! And? yes')).toEqual([
      'Hello world. this stays.',
      'Next one!',
      'And? yes',
    ]);
  });
});

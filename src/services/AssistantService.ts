/**
 * Course assistant: answers questions over the course catalog.
 * Composes conversation history, the tool registry and the generation loop,
 * and fronts ingestion and catalog analytics for the API layer.
 */

import type { IngestionService, AddDocumentResult, AddFolderResult } from '../ingestion/IngestionService.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ConversationStore } from '../stores/ConversationStore.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';
import type { Source } from '../types/models.js';
import type { CourseSearchService } from './CourseSearchService.js';
import type { GenerationService } from './GenerationService.js';

export interface AnswerResult {
  answer: string;
  sources: Source[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export function buildPrompt(query: string): string {
  return `Answer this question about course materials: ${query}`;
}

export class AssistantService {
  constructor(
    private readonly generation: GenerationService,
    private readonly tools: ToolRegistry,
    private readonly conversations: ConversationStore,
    private readonly courseSearch: Pick<CourseSearchService, 'countCourses' | 'listCourseTitles'>,
    private readonly ingestion: Pick<IngestionService, 'addDocument' | 'addFolder'>,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Answer one query. The exchange is recorded only after generation
   * succeeds; this query's sources are cleared either way.
   */
  async answer(query: string, sessionId?: string): Promise<AnswerResult> {
    const history = sessionId ? this.conversations.historyText(sessionId) : null;
    const run = this.tools.openRun();

    let answer: string;
    let sources: Source[];
    try {
      answer = await this.generation.generate({
        query: buildPrompt(query),
        history,
        tools: this.tools.definitions(),
        dispatch: run.dispatch,
      });
      sources = run.drainSources();
    } finally {
      run.clearSources();
    }

    if (sessionId) {
      this.conversations.record(sessionId, query, answer);
    }

    this.logProvider.debug('Answered query', { sessionId, sources: sources.length });
    return { answer, sources };
  }

  newSession(): string {
    return this.conversations.newSessionId();
  }

  clearSession(sessionId: string): void {
    this.conversations.clear(sessionId);
  }

  async analytics(): Promise<CourseAnalytics> {
    const [totalCourses, courseTitles] = await Promise.all([
      this.courseSearch.countCourses(),
      this.courseSearch.listCourseTitles(),
    ]);
    return { totalCourses, courseTitles };
  }

  addDocument(path: string): Promise<AddDocumentResult> {
    return this.ingestion.addDocument(path);
  }

  addFolder(path: string, clearExisting = false): Promise<AddFolderResult> {
    return this.ingestion.addFolder(path, clearExisting);
  }
}

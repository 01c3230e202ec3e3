/**
 * Dependency wiring.
 * Constructs all services from injected repositories and providers.
 * Production passes Supabase + OpenAI implementations; tests pass mocks.
 */

import { DEFAULT_CONFIG, type AppConfig } from './config.js';
import { DocumentProcessor } from './ingestion/DocumentProcessor.js';
import { IngestionService } from './ingestion/IngestionService.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import type { Middleware } from './middleware/pipeline.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILanguageModel } from './providers/ILanguageModel.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ICourseRepository } from './repositories/ICourseRepository.js';
import { AssistantService } from './services/AssistantService.js';
import { CourseSearchService } from './services/CourseSearchService.js';
import { GenerationService } from './services/GenerationService.js';
import { ConversationStore } from './stores/ConversationStore.js';
import { CourseOutlineTool } from './tools/CourseOutlineTool.js';
import { CourseSearchTool } from './tools/CourseSearchTool.js';
import { ToolRegistry } from './tools/ToolRegistry.js';

export interface Container {
  config: AppConfig;
  assistantService: AssistantService;
  courseSearchService: CourseSearchService;
  generationService: GenerationService;
  ingestionService: IngestionService;
  toolRegistry: ToolRegistry;
  conversations: ConversationStore;
  logProvider: ILogProvider;
  logging: Middleware;
  errors: Middleware;
}

export function createContainer(deps: {
  courseRepo: ICourseRepository;
  embeddingProvider: IEmbeddingProvider;
  languageModel: ILanguageModel;
  logProvider: ILogProvider;
  config?: Partial<AppConfig>;
}): Container {
  const config: AppConfig = { ...DEFAULT_CONFIG, ...deps.config };

  const courseSearchService = new CourseSearchService(
    deps.courseRepo,
    deps.embeddingProvider,
    deps.logProvider,
    config.maxResults
  );

  const toolRegistry = new ToolRegistry(deps.logProvider);
  toolRegistry.register(new CourseSearchTool(courseSearchService, courseSearchService));
  toolRegistry.register(new CourseOutlineTool(courseSearchService));

  const generationService = new GenerationService(
    deps.languageModel,
    deps.logProvider,
    config.maxToolRounds
  );
  const conversations = new ConversationStore(config.maxHistory);
  const ingestionService = new IngestionService(
    new DocumentProcessor(config.chunkSize, config.chunkOverlap),
    deps.courseRepo,
    deps.embeddingProvider,
    deps.logProvider
  );

  const assistantService = new AssistantService(
    generationService,
    toolRegistry,
    conversations,
    courseSearchService,
    ingestionService,
    deps.logProvider
  );

  return {
    config,
    assistantService,
    courseSearchService,
    generationService,
    ingestionService,
    toolRegistry,
    conversations,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errors: createErrorHandler(deps.logProvider),
  };
}

export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export type { ILanguageModel } from './ILanguageModel.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export { OpenAIChatModel } from './OpenAIChatModel.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';

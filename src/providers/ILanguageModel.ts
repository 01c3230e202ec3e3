/**
 * Language model provider interface.
 * One call = one model turn; tool execution happens outside the provider.
 */

import type { CompletionRequest, ModelResponse } from '../types/llm.js';

export interface ILanguageModel {
  complete(request: CompletionRequest): Promise<ModelResponse>;
}

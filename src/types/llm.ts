/**
 * Provider-neutral conversation model for language-model calls.
 * Providers translate these into their own wire formats.
 */

import type { BodySchema } from './common.js';

// ── Tools ──

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Readonly<BodySchema>;
}

export type ToolChoice = 'auto' | 'none';

// ── Content Blocks ──

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  /** Correlates the request with its tool_result. */
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
}

export type AssistantContent = TextBlock | ToolUseBlock;

// ── Messages ──

export type ChatMessage =
  | { role: 'user'; content: string | ToolResultBlock[] }
  | { role: 'assistant'; content: AssistantContent[] };

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

export interface ModelResponse {
  stopReason: StopReason;
  content: AssistantContent[];
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
}

/** Concatenated text of a response; empty when it holds only tool calls. */
export function responseText(response: ModelResponse): string {
  return response.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}

export function toolUses(response: ModelResponse): ToolUseBlock[] {
  return response.content.filter(
    (block): block is ToolUseBlock => block.type === 'tool_use'
  );
}

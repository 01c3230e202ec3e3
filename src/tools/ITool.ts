/**
 * Tool contract for model-invoked capabilities.
 * A tool returns its text together with the citations it produced, so
 * citation state lives with the request instead of on the tool instance.
 */

import type { ToolDefinition } from '../types/llm.js';
import type { Source } from '../types/models.js';

export interface ToolOutcome {
  text: string;
  sources: Source[];
}

export interface ITool {
  readonly definition: ToolDefinition;

  /**
   * Run with arguments supplied by the model. Implementations validate their
   * own arguments and report problems as text rather than rejecting.
   */
  execute(args: Record<string, unknown>): Promise<ToolOutcome>;
}

/** Executes a tool by name; always resolves to text for the model. */
export type ToolDispatcher = (name: string, args: Record<string, unknown>) => Promise<string>;

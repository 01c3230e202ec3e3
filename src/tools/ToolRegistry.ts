/**
 * Name → tool registry.
 * Exposes tool schemas to the model and a dispatcher that always resolves to text.
 *
 * Citations are held per ToolRun: each query opens its own run, so two
 * queries in flight on the same registry never see each other's sources.
 * The registry-level dispatch/drain/clear methods act on a default run.
 */

import { ConfigurationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ToolDefinition } from '../types/llm.js';
import type { Source } from '../types/models.js';
import type { ITool, ToolDispatcher } from './ITool.js';

export class ToolRun {
  /** Latest sources per tool name. */
  private readonly slots = new Map<string, Source[]>();

  constructor(
    private readonly tools: ReadonlyMap<string, ITool>,
    private readonly logProvider: ILogProvider
  ) {}

  readonly dispatch: ToolDispatcher = async (name, args) => {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logProvider.warn('Model requested unknown tool', { tool: name });
      return `Tool '${name}' not found`;
    }

    try {
      const outcome = await tool.execute(args);
      this.slots.set(name, outcome.sources);
      return outcome.text;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logProvider.error('Tool execution failed', { tool: name, error: message });
      return `Tool '${name}' failed: ${message}`;
    }
  };

  /** Sources from every tool's latest execution, in tool registration order. */
  drainSources(): Source[] {
    const sources: Source[] = [];
    for (const name of this.tools.keys()) {
      sources.push(...(this.slots.get(name) ?? []));
    }
    return sources;
  }

  clearSources(): void {
    this.slots.clear();
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, ITool>();
  private readonly defaultRun: ToolRun;

  constructor(private readonly logProvider: ILogProvider) {
    this.defaultRun = new ToolRun(this.tools, logProvider);
  }

  register(tool: ITool): void {
    const name = tool.definition.name;
    if (!name) {
      throw new ConfigurationError("Tool must have a 'name' in its definition");
    }
    this.tools.set(name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  /** A request-scoped view with its own source slots. */
  openRun(): ToolRun {
    return new ToolRun(this.tools, this.logProvider);
  }

  dispatch(name: string, args: Record<string, unknown> = {}): Promise<string> {
    return this.defaultRun.dispatch(name, args);
  }

  drainSources(): Source[] {
    return this.defaultRun.drainSources();
  }

  clearSources(): void {
    this.defaultRun.clearSources();
  }
}

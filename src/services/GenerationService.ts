/**
 * Tool-augmented answer generation.
 *
 * Each round is one model call; when the model asks for tools, every
 * requested call is dispatched in request order and the results go back as a
 * single user turn. After `maxRounds` tool rounds one last call is made with
 * tools withheld, so a query costs at most `maxRounds + 1` model calls.
 * Model-call failures propagate unchanged.
 */

import type { ILanguageModel } from '../providers/ILanguageModel.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ToolDispatcher } from '../tools/ITool.js';
import {
  responseText,
  toolUses,
  type ChatMessage,
  type ToolDefinition,
  type ToolResultBlock,
  type ToolUseBlock,
} from '../types/llm.js';

export const MAX_TOOL_ROUNDS = 2;

function systemPrompt(maxRounds: number): string {
  return `You are an assistant for course materials and educational content, with tools for looking up course information.

Tools:
- get_course_outline: course structure questions, such as which lessons a course has, how many, the course title, link and instructor. Returns the title, link, instructor and numbered lesson list.
- search_course_content: questions about concepts, topics or details taught in the lessons. Returns matching excerpts.

You may use tools over up to ${maxRounds} rounds. Use a second round only when the first result tells you what to look up next, for example reading an outline to find a lesson title and then searching that lesson's content.

Answering:
- General knowledge questions: answer directly without tools.
- Outline questions: use the outline tool, then give the course title, course link and the complete lesson list.
- Content questions: search first, then answer.
- If nothing relevant is found, say so plainly.
- Give the answer only. Do not describe your reasoning, the tools, or the search results as such.

Keep answers brief, accurate and educational, with an example when it helps understanding.`;
}

export interface GenerateInput {
  query: string;
  /** Rendered prior exchanges, appended to the system prompt when present. */
  history?: string | null;
  tools?: ToolDefinition[];
  dispatch?: ToolDispatcher;
}

export class GenerationService {
  constructor(
    private readonly model: ILanguageModel,
    private readonly logProvider: ILogProvider,
    private readonly maxRounds: number = MAX_TOOL_ROUNDS
  ) {}

  async generate(input: GenerateInput): Promise<string> {
    const system = buildSystemPrompt(input.history, this.maxRounds);
    const tools = input.tools && input.tools.length > 0 ? input.tools : undefined;
    const messages: ChatMessage[] = [{ role: 'user', content: input.query }];

    for (let round = 1; round <= this.maxRounds; round++) {
      const response = await this.model.complete({
        system,
        messages: [...messages],
        ...(tools && { tools, toolChoice: 'auto' as const }),
      });

      const requests = toolUses(response);
      if (response.stopReason !== 'tool_use' || requests.length === 0) {
        return responseText(response);
      }

      if (!input.dispatch) {
        this.logProvider.debug('Tool use requested without a dispatcher', {
          tools: requests.map((r) => r.name),
        });
        return responseText(response);
      }

      this.logProvider.debug('Tool round', { round, tools: requests.map((r) => r.name) });

      messages.push({ role: 'assistant', content: response.content });

      const results: ToolResultBlock[] = [];
      for (const request of requests) {
        results.push({
          type: 'tool_result',
          toolUseId: request.id,
          content: await this.runTool(input.dispatch, request),
        });
      }
      messages.push({ role: 'user', content: results });
    }

    this.logProvider.debug('Tool rounds exhausted, requesting final answer', {
      rounds: this.maxRounds,
    });
    const final = await this.model.complete({ system, messages: [...messages] });
    return responseText(final);
  }

  private async runTool(dispatch: ToolDispatcher, request: ToolUseBlock): Promise<string> {
    try {
      return await dispatch(request.name, request.input);
    } catch (err) {
      // Reported to the model as the tool result
      const message = err instanceof Error ? err.message : String(err);
      this.logProvider.error('Tool dispatch failed', { tool: request.name, error: message });
      return `Tool '${request.name}' failed: ${message}`;
    }
  }
}

export function buildSystemPrompt(
  history?: string | null,
  maxRounds: number = MAX_TOOL_ROUNDS
): string {
  const base = systemPrompt(maxRounds);
  return history ? `${base}\n\nPrevious conversation:\n${history}` : base;
}

/**
 * OpenAI chat-completions language model.
 * Maps the neutral message model onto the chat API: tool_use blocks become
 * assistant `tool_calls`, tool_result blocks become `role: "tool"` messages.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { ModelResponseError } from '../errors.js';
import type {
  AssistantContent,
  ChatMessage,
  CompletionRequest,
  ModelResponse,
  StopReason,
  ToolDefinition,
} from '../types/llm.js';
import { isRecord } from '../validation/fields.js';
import type { ILanguageModel } from './ILanguageModel.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 800;

export interface OpenAIChatModelOptions {
  client?: OpenAI;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export class OpenAIChatModel implements ILanguageModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(opts?: OpenAIChatModelOptions) {
    this.client = opts?.client ?? new OpenAI({ apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = opts?.temperature ?? 0;
  }

  async complete(request: CompletionRequest): Promise<ModelResponse> {
    const tools = request.tools && request.tools.length > 0 ? request.tools : undefined;

    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: toOpenAIMessages(request.system, request.messages),
      ...(tools && {
        tools: tools.map(toOpenAITool),
        tool_choice: request.toolChoice ?? 'auto',
      }),
    });

    return fromOpenAICompletion(completion);
  }
}

// ── Wire Mapping ──

export function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  const properties: Record<string, { type: string; description?: string }> = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(tool.inputSchema)) {
    properties[name] = {
      type: field.type,
      ...(field.description && { description: field.description }),
    };
    if (field.required) required.push(name);
  }

  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { type: 'object', properties, required },
    },
  };
}

export function toOpenAIMessages(
  system: string,
  messages: ChatMessage[]
): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = [{ role: 'system', content: system }];

  for (const message of messages) {
    if (message.role === 'user') {
      if (typeof message.content === 'string') {
        out.push({ role: 'user', content: message.content });
      } else {
        for (const result of message.content) {
          out.push({ role: 'tool', tool_call_id: result.toolUseId, content: result.content });
        }
      }
      continue;
    }

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    const toolCalls: ChatCompletionMessageToolCall[] = [];
    for (const block of message.content) {
      if (block.type !== 'tool_use') continue;
      toolCalls.push({
        id: block.id,
        type: 'function',
        function: { name: block.name, arguments: JSON.stringify(block.input) },
      });
    }

    out.push({
      role: 'assistant',
      content: text || null,
      ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
    });
  }

  return out;
}

export function fromOpenAICompletion(completion: ChatCompletion): ModelResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new ModelResponseError('Model returned no choices', { id: completion.id });
  }

  const content: AssistantContent[] = [];
  if (choice.message.content) {
    content.push({ type: 'text', text: choice.message.content });
  }

  for (const call of choice.message.tool_calls ?? []) {
    if (call.type !== 'function') continue;
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.function.name,
      input: parseArguments(call.function.name, call.function.arguments),
    });
  }

  return { stopReason: toStopReason(choice.finish_reason), content };
}

function toStopReason(finishReason: ChatCompletion.Choice['finish_reason']): StopReason {
  switch (finishReason) {
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'end_turn';
  }
}

function parseArguments(toolName: string, raw: string): Record<string, unknown> {
  if (raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ModelResponseError(`Malformed arguments for tool '${toolName}'`, {
      arguments: raw,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  if (!isRecord(parsed)) {
    throw new ModelResponseError(`Arguments for tool '${toolName}' must be a JSON object`, {
      arguments: raw,
    });
  }
  return parsed;
}

/**
 * OpenAI Chat Model
 *
 * ChatModel over the chat completions endpoint with function tools.
 * OPENAI_BASE_URL points it at any compatible server.
 */

import OpenAI from 'openai';
import { z } from 'zod';

import { getEnv } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import type { ChatCompletion, ChatMessage, ChatModel, ToolCall, ToolDefinition } from './types.js';

const ToolArgumentsSchema = z.record(z.unknown());

export interface OpenAIChatModelOptions {
  model: string;
  apiKey: string;
  baseURL?: string;
  /** Default: 0.3 */
  temperature?: number;
}

/**
 * Matches the [llm] section of config.toml.
 */
export interface LLMConfig {
  model: string;
  temperature: number;
  max_iterations: number;
}

export class OpenAIChatModel implements ChatModel {
  readonly model: string;
  private readonly temperature: number;
  private readonly client: OpenAI;

  constructor(options: OpenAIChatModelOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.3;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolDefinition[]
  ): Promise<ChatCompletion> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      temperature: this.temperature,
      ...(tools.length > 0 ? { tools: tools.map(toOpenAITool) } : {}),
    };

    const response = await this.client.chat.completions.create(params);
    return fromOpenAIResponse(response);
  }
}

// ============================================================================
// Mapping
// ============================================================================

export function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };

    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId ?? '',
        content: message.content,
      };

    case 'assistant': {
      const toolCalls = message.toolCalls?.map((tc) => ({
        id: tc.id,
        type: 'function' as const,
        function: {
          name: tc.name,
          arguments: JSON.stringify(tc.arguments),
        },
      }));

      return {
        role: 'assistant',
        content: message.content.length > 0 ? message.content : null,
        ...(toolCalls?.length ? { tool_calls: toolCalls } : {}),
      };
    }

    case 'user':
      return { role: 'user', content: message.content };
  }
}

function toOpenAITool(tool: ToolDefinition): OpenAI.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function fromOpenAIResponse(response: OpenAI.ChatCompletion): ChatCompletion {
  const message = response.choices[0]?.message;
  const toolCalls: ToolCall[] = [];

  for (const tc of message?.tool_calls ?? []) {
    if ('function' in tc) {
      toolCalls.push({
        id: tc.id,
        name: tc.function.name,
        // Malformed arguments reach the tool as {} and fail its validation
        arguments: safeJsonParse(tc.function.arguments, ToolArgumentsSchema, {}),
      });
    }
  }

  return { content: message?.content ?? '', toolCalls };
}

/**
 * Create the chat model for the [llm] config section.
 *
 * @throws APIKeyError when OPENAI_API_KEY is not set
 */
export function createChatModel(config: LLMConfig): ChatModel {
  const apiKey = getEnv('OPENAI_API_KEY');
  if (!apiKey) {
    throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
  }

  return new OpenAIChatModel({
    model: config.model,
    apiKey,
    baseURL: getEnv('OPENAI_BASE_URL'),
    temperature: config.temperature,
  });
}

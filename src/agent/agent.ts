/**
 * Codebase Agent
 *
 * Tool-calling loop over a ChatModel. Each question runs:
 *
 * ```
 * run(question, conversationId)
 *   ├── Load checkpoint (or start with the system prompt)
 *   ├── Append user message
 *   ├── loop (≤ maxIterations)
 *   │   ├── model.complete(messages, tools)
 *   │   ├── no tool calls → final answer, stop
 *   │   └── run each tool, append its result, continue
 *   └── Save checkpoint
 * ```
 *
 * Conversations are isolated by id; the store is owned by whoever builds
 * the agent.
 */

import { consoleLogger, type Logger } from '../utils/logger.js';
import type { ConversationStore } from './conversation-store.js';
import type { ChatMessage, ChatModel, Tool, ToolCall } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_ITERATIONS = 8;

export const MAX_ITERATIONS_NOTICE =
  'I could not finish answering within the allowed number of steps. ' +
  'Try a narrower question.';

export const SYSTEM_PROMPT = `You are an expert code assistant working inside an indexed repository.

## Available Tool: search_codebase
Similarity search over the repository's functions, classes and files.

## How to Work
- Search before answering questions about the code. Base claims on what the tool returns.
- Cite the files you rely on by path, with short snippets or line ranges.
- If the code you need is not in the results, say you don't know and suggest how to find it.
- When proposing a change, give the file, a minimal patch and the command that verifies it.
- Suggest a focused test for any behavior you change.
- Never reveal secrets such as API keys or tokens, even if they appear in the code.

## Response Guidelines
- Lead with a one-line summary, then the details
- Use code blocks with language tags
- Ask a clarifying question when the request is ambiguous`;

// ============================================================================
// Types
// ============================================================================

export interface CodebaseAgentConfig {
  model: ChatModel;
  tools: Tool[];
  store: ConversationStore;
  logger?: Logger;
  /** Model calls per question. Default: 8 */
  maxIterations?: number;
  systemPrompt?: string;
}

export interface AgentRunResult {
  answer: string;
  /** Model calls made for this question */
  iterations: number;
  toolCalls: ToolCall[];
}

// ============================================================================
// CodebaseAgent
// ============================================================================

export class CodebaseAgent {
  private readonly model: ChatModel;
  private readonly tools: Map<string, Tool>;
  private readonly store: ConversationStore;
  private readonly logger: Logger;
  private readonly maxIterations: number;
  private readonly systemPrompt: string;

  constructor(config: CodebaseAgentConfig) {
    this.model = config.model;
    this.tools = new Map(config.tools.map((tool) => [tool.name, tool]));
    this.store = config.store;
    this.logger = config.logger ?? consoleLogger;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.systemPrompt = config.systemPrompt ?? SYSTEM_PROMPT;
  }

  /**
   * Answer a question within a conversation. Returns '' for a blank question
   * without touching the conversation.
   */
  async ask(question: string, conversationId: string): Promise<string> {
    const result = await this.run(question, conversationId);
    return result.answer;
  }

  async run(question: string, conversationId: string): Promise<AgentRunResult> {
    if (question.trim().length === 0) {
      return { answer: '', iterations: 0, toolCalls: [] };
    }

    const messages: ChatMessage[] = [
      ...(this.store.get(conversationId)?.messages ?? [
        { role: 'system', content: this.systemPrompt },
      ]),
    ];
    messages.push({ role: 'user', content: question });

    const definitions = [...this.tools.values()].map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
    const requested: ToolCall[] = [];

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      const completion = await this.model.complete([...messages], definitions);

      if (completion.toolCalls.length === 0) {
        messages.push({ role: 'assistant', content: completion.content });
        this.save(conversationId, messages, iteration);
        return { answer: completion.content, iterations: iteration, toolCalls: requested };
      }

      messages.push({
        role: 'assistant',
        content: completion.content,
        toolCalls: completion.toolCalls,
      });

      for (const call of completion.toolCalls) {
        requested.push(call);
        messages.push({
          role: 'tool',
          toolCallId: call.id,
          name: call.name,
          content: await this.runTool(call),
        });
      }
    }

    this.logger.warn(
      `Conversation ${conversationId}: no answer after ${this.maxIterations} iterations`
    );
    messages.push({ role: 'assistant', content: MAX_ITERATIONS_NOTICE });
    this.save(conversationId, messages, this.maxIterations);
    return { answer: MAX_ITERATIONS_NOTICE, iterations: this.maxIterations, toolCalls: requested };
  }

  private async runTool(call: ToolCall): Promise<string> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return `Unknown tool: ${call.name}`;
    }

    this.logger.debug?.(`Tool ${call.name}(${JSON.stringify(call.arguments)})`);
    try {
      return await tool.execute(call.arguments);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Tool ${call.name} failed: ${message}`);
      return `Tool error: ${message}`;
    }
  }

  private save(conversationId: string, messages: ChatMessage[], iterations: number): void {
    this.store.put(conversationId, messages, {
      model: this.model.model,
      last_iterations: iterations,
    });
  }
}

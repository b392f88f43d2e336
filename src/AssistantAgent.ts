import type {
  AgentEvent,
  ChatMessage,
  ChatModelClient,
  FunctionCall,
  FunctionExecutionResult,
  LLMMessage,
} from './chatTypes.js';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import type { Tool } from './tools.js';

export interface AssistantAgentOptions {
  name: string;
  modelClient: ChatModelClient;
  systemMessage: string;
  tools?: Tool[];
}

/**
 * A chat participant backed by a model client. When the model asks for tools
 * the agent runs them and replies with a summary of their output; otherwise it
 * replies with the model's text.
 */
export class AssistantAgent {
  readonly name: string;
  private readonly modelClient: ChatModelClient;
  private readonly systemMessage: string;
  private readonly tools: Map<string, Tool>;
  private readonly context: LLMMessage[] = [];

  constructor(options: AssistantAgentOptions) {
    this.name = options.name;
    this.modelClient = options.modelClient;
    this.systemMessage = options.systemMessage;
    this.tools = new Map((options.tools ?? []).map((tool) => [tool.definition.name, tool]));
  }

  /**
   * Yields any tool events first; the last item yielded is always the
   * agent's response message.
   */
  async *onMessages(
    messages: readonly ChatMessage[],
    signal?: AbortSignal
  ): AsyncGenerator<AgentEvent | ChatMessage, void, undefined> {
    for (const message of messages) {
      this.context.push({ role: 'user', content: message.content });
    }

    const result = await this.modelClient.create(
      [{ role: 'system', content: this.systemMessage }, ...this.context],
      {
        tools: [...this.tools.values()].map((tool) => tool.definition),
        signal,
      }
    );

    if (result.toolCalls.length === 0) {
      const content = result.content ?? '';
      this.context.push({ role: 'assistant', content });
      yield { type: 'text', source: this.name, content };
      return;
    }

    this.context.push({ role: 'assistant', content: result.content, toolCalls: result.toolCalls });
    yield { type: 'tool_call_request', source: this.name, calls: result.toolCalls };

    const results = await Promise.all(result.toolCalls.map((call) => this.executeTool(call)));
    for (const execution of results) {
      this.context.push({ role: 'tool', toolCallId: execution.callId, content: execution.content });
    }
    yield { type: 'tool_call_execution', source: this.name, results };

    yield {
      type: 'tool_call_summary',
      source: this.name,
      content: results.map((execution) => execution.content).join('\n'),
    };
  }

  private async executeTool(call: FunctionCall): Promise<FunctionExecutionResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return {
        callId: call.id,
        name: call.name,
        content: `Error: The tool '${call.name}' is not available.`,
        isError: true,
      };
    }

    try {
      const content = await tool.run(call.arguments);
      log.debug(`🔧 ${call.name}(${call.arguments}) -> ${content}`);
      return { callId: call.id, name: call.name, content, isError: false };
    } catch (error) {
      log.warn(`🔧 ${call.name} failed: ${errorMessage(error)}`);
      return { callId: call.id, name: call.name, content: `Error: ${errorMessage(error)}`, isError: true };
    }
  }
}

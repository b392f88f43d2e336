import OpenAI from 'openai';
import type {
  ChatModelClient,
  CreateOptions,
  CreateResult,
  LLMMessage,
  ToolDefinition,
} from './chatTypes.js';

export interface OpenAIChatClientOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionTool = OpenAI.Chat.Completions.ChatCompletionTool;

function toOpenAIMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

/**
 * ChatModelClient over the OpenAI chat completions API.
 */
export class OpenAIChatClient implements ChatModelClient {
  private openai: OpenAI;
  private model: string;
  private temperature?: number;

  constructor(options: OpenAIChatClientOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model || 'gpt-4o-mini';
    this.temperature = options.temperature;
  }

  async create(messages: LLMMessage[], options: CreateOptions): Promise<CreateResult> {
    const completion = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        ...(options.tools.length > 0 ? { tools: options.tools.map(toOpenAITool) } : {}),
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
      },
      { signal: options.signal }
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new Error('Model returned no choices');
    }

    return {
      content: choice.message.content,
      toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }
}

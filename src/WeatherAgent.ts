import { AssistantAgent } from './AssistantAgent.js';
import type { ChatModelClient } from './chatTypes.js';
import { RoundRobinGroupChat } from './RoundRobinGroupChat.js';
import { MaxMessageTermination, TextMentionTermination, anyOf } from './termination.js';
import { weatherTool } from './weather.js';

export const SUPPORTED_CONTENT_TYPES: readonly string[] = ['text', 'text/plain'];

export const STOP_PHRASE = 'TERMINATE';
export const MAX_MESSAGES = 5;

const SYSTEM_MESSAGE =
  'You are a helpful weather assistant that can provide weather information. ' +
  'Use the get_weather tool to look up current weather. ' +
  'If the user asks about anything other than weather, respond to them very briefly but also ' +
  'politely let them know that you can only provide weather information. ' +
  `Once you have responded to the user, end with '${STOP_PHRASE}'.`;

export interface AgentStreamUpdate {
  isTaskComplete: boolean;
  requireUserInput: boolean;
  content: string;
}

/**
 * What the task manager needs from an agent: a one-shot call and a stream of
 * progress updates ending in a single completed update.
 */
export interface ConversationalAgent {
  readonly supportedContentTypes: readonly string[];
  invoke(query: string, sessionId: string, signal?: AbortSignal): Promise<string>;
  stream(query: string, sessionId: string, signal?: AbortSignal): AsyncIterable<AgentStreamUpdate>;
}

/**
 * Weather assistant with the get_weather tool, run as a single-member
 * round-robin team that stops on TERMINATE or after five messages.
 * Each call starts a fresh team, so nothing carries over between calls.
 */
export class WeatherAgent implements ConversationalAgent {
  readonly supportedContentTypes = SUPPORTED_CONTENT_TYPES;
  private readonly modelClient: ChatModelClient;

  constructor(modelClient: ChatModelClient) {
    this.modelClient = modelClient;
  }

  async invoke(query: string, _sessionId: string, signal?: AbortSignal): Promise<string> {
    const result = await this.createTeam().run(query, signal);
    const last = result.messages[result.messages.length - 1];

    if (result.messages.length > 1 && last) {
      return last.content;
    }
    return "I couldn't process your weather request.";
  }

  async *stream(
    query: string,
    _sessionId: string,
    signal?: AbortSignal
  ): AsyncGenerator<AgentStreamUpdate, void, undefined> {
    yield {
      isTaskComplete: false,
      requireUserInput: false,
      content: 'Processing your weather request...',
    };

    for await (const item of this.createTeam().runStream(query, signal)) {
      switch (item.type) {
        case 'result':
          yield {
            isTaskComplete: true,
            requireUserInput: false,
            content: `Task completed successfully. Reason: ${item.stopReason}`,
          };
          return;
        case 'text':
        case 'tool_call_summary':
          // the caller already has its own query
          if (item.source === 'user') break;
          yield { isTaskComplete: false, requireUserInput: false, content: item.content };
          break;
        case 'tool_call_request':
        case 'tool_call_execution':
          break;
      }
    }
  }

  private createTeam(): RoundRobinGroupChat {
    const assistant = new AssistantAgent({
      name: 'weather_assistant',
      modelClient: this.modelClient,
      systemMessage: SYSTEM_MESSAGE,
      tools: [weatherTool],
    });
    return new RoundRobinGroupChat(
      [assistant],
      anyOf(new TextMentionTermination(STOP_PHRASE), new MaxMessageTermination(MAX_MESSAGES))
    );
  }
}

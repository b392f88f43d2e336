import type { AssistantAgent } from './AssistantAgent.js';
import {
  isChatMessage,
  type ChatMessage,
  type TaskResult,
  type TeamStreamItem,
  type TextMessage,
} from './chatTypes.js';
import type { TerminationCondition } from './termination.js';

/**
 * Participants take turns in a fixed order until the termination condition
 * fires. Each participant receives every message produced since its last turn.
 */
export class RoundRobinGroupChat {
  private readonly participants: readonly AssistantAgent[];
  private readonly termination: TerminationCondition;

  constructor(participants: AssistantAgent[], termination: TerminationCondition) {
    if (participants.length === 0) {
      throw new Error('A group chat needs at least one participant');
    }
    this.participants = participants;
    this.termination = termination;
  }

  async run(task: string, signal?: AbortSignal): Promise<TaskResult> {
    for await (const item of this.runStream(task, signal)) {
      if (item.type === 'result') return item;
    }
    throw new Error('Group chat ended without a result');
  }

  async *runStream(task: string, signal?: AbortSignal): AsyncGenerator<TeamStreamItem, void, undefined> {
    this.termination.reset();

    const taskMessage: TextMessage = { type: 'text', source: 'user', content: task };
    const messages: ChatMessage[] = [taskMessage];
    const seen = new Map<string, number>();
    yield taskMessage;

    let stop = this.termination.check([taskMessage]);
    let turn = 0;

    while (stop === null) {
      signal?.throwIfAborted();

      const speaker = this.participants[turn % this.participants.length];
      turn += 1;
      if (!speaker) break;

      const pending = messages.slice(seen.get(speaker.name) ?? 0);
      let response: ChatMessage | undefined;
      for await (const item of speaker.onMessages(pending, signal)) {
        yield item;
        if (isChatMessage(item)) response = item;
      }
      if (!response) {
        throw new Error(`Agent ${speaker.name} produced no response`);
      }

      messages.push(response);
      seen.set(speaker.name, messages.length);
      stop = this.termination.check([response]);
    }

    yield { type: 'result', messages, stopReason: stop?.content ?? null };
  }
}

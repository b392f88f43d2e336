import type { ChatMessage } from './chatTypes.js';

export interface StopMessage {
  source: string;
  content: string;
}

export interface TerminationCondition {
  readonly terminated: boolean;
  /** Inspects the messages produced since the last check. */
  check(messages: readonly ChatMessage[]): StopMessage | null;
  reset(): void;
}

export class TextMentionTermination implements TerminationCondition {
  private stopped = false;

  constructor(private readonly text: string) {}

  get terminated(): boolean {
    return this.stopped;
  }

  check(messages: readonly ChatMessage[]): StopMessage | null {
    if (this.stopped) {
      throw new Error('Termination condition has already been reached');
    }
    if (messages.some((message) => message.content.includes(this.text))) {
      this.stopped = true;
      return { source: 'TextMentionTermination', content: `Text '${this.text}' mentioned` };
    }
    return null;
  }

  reset(): void {
    this.stopped = false;
  }
}

export class MaxMessageTermination implements TerminationCondition {
  private count = 0;

  constructor(private readonly maxMessages: number) {
    if (!Number.isInteger(maxMessages) || maxMessages < 1) {
      throw new RangeError(`maxMessages must be a positive integer, got ${maxMessages}`);
    }
  }

  get terminated(): boolean {
    return this.count >= this.maxMessages;
  }

  check(messages: readonly ChatMessage[]): StopMessage | null {
    if (this.terminated) {
      throw new Error('Termination condition has already been reached');
    }
    this.count += messages.length;
    if (this.count >= this.maxMessages) {
      return {
        source: 'MaxMessageTermination',
        content: `Maximum number of messages ${this.maxMessages} reached, current message count: ${this.count}`,
      };
    }
    return null;
  }

  reset(): void {
    this.count = 0;
  }
}

class OrTermination implements TerminationCondition {
  constructor(private readonly conditions: readonly TerminationCondition[]) {}

  get terminated(): boolean {
    return this.conditions.some((condition) => condition.terminated);
  }

  check(messages: readonly ChatMessage[]): StopMessage | null {
    if (this.terminated) {
      throw new Error('Termination condition has already been reached');
    }
    const stops = this.conditions
      .map((condition) => condition.check(messages))
      .filter((stop): stop is StopMessage => stop !== null);
    if (stops.length === 0) return null;
    return {
      source: stops.map((stop) => stop.source).join(', '),
      content: stops.map((stop) => stop.content).join('; '),
    };
  }

  reset(): void {
    for (const condition of this.conditions) condition.reset();
  }
}

/** Stops as soon as any of the given conditions stops. */
export function anyOf(...conditions: TerminationCondition[]): TerminationCondition {
  return new OrTermination(conditions);
}
